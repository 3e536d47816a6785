import {
  handleApiRoute,
  jsonResponse,
  requirePrincipal,
  type RouteContext,
} from "@/backend/transport/rest/pipeline";
import { RESOURCE_CATALOGUE } from "@/backend/transport/rest/resource-catalogue";

export async function GET(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId }) => {
    await requirePrincipal(request, container);
    return jsonResponse(requestId, { resources: RESOURCE_CATALOGUE, total: RESOURCE_CATALOGUE.length });
  });
}
