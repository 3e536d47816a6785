import { toPrincipalSummary } from "@/backend/domain/principal";
import {
  handleApiRoute,
  jsonResponse,
  requirePrincipal,
  type RouteContext,
} from "@/backend/transport/rest/pipeline";

export async function GET(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId }) => {
    const principal = await requirePrincipal(request, container);
    return jsonResponse(requestId, { data: toPrincipalSummary(principal) });
  });
}
