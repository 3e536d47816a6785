import {
  handleApiRoute,
  jsonResponse,
  requirePrincipal,
  type RouteContext,
} from "@/backend/transport/rest/pipeline";
import { TOOL_CATALOGUE } from "@/backend/transport/rest/tool-catalogue";

export async function GET(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId }) => {
    await requirePrincipal(request, container);
    return jsonResponse(requestId, { tools: TOOL_CATALOGUE });
  });
}
