import { toMetricsRequest } from "@/backend/transport/rest/devops-requests";
import {
  handleApiRoute,
  jsonResponse,
  parseSearchParams,
  requirePrincipal,
  type RouteContext,
} from "@/backend/transport/rest/pipeline";
import { metricsQuerySchema } from "@/backend/transport/rest/schemas";

export async function GET(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId, gateway }) => {
    const query = parseSearchParams(request, metricsQuerySchema);
    const principal = await requirePrincipal(request, container);

    const result = await container.routerFactory.getRouter().getMetrics(gateway, principal, toMetricsRequest(query));
    return jsonResponse(requestId, result);
  });
}
