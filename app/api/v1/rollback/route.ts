import { toRollbackRequest } from "@/backend/transport/rest/devops-requests";
import {
  handleApiRoute,
  parseJsonBody,
  requirePrincipal,
  writeResponse,
  type RouteContext,
} from "@/backend/transport/rest/pipeline";
import { rollbackBodySchema } from "@/backend/transport/rest/schemas";

export async function POST(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId, gateway }) => {
    const principal = await requirePrincipal(request, container);
    const rollbackRequest = toRollbackRequest(await parseJsonBody(request, rollbackBodySchema));

    const result = await container.routerFactory.getRouter().rollback(gateway, principal, rollbackRequest);
    return writeResponse(requestId, result, result.result.rollback.status);
  });
}
