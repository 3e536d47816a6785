import { toDeployRequest } from "@/backend/transport/rest/devops-requests";
import {
  handleApiRoute,
  parseJsonBody,
  requirePrincipal,
  writeResponse,
  type RouteContext,
} from "@/backend/transport/rest/pipeline";
import { deployBodySchema } from "@/backend/transport/rest/schemas";

export async function POST(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId, gateway }) => {
    const principal = await requirePrincipal(request, container);
    const deployRequest = toDeployRequest(await parseJsonBody(request, deployBodySchema));

    const result = await container.routerFactory.getRouter().deploy(gateway, principal, deployRequest);
    return writeResponse(requestId, result, result.result.deployment.status);
  });
}
