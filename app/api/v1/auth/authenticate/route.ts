import { toPrincipalSummary } from "@/backend/domain/principal";
import {
  handleApiRoute,
  jsonResponse,
  parseJsonBody,
  type RouteContext,
} from "@/backend/transport/rest/pipeline";
import { authenticateBodySchema, withToolArguments } from "@/backend/transport/rest/schemas";

export async function POST(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId, gateway }) => {
    const body = await parseJsonBody(request, withToolArguments(authenticateBodySchema));
    const router = container.routerFactory.getRouter();
    const principal = await router.authenticate(gateway, body.session_token, body.refresh_token);

    return jsonResponse(requestId, {
      tool: "authenticate_user",
      success: true,
      result: toPrincipalSummary(principal),
    });
  });
}
