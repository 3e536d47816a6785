import { getOrCreateRequestId, type RouteContext } from "@/backend/transport/rest/pipeline";

export async function GET(request: Request, { container }: RouteContext): Promise<Response> {
  const requestId = getOrCreateRequestId(request);

  return Response.json(
    {
      status: "ok",
      service: container.config.server.serviceName,
      timestamp: new Date().toISOString(),
      gateway: {
        mode: container.routerFactory.getRouterType(),
        session: container.gatewayTransport?.state ?? null,
      },
    },
    {
      headers: {
        "x-request-id": requestId,
      },
    },
  );
}
