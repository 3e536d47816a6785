import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";

import type { OperationStatus } from "@/backend/domain/devops";
import type { Principal } from "@/backend/domain/principal";
import type { GatewayCallContext } from "@/backend/ports/gateway-router";

import type { ApplicationContainer } from "@/backend/composition/container";
import { readSessionTokens } from "@/backend/adapters/auth/session-tokens";
import { ApiError, normalizeError, toErrorResponse } from "@/backend/transport/rest/api-error";

export interface RouteContext {
  container: ApplicationContainer;
  params: Record<string, string>;
}

export type RouteHandler = (request: Request, route: RouteContext) => Promise<Response>;

export interface ApiRequestContext {
  requestId: string;
  container: ApplicationContainer;
  logger: Logger;
  /** Headers the proxied router forwards to the gateway. */
  gateway: GatewayCallContext;
}

export async function handleApiRoute(
  request: Request,
  container: ApplicationContainer,
  handler: (context: ApiRequestContext) => Promise<Response>,
): Promise<Response> {
  const requestId = getOrCreateRequestId(request);
  const logger = container.logger.child({ requestId });
  const startedAt = performance.now();
  const path = new URL(request.url).pathname;

  let response: Response;
  try {
    response = withRequestId(
      await handler({
        requestId,
        container,
        logger,
        gateway: toGatewayCallContext(request, requestId),
      }),
      requestId,
    );
  } catch (error) {
    const normalized = normalizeError(error);
    if (normalized.status >= 500) {
      logger.error({ err: error }, "request failed");
    }

    response = toErrorResponse(error, requestId);
  }

  logger.info(
    {
      method: request.method,
      path,
      status: response.status,
      durationMs: Math.round(performance.now() - startedAt),
    },
    "request completed",
  );

  return response;
}

export function jsonResponse(requestId: string, payload: unknown, status = 200): Response {
  return Response.json(payload, {
    status,
    headers: {
      "x-request-id": requestId,
    },
  });
}

/** Writes still running report 202; everything else, failures included, reports 200. */
export function writeResponse(requestId: string, payload: unknown, status: OperationStatus): Response {
  return jsonResponse(requestId, payload, status === "IN_PROGRESS" ? 202 : 200);
}

export async function requirePrincipal(request: Request, container: ApplicationContainer): Promise<Principal> {
  const { sessionToken, refreshToken } = readSessionTokens(request.headers, container.config.auth);
  return container.principalResolver.resolve(sessionToken, refreshToken);
}

export async function parseJsonBody<T>(request: Request, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let body: unknown;

  try {
    body = await request.json();
  } catch {
    throw new ApiError(400, "invalid_json", "Request body must be valid JSON");
  }

  return schema.parse(body);
}

export function parseSearchParams<T>(request: Request, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const params = new URL(request.url).searchParams;
  return schema.parse(Object.fromEntries(params.entries()));
}

export function getOrCreateRequestId(request: Request): string {
  const requestId = request.headers.get("x-request-id")?.trim();
  if (requestId) {
    return requestId;
  }

  return crypto.randomUUID();
}

function toGatewayCallContext(request: Request, requestId: string): GatewayCallContext {
  return {
    requestId,
    authorization: request.headers.get("authorization") ?? undefined,
    cookie: request.headers.get("cookie") ?? undefined,
  };
}

function withRequestId(response: Response, requestId: string): Response {
  if (response.headers.has("x-request-id")) {
    return response;
  }

  try {
    response.headers.set("x-request-id", requestId);
    return response;
  } catch {
    const headers = new Headers(response.headers);
    headers.set("x-request-id", requestId);

    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers,
    });
  }
}
