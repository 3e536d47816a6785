import { z } from "zod";

import { ValidationError } from "@/backend/application/errors";
import { createClearedCookie, readSessionTokens } from "@/backend/adapters/auth/session-tokens";
import { ApiError } from "@/backend/transport/rest/api-error";
import { handleApiRoute, jsonResponse, type RouteContext } from "@/backend/transport/rest/pipeline";

const logoutBodySchema = z.object({ refresh_token: z.string().trim().min(1).optional() });

export async function POST(request: Request, { container }: RouteContext): Promise<Response> {
  return handleApiRoute(request, container, async ({ requestId }) => {
    const refreshToken =
      (await readRefreshTokenFromBody(request)) ?? readSessionTokens(request.headers, container.config.auth).refreshToken;

    if (!refreshToken) {
      throw new ValidationError("A refresh token is required to log out");
    }

    const loggedOut = await container.principalResolver.logout(refreshToken);
    const response = jsonResponse(requestId, { data: { loggedOut } });

    response.headers.append("set-cookie", createClearedCookie(container.config.auth.sessionCookieName));
    response.headers.append("set-cookie", createClearedCookie(container.config.auth.refreshCookieName));

    return response;
  });
}

async function readRefreshTokenFromBody(request: Request): Promise<string | undefined> {
  const text = await request.text();
  if (!text.trim()) {
    return undefined;
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ApiError(400, "invalid_json", "Request body must be valid JSON");
  }

  return logoutBodySchema.parse(body).refresh_token;
}
