import type { BackendConfig } from "@/backend/composition/config";

export interface SessionTokens {
  sessionToken: string | null;
  refreshToken: string | null;
}

/**
 * Session token: `Authorization: Bearer <token>`, else the session cookie.
 * Refresh token: the refresh cookie only.
 */
export function readSessionTokens(
  headers: Headers,
  config: Pick<BackendConfig["auth"], "sessionCookieName" | "refreshCookieName">,
): SessionTokens {
  const cookies = parseCookieHeader(headers.get("cookie"));

  const bearer = extractBearerToken(headers.get("authorization"));
  const sessionToken = bearer ?? nonEmpty(cookies[config.sessionCookieName]);
  const refreshToken = nonEmpty(cookies[config.refreshCookieName]);

  return { sessionToken, refreshToken };
}

export function extractBearerToken(authorizationHeader: string | null): string | null {
  if (!authorizationHeader) {
    return null;
  }

  const [scheme, token] = authorizationHeader.trim().split(/\s+/);
  if (!scheme || !token || scheme.toLowerCase() !== "bearer") {
    return null;
  }

  return token;
}

export function parseCookieHeader(cookieHeader: string | null): Record<string, string> {
  if (!cookieHeader) {
    return {};
  }

  const entries = cookieHeader.split(";");
  const cookies: Record<string, string> = {};

  for (const entry of entries) {
    const separatorIndex = entry.indexOf("=");
    if (separatorIndex <= 0) {
      continue;
    }

    const name = entry.slice(0, separatorIndex).trim();
    const value = entry.slice(separatorIndex + 1).trim();
    if (!name) {
      continue;
    }

    try {
      cookies[name] = decodeURIComponent(value);
    } catch {
      cookies[name] = value;
    }
  }

  return cookies;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Expired `Set-Cookie` value that removes a session cookie from the browser. */
export function createClearedCookie(name: string): string {
  return [
    `${name}=`,
    "Path=/",
    "Max-Age=0",
    `Expires=${new Date(0).toUTCString()}`,
    "HttpOnly",
    "SameSite=Lax",
  ].join("; ");
}
