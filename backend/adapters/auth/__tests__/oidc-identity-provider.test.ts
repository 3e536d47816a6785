import { createLocalJWKSet, exportJWK, generateKeyPair, SignJWT, type JWTVerifyGetKey, type KeyLike } from "jose";
import { beforeAll, describe, expect, it, vi } from "vitest";

import { createSilentLogger } from "@/backend/composition/logger";

import { AuthVerificationError } from "@/backend/adapters/auth/errors";
import {
  OidcIdentityProvider,
  type OidcIdentityProviderConfig,
} from "@/backend/adapters/auth/oidc-identity-provider";

const ISSUER = "https://idp.test";
const AUDIENCE = "devops-gateway";

const baseConfig: OidcIdentityProviderConfig = {
  issuer: ISSUER,
  audience: AUDIENCE,
  tokenEndpoint: "https://idp.test/oauth/token",
  revocationEndpoint: "https://idp.test/oauth/revoke",
  clientId: "gateway-client",
  clientSecret: "test-secret",
  clockSkewSeconds: 60,
  timeoutMs: 1000,
};

let privateKey: KeyLike;
let keySet: JWTVerifyGetKey;

beforeAll(async () => {
  const pair = await generateKeyPair("RS256");
  privateKey = pair.privateKey;
  const jwk = await exportJWK(pair.publicKey);
  keySet = createLocalJWKSet({ keys: [{ ...jwk, kid: "test-key", alg: "RS256" }] });
});

function sign(
  claims: Record<string, unknown>,
  options: { issuer?: string; expiresAt?: number | string } = {},
): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: "RS256", kid: "test-key" })
    .setSubject("user-1")
    .setIssuer(options.issuer ?? ISSUER)
    .setAudience(AUDIENCE)
    .setIssuedAt()
    .setExpirationTime(options.expiresAt ?? "5m")
    .sign(privateKey);
}

async function expectAuthError(promise: Promise<unknown>, code: AuthVerificationError["code"]): Promise<void> {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason,
  );

  expect(error).toBeInstanceOf(AuthVerificationError);
  expect(error).toMatchObject({ code });
}

describe("OidcIdentityProvider", () => {
  it("validates a signed session token", async () => {
    const provider = new OidcIdentityProvider(baseConfig, createSilentLogger(), { keySet });
    const token = await sign({ roles: ["developer"] });

    const session = await provider.validate(token);

    expect(session.sessionToken).toBe(token);
    expect(session.claims).toMatchObject({ sub: "user-1", iss: ISSUER, roles: ["developer"] });
  });

  it("marks expired tokens as refreshable", async () => {
    const provider = new OidcIdentityProvider(baseConfig, createSilentLogger(), { keySet });
    const token = await sign({}, { expiresAt: Math.floor(Date.now() / 1000) - 3600 });

    await expectAuthError(provider.validate(token), "token_expired");
  });

  it("rejects tokens from another issuer", async () => {
    const provider = new OidcIdentityProvider(baseConfig, createSilentLogger(), { keySet });
    const token = await sign({}, { issuer: "https://other-idp.test" });

    await expectAuthError(provider.validate(token), "invalid_claims");
  });

  it("reports a missing configuration", async () => {
    const provider = new OidcIdentityProvider({ ...baseConfig, issuer: undefined }, createSilentLogger(), { keySet });

    await expectAuthError(provider.validate("session-1"), "auth_not_configured");
  });

  it("refreshes through the token endpoint and keeps the old refresh token when none is returned", async () => {
    const freshToken = await sign({ roles: ["observer"] });
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      Response.json({ access_token: freshToken, token_type: "Bearer", expires_in: 300 }),
    );
    const provider = new OidcIdentityProvider(baseConfig, createSilentLogger(), { keySet, fetch: fetchMock });

    const session = await provider.refresh("refresh-1");

    expect(session.sessionToken).toBe(freshToken);
    expect(session.refreshToken).toBe("refresh-1");
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://idp.test/oauth/token");
    expect(String(init?.body)).toBe(
      "grant_type=refresh_token&refresh_token=refresh-1&client_id=gateway-client&client_secret=test-secret",
    );
  });

  it("fails a refresh the token endpoint rejects", async () => {
    const fetchMock = vi.fn(async () => new Response("denied", { status: 400 }));
    const provider = new OidcIdentityProvider(baseConfig, createSilentLogger(), { keySet, fetch: fetchMock });

    await expectAuthError(provider.refresh("refresh-1"), "refresh_failed");
  });

  it("revokes the refresh token on logout", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 200 }));
    const provider = new OidcIdentityProvider(baseConfig, createSilentLogger(), { keySet, fetch: fetchMock });

    await expect(provider.logout("refresh-1")).resolves.toBe(true);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://idp.test/oauth/revoke");
    expect(String(init?.body)).toBe(
      "token=refresh-1&token_type_hint=refresh_token&client_id=gateway-client&client_secret=test-secret",
    );
  });

  it("checks delegated permissions against the stringified claims", async () => {
    const provider = new OidcIdentityProvider(baseConfig, createSilentLogger(), { keySet });
    const rawClaims = { sub: "user-1", permissions: '["read_logs"]', roles: '["developer"]' };

    await expect(
      provider.delegatedCheck(rawClaims, ["read_logs", "deploy_production"], "permission", "any"),
    ).resolves.toEqual({ allowed: true, matched: ["read_logs"] });
    await expect(
      provider.delegatedCheck(rawClaims, ["read_logs", "deploy_production"], "permission", "all"),
    ).resolves.toEqual({ allowed: false, matched: ["read_logs"] });
    await expect(provider.delegatedCheck(rawClaims, ["developer"], "role", "all")).resolves.toEqual({
      allowed: true,
      matched: ["developer"],
    });
  });
});
