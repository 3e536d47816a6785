import {
  createRemoteJWKSet,
  errors as joseErrors,
  jwtVerify,
  type JWTVerifyGetKey,
} from "jose";
import type { Logger } from "pino";
import { z } from "zod";

import type { MatchMode } from "@/backend/domain/operations";
import type {
  DelegatedCheckKind,
  DelegatedCheckResult,
  IdentityProvider,
  ValidatedSession,
} from "@/backend/ports/identity-provider";

import { AuthVerificationError } from "@/backend/adapters/auth/errors";
import {
  DEFAULT_CLAIM_RULES,
  parseStringifiedClaims,
  readFirstString,
  readFirstStringList,
} from "@/backend/adapters/auth/claim-extractors";

export interface OidcIdentityProviderConfig {
  issuer?: string;
  audience?: string;
  jwksUri?: string;
  tokenEndpoint?: string;
  revocationEndpoint?: string;
  authorizationCheckUrl?: string;
  clientId?: string;
  clientSecret?: string;
  clockSkewSeconds: number;
  timeoutMs: number;
}

export interface OidcIdentityProviderDeps {
  /** Overrides the remote JWKS, e.g. with `createLocalJWKSet`. */
  keySet?: JWTVerifyGetKey;
  fetch?: typeof fetch;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().int().positive().optional(),
  refresh_token: z.string().optional(),
});

const authorizationCheckResponseSchema = z.object({
  allowed: z.boolean(),
  matched: z.array(z.string()).optional(),
});

export class OidcIdentityProvider implements IdentityProvider {
  private readonly keySet: JWTVerifyGetKey | null;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: OidcIdentityProviderConfig,
    private readonly logger: Logger,
    deps: OidcIdentityProviderDeps = {},
  ) {
    this.keySet = deps.keySet ?? (config.jwksUri ? createRemoteJWKSet(new URL(config.jwksUri)) : null);
    this.fetchImpl = deps.fetch ?? fetch;
  }

  async validate(sessionToken: string): Promise<ValidatedSession> {
    if (!this.keySet || !this.config.issuer) {
      throw new AuthVerificationError("auth_not_configured", "No identity provider is configured");
    }

    try {
      const { payload } = await jwtVerify(sessionToken, this.keySet, {
        issuer: this.config.issuer,
        audience: this.config.audience,
        clockTolerance: this.config.clockSkewSeconds,
      });

      return { claims: payload, sessionToken };
    } catch (error) {
      if (error instanceof AuthVerificationError) {
        throw error;
      }

      if (error instanceof joseErrors.JWTExpired) {
        throw new AuthVerificationError("token_expired", "Session token has expired");
      }

      if (error instanceof joseErrors.JWTClaimValidationFailed) {
        throw new AuthVerificationError("invalid_claims", error.message);
      }

      if (error instanceof joseErrors.JWSSignatureVerificationFailed) {
        throw new AuthVerificationError("invalid_signature", "Session token signature is invalid");
      }

      throw new AuthVerificationError("invalid_token", "Session token verification failed");
    }
  }

  async refresh(refreshToken: string): Promise<ValidatedSession> {
    if (!this.config.tokenEndpoint || !this.config.clientId) {
      throw new AuthVerificationError("auth_not_configured", "Session refresh is not configured");
    }

    const body = new URLSearchParams();
    body.set("grant_type", "refresh_token");
    body.set("refresh_token", refreshToken);
    body.set("client_id", this.config.clientId);

    if (this.config.clientSecret) {
      body.set("client_secret", this.config.clientSecret);
    }

    const response = await this.post(this.config.tokenEndpoint, body, "refresh_failed");
    if (!response.ok) {
      throw new AuthVerificationError("refresh_failed", `Session refresh failed with status ${response.status}`);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AuthVerificationError("refresh_failed", "Session refresh returned an invalid token response");
    }

    const session = await this.validate(parsed.data.access_token);
    this.logger.info("session refreshed");

    return {
      ...session,
      refreshToken: parsed.data.refresh_token ?? refreshToken,
    };
  }

  async logout(refreshToken: string): Promise<boolean> {
    if (!this.config.revocationEndpoint) {
      throw new AuthVerificationError("auth_not_configured", "Session revocation is not configured");
    }

    const body = new URLSearchParams();
    body.set("token", refreshToken);
    body.set("token_type_hint", "refresh_token");

    if (this.config.clientId) {
      body.set("client_id", this.config.clientId);
    }

    if (this.config.clientSecret) {
      body.set("client_secret", this.config.clientSecret);
    }

    const response = await this.post(this.config.revocationEndpoint, body, "logout_failed");
    if (!response.ok) {
      throw new AuthVerificationError("logout_failed", `Session revocation failed with status ${response.status}`);
    }

    return true;
  }

  async delegatedCheck(
    rawClaims: Record<string, string>,
    required: string[],
    kind: DelegatedCheckKind,
    mode: MatchMode,
  ): Promise<DelegatedCheckResult> {
    const claims = parseStringifiedClaims(rawClaims);

    if (this.config.authorizationCheckUrl) {
      const response = await this.fetchImpl(this.config.authorizationCheckUrl, {
        method: "POST",
        signal: AbortSignal.timeout(this.config.timeoutMs),
        headers: {
          "content-type": "application/json",
          accept: "application/json",
        },
        body: JSON.stringify({ claims, required, kind, mode }),
      });

      if (!response.ok) {
        throw new AuthVerificationError(
          "provider_unavailable",
          `Authorization check failed with status ${response.status}`,
        );
      }

      const parsed = authorizationCheckResponseSchema.parse(await response.json());
      return { allowed: parsed.allowed, matched: parsed.matched ?? [] };
    }

    // Without a remote check endpoint, match against every list the claims carry.
    const paths = kind === "role"
      ? [...DEFAULT_CLAIM_RULES.roles, ...DEFAULT_CLAIM_RULES.tenantRoles]
      : [...DEFAULT_CLAIM_RULES.permissions, ...DEFAULT_CLAIM_RULES.scopes, ...DEFAULT_CLAIM_RULES.tenantPermissions];
    const tenant = readFirstString(claims, DEFAULT_CLAIM_RULES.tenant);
    const granted = new Set(paths.flatMap((path) => readFirstStringList(claims, [path], tenant)));

    const matched = required.filter((value) => granted.has(value));
    const allowed = mode === "any" ? matched.length > 0 : matched.length === required.length;

    return { allowed, matched };
  }

  private async post(url: string, body: URLSearchParams, failureCode: "refresh_failed" | "logout_failed"): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        method: "POST",
        signal: AbortSignal.timeout(this.config.timeoutMs),
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json",
        },
        body: body.toString(),
      });
    } catch (error) {
      this.logger.warn({ err: error, url }, "identity provider request failed");
      throw new AuthVerificationError(failureCode, "Identity provider is unreachable");
    }
  }
}
