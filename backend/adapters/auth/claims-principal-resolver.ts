import type { Logger } from "pino";

import { AuthenticationError } from "@/backend/application/errors";
import { ADMIN_WILDCARDS, PERMISSIONS } from "@/backend/domain/operations";
import { ANONYMOUS_USER_ID, type Principal } from "@/backend/domain/principal";
import type { PolicyTable } from "@/backend/domain/policy-table";
import type { Claims, IdentityProvider, ValidatedSession } from "@/backend/ports/identity-provider";
import type { PrincipalResolver } from "@/backend/ports/principal-resolver";

import { AuthVerificationError } from "@/backend/adapters/auth/errors";
import {
  DEFAULT_CLAIM_RULES,
  extractIdentity,
  stringifyClaims,
  type ClaimExtractorRules,
} from "@/backend/adapters/auth/claim-extractors";

export const ANONYMOUS_ROLE = "Observer";

export interface ClaimsPrincipalResolverOptions {
  allowAnonymous: boolean;
  claimRules?: ClaimExtractorRules;
}

export class ClaimsPrincipalResolver implements PrincipalResolver {
  private readonly claimRules: ClaimExtractorRules;

  constructor(
    private readonly identityProvider: IdentityProvider,
    private readonly policyTable: PolicyTable,
    private readonly options: ClaimsPrincipalResolverOptions,
    private readonly logger: Logger,
  ) {
    this.claimRules = options.claimRules ?? DEFAULT_CLAIM_RULES;
  }

  async resolve(sessionToken?: string | null, refreshToken?: string | null): Promise<Principal> {
    if (!sessionToken) {
      if (this.options.allowAnonymous) {
        return createAnonymousPrincipal(this.policyTable);
      }

      throw new AuthenticationError("Not authenticated");
    }

    const session = await this.validateWithRefresh(sessionToken, refreshToken ?? undefined);
    return buildPrincipalFromClaims(session.claims, this.policyTable, {
      sessionToken: session.sessionToken,
      refreshToken: session.refreshToken ?? refreshToken ?? undefined,
      claimRules: this.claimRules,
    });
  }

  async logout(refreshToken: string): Promise<boolean> {
    try {
      return await this.identityProvider.logout(refreshToken);
    } catch (error) {
      this.logger.warn({ err: error }, "identity provider logout failed");
      throw toAuthenticationError(error);
    }
  }

  private async validateWithRefresh(sessionToken: string, refreshToken: string | undefined): Promise<ValidatedSession> {
    try {
      return await this.identityProvider.validate(sessionToken);
    } catch (error) {
      const expired = error instanceof AuthVerificationError && error.code === "token_expired";
      if (!expired || !refreshToken) {
        throw toAuthenticationError(error);
      }
    }

    this.logger.info("session expired, attempting refresh");

    try {
      return await this.identityProvider.refresh(refreshToken);
    } catch (error) {
      throw toAuthenticationError(error);
    }
  }
}

export function createAnonymousPrincipal(policyTable: PolicyTable): Principal {
  const permissions = policyTable.expand([ANONYMOUS_ROLE]);

  return {
    userId: ANONYMOUS_USER_ID,
    loginId: "anonymous@localhost",
    name: "Anonymous User (Observer)",
    tenant: "dev-tenant",
    roles: [ANONYMOUS_ROLE],
    permissions,
    scopes: [...permissions],
    authMethod: "anonymous",
    rawClaims: {},
  };
}

export function buildPrincipalFromClaims(
  claims: Claims,
  policyTable: PolicyTable,
  options: { sessionToken?: string; refreshToken?: string; claimRules?: ClaimExtractorRules },
): Principal {
  const identity = extractIdentity(claims, options.claimRules ?? DEFAULT_CLAIM_RULES);

  if (!identity.userId) {
    throw new AuthenticationError("Session claims did not identify a user");
  }

  const direct = mergeGrantedScopes(identity.permissions, identity.scopes, policyTable);

  // Some providers emit roles without flattened permissions.
  const permissions =
    direct.length === 0 && identity.roles.length > 0 ? policyTable.expand(identity.roles) : direct;

  return {
    userId: identity.userId,
    loginId: identity.loginId,
    email: identity.email,
    name: identity.name,
    tenant: identity.tenant,
    roles: identity.roles,
    permissions,
    scopes: [...permissions],
    token: options.sessionToken,
    refreshToken: options.refreshToken,
    authMethod: "session",
    rawClaims: stringifyClaims(claims),
  };
}

/** Scope values only count when they name a permission; `openid` and the like are dropped. */
function mergeGrantedScopes(permissions: string[], scopes: string[], policyTable: PolicyTable): string[] {
  const known = policyTable.knownPermissions();
  for (const permission of [...Object.values(PERMISSIONS), ...ADMIN_WILDCARDS]) {
    known.add(permission);
  }

  return [...new Set([...permissions, ...scopes.filter((scope) => known.has(scope))])];
}

function toAuthenticationError(error: unknown): AuthenticationError {
  if (error instanceof AuthenticationError) {
    return error;
  }

  if (error instanceof AuthVerificationError) {
    return new AuthenticationError(`Session validation failed: ${error.message}`);
  }

  return new AuthenticationError("Session validation failed");
}
