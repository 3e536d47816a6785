import type { Logger } from "pino";

import { PermissionError } from "@/backend/application/errors";
import { ADMIN_WILDCARDS, type MatchMode, type PermissionRequirement } from "@/backend/domain/operations";
import type { Principal } from "@/backend/domain/principal";
import type { IdentityProvider } from "@/backend/ports/identity-provider";
import type { PermissionEngine } from "@/backend/ports/permission-checker";

export class PolicyPermissionEngine implements PermissionEngine {
  constructor(
    private readonly identityProvider: IdentityProvider,
    private readonly logger: Logger,
  ) {}

  async authorize(principal: Principal, required: Iterable<string>, mode: MatchMode): Promise<boolean> {
    const requiredSet = new Set(required);

    if (matchesLocally(principal.permissions, requiredSet, mode)) {
      return true;
    }

    if (principal.authMethod !== "session" || Object.keys(principal.rawClaims).length === 0) {
      return false;
    }

    try {
      const delegated = await this.identityProvider.delegatedCheck(
        principal.rawClaims,
        [...requiredSet],
        "permission",
        mode,
      );

      if (delegated.allowed) {
        this.logger.info(
          { userId: principal.userId, matched: delegated.matched },
          "permission granted by delegated check",
        );
      }

      return delegated.allowed;
    } catch (error) {
      this.logger.warn({ err: error, userId: principal.userId }, "delegated permission check failed");
      return false;
    }
  }

  async requirePermission(principal: Principal, requirement: PermissionRequirement): Promise<void> {
    const allowed = await this.authorize(principal, requirement.permissions, requirement.mode);

    if (!allowed) {
      throw new PermissionError(`Insufficient permissions to ${requirement.description}`);
    }
  }
}

export function matchesLocally(effective: Iterable<string>, required: ReadonlySet<string>, mode: MatchMode): boolean {
  const effectiveSet = new Set(effective);

  for (const permission of effectiveSet) {
    if (ADMIN_WILDCARDS.has(permission)) {
      return true;
    }
  }

  if (mode === "any") {
    for (const permission of required) {
      if (effectiveSet.has(permission)) {
        return true;
      }
    }
    return false;
  }

  for (const permission of required) {
    if (!effectiveSet.has(permission)) {
      return false;
    }
  }
  return true;
}
