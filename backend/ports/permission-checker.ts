import type { MatchMode, PermissionRequirement } from "@/backend/domain/operations";
import type { Principal } from "@/backend/domain/principal";

export interface PermissionEngine {
  /** Never rejects; a failed delegated check counts as a denial. */
  authorize(principal: Principal, required: Iterable<string>, mode: MatchMode): Promise<boolean>;
  /** Throws `PermissionError` when `authorize` denies the requirement. */
  requirePermission(principal: Principal, requirement: PermissionRequirement): Promise<void>;
}
