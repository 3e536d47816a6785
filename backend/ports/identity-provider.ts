import type { MatchMode } from "@/backend/domain/operations";

export type Claims = Record<string, unknown>;

export interface ValidatedSession {
  claims: Claims;
  sessionToken: string;
  refreshToken?: string;
}

export type DelegatedCheckKind = "role" | "permission";

export interface DelegatedCheckResult {
  allowed: boolean;
  matched: string[];
}

export interface IdentityProvider {
  /** Rejects with `AuthVerificationError`; code `token_expired` marks a refreshable session. */
  validate(sessionToken: string): Promise<ValidatedSession>;
  refresh(refreshToken: string): Promise<ValidatedSession>;
  logout(refreshToken: string): Promise<boolean>;
  delegatedCheck(
    rawClaims: Record<string, string>,
    required: string[],
    kind: DelegatedCheckKind,
    mode: MatchMode,
  ): Promise<DelegatedCheckResult>;
}
