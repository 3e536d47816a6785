export type AuthVerificationErrorCode =
  | "auth_not_configured"
  | "invalid_token"
  | "invalid_claims"
  | "invalid_signature"
  | "unknown_issuer"
  | "token_expired"
  | "refresh_failed"
  | "logout_failed"
  | "provider_unavailable";

export class AuthVerificationError extends Error {
  constructor(
    public readonly code: AuthVerificationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AuthVerificationError";
  }
}
