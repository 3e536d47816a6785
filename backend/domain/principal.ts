export type AuthMethod = "anonymous" | "session";

export interface Principal {
  userId: string;
  loginId?: string;
  email?: string;
  name?: string;
  tenant?: string;
  roles: string[];
  permissions: string[];
  /** Legacy alias of `permissions`. */
  scopes: string[];
  token?: string;
  refreshToken?: string;
  authMethod: AuthMethod;
  rawClaims: Record<string, string>;
}

export const ANONYMOUS_USER_ID = "anonymous";

export interface PrincipalSummary {
  user_id: string;
  login_id: string | null;
  name: string | null;
  email: string | null;
  tenant: string | null;
  roles: string[];
  permissions: string[];
}

export function toPrincipalSummary(principal: Principal): PrincipalSummary {
  return {
    user_id: principal.userId,
    login_id: principal.loginId ?? null,
    name: principal.name ?? null,
    email: principal.email ?? null,
    tenant: principal.tenant ?? null,
    roles: principal.roles,
    permissions: principal.permissions,
  };
}
