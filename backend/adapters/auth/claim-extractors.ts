import type { Claims } from "@/backend/ports/identity-provider";

/**
 * Ordered claim paths per principal field. Providers disagree on naming, so
 * each field lists its alternates; the first non-empty value wins.
 * Paths are dot-separated; a `{tenant}` segment is replaced by the resolved tenant id.
 */
export interface ClaimExtractorRules {
  userId: readonly string[];
  loginId: readonly string[];
  email: readonly string[];
  name: readonly string[];
  tenant: readonly string[];
  roles: readonly string[];
  permissions: readonly string[];
  /** OAuth scope strings; mostly protocol scopes such as `openid`, not permissions. */
  scopes: readonly string[];
  tenantRoles: readonly string[];
  tenantPermissions: readonly string[];
}

export const DEFAULT_CLAIM_RULES: ClaimExtractorRules = {
  userId: ["sub", "userId", "user_id", "uid"],
  loginId: ["loginId", "login_id", "email", "preferred_username"],
  email: ["email"],
  name: ["name", "user_name", "given_name"],
  tenant: ["tenant", "tenantId", "tenant_id", "dct"],
  roles: ["roles"],
  permissions: ["permissions"],
  scopes: ["scope", "scp"],
  tenantRoles: ["tenantRoles.{tenant}", "tenants.{tenant}.roles"],
  tenantPermissions: ["tenantPermissions.{tenant}", "tenants.{tenant}.permissions"],
};

export interface ExtractedIdentity {
  userId?: string;
  loginId?: string;
  email?: string;
  name?: string;
  tenant?: string;
  roles: string[];
  permissions: string[];
  scopes: string[];
}

export function extractIdentity(claims: Claims, rules: ClaimExtractorRules = DEFAULT_CLAIM_RULES): ExtractedIdentity {
  const tenant = readFirstString(claims, rules.tenant);

  const roles = readFirstStringList(claims, rules.roles);
  const permissions = readFirstStringList(claims, rules.permissions);

  if (tenant) {
    roles.push(...readAllStringLists(claims, rules.tenantRoles, tenant));
    permissions.push(...readAllStringLists(claims, rules.tenantPermissions, tenant));
  }

  return {
    userId: readFirstString(claims, rules.userId),
    loginId: readFirstString(claims, rules.loginId),
    email: readFirstString(claims, rules.email),
    name: readFirstString(claims, rules.name),
    tenant,
    roles: dedupe(roles),
    permissions: dedupe(permissions),
    scopes: dedupe(readFirstStringList(claims, rules.scopes)),
  };
}

export function readFirstString(claims: Claims, paths: readonly string[], tenant?: string): string | undefined {
  for (const path of paths) {
    const value = readClaim(claims, path, tenant);

    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }

    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }

  return undefined;
}

export function readFirstStringList(claims: Claims, paths: readonly string[], tenant?: string): string[] {
  for (const path of paths) {
    const list = toStringList(readClaim(claims, path, tenant));
    if (list.length > 0) {
      return list;
    }
  }

  return [];
}

function readAllStringLists(claims: Claims, paths: readonly string[], tenant: string): string[] {
  return paths.flatMap((path) => toStringList(readClaim(claims, path, tenant)));
}

export function readClaim(claims: Claims, path: string, tenant?: string): unknown {
  const segments = path.split(".").filter(Boolean);
  let cursor: unknown = claims;

  for (const segment of segments) {
    if (!isRecord(cursor)) {
      return undefined;
    }

    if (segment === "{tenant}") {
      if (!tenant) {
        return undefined;
      }
      cursor = cursor[tenant];
      continue;
    }

    cursor = cursor[segment];
  }

  return cursor;
}

/** Strings stay as-is; everything else is JSON-encoded. */
export function stringifyClaims(claims: Claims): Record<string, string> {
  const stringified: Record<string, string> = {};

  for (const [key, value] of Object.entries(claims)) {
    if (value === undefined) {
      continue;
    }

    stringified[key] = typeof value === "string" ? value : JSON.stringify(value);
  }

  return stringified;
}

/** Inverse of `stringifyClaims` for values that were JSON-encoded arrays or objects. */
export function parseStringifiedClaims(rawClaims: Record<string, string>): Claims {
  const claims: Claims = {};

  for (const [key, value] of Object.entries(rawClaims)) {
    claims[key] = decodeClaimValue(value);
  }

  return claims;
}

function decodeClaimValue(value: string): unknown {
  const trimmed = value.trim();
  if (!trimmed.startsWith("[") && !trimmed.startsWith("{")) {
    return value;
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return value;
  }
}

function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string" && item.trim().length > 0);
  }

  if (typeof value === "string") {
    return value.split(" ").filter(Boolean);
  }

  return [];
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
