import { z } from "zod";

import defaultRolePermissions from "@/config/role-permissions.json";

const policyRecordSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export type PolicyRecord = Record<string, readonly string[]>;

/**
 * Immutable role -> permission mapping. Role names are matched
 * case-insensitively so that "Observer" and "observer" share one entry.
 */
export class PolicyTable {
  private readonly entries: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(entries: Map<string, ReadonlySet<string>>) {
    this.entries = entries;
  }

  static fromRecord(record: unknown): PolicyTable {
    const parsed = policyRecordSchema.parse(record);
    const entries = new Map<string, ReadonlySet<string>>();

    for (const [role, permissions] of Object.entries(parsed)) {
      const key = normalizeRoleName(role);
      const existing = entries.get(key) ?? new Set<string>();
      entries.set(key, new Set([...existing, ...permissions]));
    }

    return new PolicyTable(entries);
  }

  static default(): PolicyTable {
    return PolicyTable.fromRecord(defaultRolePermissions);
  }

  hasRole(role: string): boolean {
    return this.entries.has(normalizeRoleName(role));
  }

  permissionsFor(role: string): string[] {
    return [...(this.entries.get(normalizeRoleName(role)) ?? [])];
  }

  expand(roles: Iterable<string>): string[] {
    const permissions = new Set<string>();

    for (const role of roles) {
      for (const permission of this.entries.get(normalizeRoleName(role)) ?? []) {
        permissions.add(permission);
      }
    }

    return [...permissions];
  }

  /** Every permission some role grants. */
  knownPermissions(): Set<string> {
    const known = new Set<string>();

    for (const permissions of this.entries.values()) {
      for (const permission of permissions) {
        known.add(permission);
      }
    }

    return known;
  }

  toRecord(): PolicyRecord {
    return Object.fromEntries([...this.entries].map(([role, permissions]) => [role, [...permissions]]));
  }
}

function normalizeRoleName(role: string): string {
  return role.trim().toLowerCase();
}
