import { ValidationError } from "@/backend/application/errors";

export const PERMISSIONS = {
  readLogs: "read_logs",
  readMetrics: "read_metrics",
  deployStaging: "deploy_staging",
  deployProduction: "deploy_production",
  rollbackStaging: "rollback_staging",
  rollbackProduction: "rollback_production",
} as const;

export type Permission = (typeof PERMISSIONS)[keyof typeof PERMISSIONS];

export const ADMIN_WILDCARDS: ReadonlySet<string> = new Set(["*", "admin:*"]);

export const ENVIRONMENTS = ["staging", "production"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export type Operation = "logs.read" | "metrics.read" | "deploy" | "rollback";

export type MatchMode = "all" | "any";

export interface PermissionRequirement {
  operation: Operation;
  permissions: string[];
  mode: MatchMode;
  description: string;
}

const ENVIRONMENT_PERMISSIONS: Record<"deploy" | "rollback", Record<Environment, Permission>> = {
  deploy: {
    staging: PERMISSIONS.deployStaging,
    production: PERMISSIONS.deployProduction,
  },
  rollback: {
    staging: PERMISSIONS.rollbackStaging,
    production: PERMISSIONS.rollbackProduction,
  },
};

export function isEnvironment(value: unknown): value is Environment {
  return typeof value === "string" && ENVIRONMENTS.some((environment) => environment === value);
}

export function parseEnvironment(value: unknown): Environment {
  if (!isEnvironment(value)) {
    throw new ValidationError("Invalid environment. Must be 'staging' or 'production'");
  }

  return value;
}

export function requiredPermissionsFor(operation: Operation, environment?: unknown): PermissionRequirement {
  switch (operation) {
    case "logs.read":
      return { operation, permissions: [PERMISSIONS.readLogs], mode: "any", description: "read logs" };
    case "metrics.read":
      return { operation, permissions: [PERMISSIONS.readMetrics], mode: "any", description: "read metrics" };
    case "deploy": {
      const target = parseEnvironment(environment);
      return {
        operation,
        permissions: [ENVIRONMENT_PERMISSIONS.deploy[target]],
        mode: "all",
        description: `deploy to ${target}`,
      };
    }
    case "rollback": {
      const target = parseEnvironment(environment);
      return {
        operation,
        permissions: [ENVIRONMENT_PERMISSIONS.rollback[target]],
        mode: "all",
        description: `perform ${target} rollbacks`,
      };
    }
  }
}
