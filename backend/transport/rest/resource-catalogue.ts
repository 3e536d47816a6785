import { LOG_LEVELS } from "@/backend/domain/devops";
import { PERMISSIONS, type Permission } from "@/backend/domain/operations";

export interface ResourceFilter {
  type: "string" | "integer" | "datetime" | "enum";
  description: string;
  values?: readonly string[];
  min?: number;
  max?: number;
  default?: number;
}

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType: "application/json";
  /** Read endpoint serving the resource. */
  path: string;
  permission: Permission;
  filters: Record<string, ResourceFilter>;
}

export const RESOURCE_CATALOGUE: readonly ResourceDescriptor[] = [
  {
    uri: "logs",
    name: "System Logs",
    description: "Application and system logs, filterable by level and time",
    mimeType: "application/json",
    path: "/api/v1/logs",
    permission: PERMISSIONS.readLogs,
    filters: {
      level: { type: "enum", values: LOG_LEVELS, description: "Only entries of this level" },
      since: { type: "datetime", description: "ISO-8601 lower bound on the entry timestamp" },
      limit: { type: "integer", min: 1, max: 1000, default: 100, description: "Maximum number of entries" },
    },
  },
  {
    uri: "metrics",
    name: "System Metrics",
    description: "Performance and health metrics, filterable by service",
    mimeType: "application/json",
    path: "/api/v1/metrics",
    permission: PERMISSIONS.readMetrics,
    filters: {
      service: { type: "string", description: "Only metrics reported by this service" },
      limit: { type: "integer", min: 1, max: 1000, default: 50, description: "Maximum number of metrics" },
    },
  },
];
