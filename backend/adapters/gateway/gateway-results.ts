import { z } from "zod";

import { normalizeLogLevel, type LogRecord, type MetricRecord } from "@/backend/domain/devops";
import { ENVIRONMENTS } from "@/backend/domain/operations";
import type {
  DeployResult,
  LogsRequest,
  LogsResult,
  MetricsRequest,
  MetricsResult,
  RollbackResult,
} from "@/backend/ports/gateway-router";

const statusSchema = z.enum(["SUCCESS", "FAILED", "IN_PROGRESS"]);
const environmentSchema = z.enum(ENVIRONMENTS);

const logRecordSchema = z.object({
  level: z.string().transform((level) => normalizeLogLevel(level)),
  message: z.string(),
  timestamp: z.string(),
  source: z.string().default("system"),
});

const metricRecordSchema = z.object({
  name: z.string(),
  value: z.number(),
  unit: z.string(),
  timestamp: z.string(),
  service: z.string().optional(),
});

export const logsPayloadSchema = z.object({ data: z.array(logRecordSchema) });
export const metricsPayloadSchema = z.object({ data: z.array(metricRecordSchema) });

const deploymentReportSchema = z.object({
  success: z.boolean(),
  deployment: z.object({
    deploymentId: z.string(),
    serviceName: z.string(),
    version: z.string(),
    environment: environmentSchema,
    status: statusSchema,
    timestamp: z.string(),
  }),
  message: z.string(),
  metadata: z.object({
    deploymentId: z.string(),
    timestamp: z.string(),
    environment: environmentSchema,
    serviceType: z.enum(["test", "critical", "experimental", "standard"]),
  }),
});

const rollbackReportSchema = z.object({
  success: z.boolean(),
  rollback: z.object({
    rollbackId: z.string(),
    deploymentId: z.string(),
    status: statusSchema,
    reason: z.string(),
    environment: environmentSchema,
    timestamp: z.string(),
  }),
  message: z.string(),
  metadata: z.object({
    rollbackId: z.string(),
    deploymentId: z.string(),
    timestamp: z.string(),
    environment: environmentSchema,
  }),
});

export const deployResultSchema = z.object({
  tool: z.literal("deploy_service").default("deploy_service"),
  success: z.boolean(),
  result: deploymentReportSchema,
});

export const rollbackResultSchema = z.object({
  tool: z.literal("rollback_deployment").default("rollback_deployment"),
  success: z.boolean(),
  result: rollbackReportSchema,
});

export const authenticateResultSchema = z.object({
  success: z.literal(true),
  result: z
    .object({
      user_id: z.string().min(1),
      login_id: z.string().nullish(),
      name: z.string().nullish(),
      email: z.string().nullish(),
      tenant: z.string().nullish(),
      roles: z.array(z.string()).default([]),
      permissions: z.array(z.string()).default([]),
    })
    .passthrough(),
});

export function toLogsResult(request: LogsRequest, data: LogRecord[]): LogsResult {
  return {
    uri: "logs",
    type: "logs",
    count: data.length,
    filters: { level: request.level ?? null, limit: request.limit, since: request.since ?? null },
    data,
  };
}

export function toMetricsResult(request: MetricsRequest, data: MetricRecord[]): MetricsResult {
  return {
    uri: "metrics",
    type: "metrics",
    count: data.length,
    filters: { limit: request.limit, service: request.service ?? null },
    data,
  };
}

export function parseDeployResult(value: unknown): DeployResult | null {
  const parsed = deployResultSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function parseRollbackResult(value: unknown): RollbackResult | null {
  const parsed = rollbackResultSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
