import type { z } from "zod";

import { parseEnvironment } from "@/backend/domain/operations";
import type {
  DeployRequest,
  LogsRequest,
  MetricsRequest,
  RollbackRequest,
} from "@/backend/ports/gateway-router";

import type {
  deployBodySchema,
  logsQuerySchema,
  metricsQuerySchema,
  rollbackBodySchema,
} from "@/backend/transport/rest/schemas";

export function toLogsRequest(query: z.output<typeof logsQuerySchema>): LogsRequest {
  return { level: query.level, limit: query.limit, since: query.since };
}

export function toMetricsRequest(query: z.output<typeof metricsQuerySchema>): MetricsRequest {
  return { limit: query.limit, service: query.service };
}

export function toDeployRequest(body: z.output<typeof deployBodySchema>): DeployRequest {
  return {
    serviceName: body.service_name,
    version: body.version,
    environment: parseEnvironment(body.environment),
  };
}

export function toRollbackRequest(body: z.output<typeof rollbackBodySchema>): RollbackRequest {
  return {
    deploymentId: body.deployment_id,
    reason: body.reason,
    environment: parseEnvironment(body.environment),
  };
}
