import type { Environment } from "@/backend/domain/operations";
import type {
  DeploymentReport,
  LogLevel,
  LogRecord,
  MetricRecord,
  RollbackReport,
} from "@/backend/domain/devops";

export interface LogQuery {
  level?: LogLevel;
  limit: number;
  since?: string;
}

export interface MetricQuery {
  limit: number;
  service?: string;
}

export interface LogsSource {
  readonly kind: string;
  fetchLogs(query: LogQuery): Promise<LogRecord[]>;
}

export interface MetricsSource {
  readonly kind: string;
  fetchMetrics(query: MetricQuery): Promise<MetricRecord[]>;
}

export interface DeploymentPipeline {
  deploy(input: { serviceName: string; version: string; environment: Environment }): Promise<DeploymentReport>;
}

export interface RollbackExecutor {
  rollback(input: { deploymentId: string; reason: string; environment: Environment }): Promise<RollbackReport>;
}
