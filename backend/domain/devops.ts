import type { Environment } from "@/backend/domain/operations";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type OperationStatus = "SUCCESS" | "FAILED" | "IN_PROGRESS";

export interface LogRecord {
  level: LogLevel;
  message: string;
  timestamp: string;
  source: string;
}

export interface MetricRecord {
  name: string;
  value: number;
  unit: string;
  timestamp: string;
  service?: string;
}

export interface Deployment {
  deploymentId: string;
  serviceName: string;
  version: string;
  environment: Environment;
  status: OperationStatus;
  timestamp: string;
}

export interface RollbackRecord {
  rollbackId: string;
  deploymentId: string;
  status: OperationStatus;
  reason: string;
  environment: Environment;
  timestamp: string;
}

export type ServiceType = "test" | "critical" | "experimental" | "standard";

export interface DeploymentReport {
  success: boolean;
  deployment: Deployment;
  message: string;
  metadata: {
    deploymentId: string;
    timestamp: string;
    environment: Environment;
    serviceType: ServiceType;
  };
}

export interface RollbackReport {
  success: boolean;
  rollback: RollbackRecord;
  message: string;
  metadata: {
    rollbackId: string;
    deploymentId: string;
    timestamp: string;
    environment: Environment;
  };
}

export function isSuccessfulStatus(status: OperationStatus): boolean {
  return status === "SUCCESS" || status === "IN_PROGRESS";
}

export function normalizeLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toUpperCase();

  if (value === "WARNING") {
    return "WARN";
  }

  if (value === "DEBUG" || value === "INFO" || value === "WARN" || value === "ERROR") {
    return value;
  }

  return "INFO";
}
