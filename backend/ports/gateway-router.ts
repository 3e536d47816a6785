import type {
  DeploymentReport,
  LogLevel,
  LogRecord,
  MetricRecord,
  RollbackReport,
} from "@/backend/domain/devops";
import type { Environment } from "@/backend/domain/operations";
import type { Principal } from "@/backend/domain/principal";

export type RouterMode = "direct" | "proxied";

/** Per-request data a router may forward upstream. */
export interface GatewayCallContext {
  requestId: string;
  authorization?: string;
  cookie?: string;
}

export interface LogsRequest {
  level?: LogLevel;
  limit: number;
  since?: string;
}

export interface MetricsRequest {
  limit: number;
  service?: string;
}

export interface DeployRequest {
  serviceName: string;
  version: string;
  environment: Environment;
}

export interface RollbackRequest {
  deploymentId: string;
  reason: string;
  environment: Environment;
}

interface ReadResultBase {
  count: number;
  /** Present only on optimistic placeholder responses. */
  loading?: true;
  message?: string;
  /** Poll `/api/v1/reads/:readId` for the real result of an optimistic read. */
  readId?: string;
}

export interface LogsResult extends ReadResultBase {
  uri: "logs";
  type: "logs";
  filters: { level: LogLevel | null; limit: number; since: string | null };
  data: LogRecord[];
}

export interface MetricsResult extends ReadResultBase {
  uri: "metrics";
  type: "metrics";
  filters: { limit: number; service: string | null };
  data: MetricRecord[];
}

export interface DeployResult {
  tool: "deploy_service";
  success: boolean;
  result: DeploymentReport;
}

export interface RollbackResult {
  tool: "rollback_deployment";
  success: boolean;
  result: RollbackReport;
}

export interface GatewayRouter {
  readonly mode: RouterMode;
  getLogs(ctx: GatewayCallContext, principal: Principal, request: LogsRequest): Promise<LogsResult>;
  getMetrics(ctx: GatewayCallContext, principal: Principal, request: MetricsRequest): Promise<MetricsResult>;
  deploy(ctx: GatewayCallContext, principal: Principal, request: DeployRequest): Promise<DeployResult>;
  rollback(ctx: GatewayCallContext, principal: Principal, request: RollbackRequest): Promise<RollbackResult>;
  authenticate(ctx: GatewayCallContext, sessionToken: string, refreshToken?: string): Promise<Principal>;
}
