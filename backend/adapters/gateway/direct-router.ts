import type { Logger } from "pino";

import { InternalError, isClientFacingError } from "@/backend/application/errors";
import type { GetLogsUseCase } from "@/backend/application/use-cases/get-logs";
import type { GetMetricsUseCase } from "@/backend/application/use-cases/get-metrics";
import type { DeployServiceUseCase } from "@/backend/application/use-cases/deploy-service";
import type { RollbackDeploymentUseCase } from "@/backend/application/use-cases/rollback-deployment";
import { requiredPermissionsFor } from "@/backend/domain/operations";
import type { Principal } from "@/backend/domain/principal";
import type {
  DeployRequest,
  DeployResult,
  GatewayCallContext,
  GatewayRouter,
  LogsRequest,
  LogsResult,
  MetricsRequest,
  MetricsResult,
  RollbackRequest,
  RollbackResult,
} from "@/backend/ports/gateway-router";
import type { PermissionEngine } from "@/backend/ports/permission-checker";
import type { PrincipalResolver } from "@/backend/ports/principal-resolver";

import { toLogsResult, toMetricsResult } from "@/backend/adapters/gateway/gateway-results";

export interface DirectRouterDeps {
  permissions: PermissionEngine;
  principals: PrincipalResolver;
  getLogs: GetLogsUseCase;
  getMetrics: GetMetricsUseCase;
  deployService: DeployServiceUseCase;
  rollbackDeployment: RollbackDeploymentUseCase;
}

/** Runs every operation in process against the configured telemetry and CI adapters. */
export class DirectRouter implements GatewayRouter {
  readonly mode = "direct";

  constructor(
    private readonly deps: DirectRouterDeps,
    private readonly logger: Logger,
  ) {}

  async getLogs(ctx: GatewayCallContext, principal: Principal, request: LogsRequest): Promise<LogsResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("logs.read"));

    const data = await this.run(ctx, "read logs", () => this.deps.getLogs.execute(request));
    return toLogsResult(request, data);
  }

  async getMetrics(ctx: GatewayCallContext, principal: Principal, request: MetricsRequest): Promise<MetricsResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("metrics.read"));

    const data = await this.run(ctx, "read metrics", () => this.deps.getMetrics.execute(request));
    return toMetricsResult(request, data);
  }

  async deploy(ctx: GatewayCallContext, principal: Principal, request: DeployRequest): Promise<DeployResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("deploy", request.environment));

    const report = await this.run(ctx, "deploy service", () => this.deps.deployService.execute(request));
    return { tool: "deploy_service", success: report.success, result: report };
  }

  async rollback(ctx: GatewayCallContext, principal: Principal, request: RollbackRequest): Promise<RollbackResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("rollback", request.environment));

    const report = await this.run(ctx, "roll back deployment", () => this.deps.rollbackDeployment.execute(request));
    return { tool: "rollback_deployment", success: report.success, result: report };
  }

  async authenticate(_ctx: GatewayCallContext, sessionToken: string, refreshToken?: string): Promise<Principal> {
    return this.deps.principals.resolve(sessionToken, refreshToken);
  }

  private async run<T>(ctx: GatewayCallContext, operation: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (isClientFacingError(error)) {
        throw error;
      }

      this.logger.error({ err: error, operation, requestId: ctx.requestId }, "direct operation failed");
      throw new InternalError(`Failed to ${operation}`, { cause: error });
    }
  }
}
