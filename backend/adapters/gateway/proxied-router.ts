import type { Logger } from "pino";
import type { z } from "zod";

import { GatewayError } from "@/backend/application/errors";
import { requiredPermissionsFor } from "@/backend/domain/operations";
import type { PolicyTable } from "@/backend/domain/policy-table";
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

import { buildPrincipalFromClaims } from "@/backend/adapters/auth/claims-principal-resolver";
import {
  authenticateResultSchema,
  logsPayloadSchema,
  metricsPayloadSchema,
  parseDeployResult,
  parseRollbackResult,
  toLogsResult,
  toMetricsResult,
} from "@/backend/adapters/gateway/gateway-results";
import type { McpGatewayTransport } from "@/backend/adapters/gateway/mcp-gateway-transport";
import type { PlaceholderTelemetry } from "@/backend/adapters/gateway/placeholder-telemetry";
import type { ReadResultCache } from "@/backend/adapters/gateway/read-result-cache";

export const GATEWAY_TOOLS = {
  logs: "getMcpResourcesLogs",
  metrics: "getMcpResourcesMetrics",
  deploy: "postMcpToolsDeployService",
  rollback: "postMcpToolsRollbackDeployment",
  authenticate: "authenticate_user",
} as const;

export type ReadStrategy = "optimistic" | "synchronous";

export interface ProxiedRouterDeps {
  transport: McpGatewayTransport;
  permissions: PermissionEngine;
  /** Serves writes the gateway could not complete. */
  fallback: GatewayRouter;
  readCache: ReadResultCache;
  placeholders: PlaceholderTelemetry;
  policyTable: PolicyTable;
  readStrategy: ReadStrategy;
}

/**
 * Sends every operation through the audit gateway as an MCP tool call.
 * Authorization always happens locally first, so a denied caller never
 * reaches the gateway.
 */
export class ProxiedRouter implements GatewayRouter {
  readonly mode = "proxied";

  constructor(
    private readonly deps: ProxiedRouterDeps,
    private readonly logger: Logger,
  ) {}

  async getLogs(ctx: GatewayCallContext, principal: Principal, request: LogsRequest): Promise<LogsResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("logs.read"));

    const fetchReal = async (): Promise<LogsResult> => {
      const raw = await this.deps.transport.callTool(
        ctx,
        GATEWAY_TOOLS.logs,
        compact({ level: request.level, limit: request.limit, since: request.since }),
      );
      return toLogsResult(request, parsePayload(logsPayloadSchema, raw, "logs").data);
    };

    if (this.deps.readStrategy === "synchronous") {
      return fetchReal();
    }

    const readId = this.deps.readCache.open(principal.userId);
    this.startBackgroundRead(ctx, readId, GATEWAY_TOOLS.logs, fetchReal);
    return this.deps.placeholders.logs(request, readId);
  }

  async getMetrics(ctx: GatewayCallContext, principal: Principal, request: MetricsRequest): Promise<MetricsResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("metrics.read"));

    const fetchReal = async (): Promise<MetricsResult> => {
      const raw = await this.deps.transport.callTool(
        ctx,
        GATEWAY_TOOLS.metrics,
        compact({ limit: request.limit, service: request.service }),
      );
      return toMetricsResult(request, parsePayload(metricsPayloadSchema, raw, "metrics").data);
    };

    if (this.deps.readStrategy === "synchronous") {
      return fetchReal();
    }

    const readId = this.deps.readCache.open(principal.userId);
    this.startBackgroundRead(ctx, readId, GATEWAY_TOOLS.metrics, fetchReal);
    return this.deps.placeholders.metrics(request, readId);
  }

  async deploy(ctx: GatewayCallContext, principal: Principal, request: DeployRequest): Promise<DeployResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("deploy", request.environment));

    return this.withFallback(
      ctx,
      GATEWAY_TOOLS.deploy,
      async () =>
        parseDeployResult(
          await this.deps.transport.callTool(ctx, GATEWAY_TOOLS.deploy, {
            service_name: request.serviceName,
            version: request.version,
            environment: request.environment,
          }),
        ),
      () => this.deps.fallback.deploy(ctx, principal, request),
    );
  }

  async rollback(ctx: GatewayCallContext, principal: Principal, request: RollbackRequest): Promise<RollbackResult> {
    await this.deps.permissions.requirePermission(principal, requiredPermissionsFor("rollback", request.environment));

    return this.withFallback(
      ctx,
      GATEWAY_TOOLS.rollback,
      async () =>
        parseRollbackResult(
          await this.deps.transport.callTool(ctx, GATEWAY_TOOLS.rollback, {
            deployment_id: request.deploymentId,
            reason: request.reason,
            environment: request.environment,
          }),
        ),
      () => this.deps.fallback.rollback(ctx, principal, request),
    );
  }

  async authenticate(ctx: GatewayCallContext, sessionToken: string, refreshToken?: string): Promise<Principal> {
    return this.withFallback(
      ctx,
      GATEWAY_TOOLS.authenticate,
      async () => {
        const raw = await this.deps.transport.callTool(
          ctx,
          GATEWAY_TOOLS.authenticate,
          compact({ session_token: sessionToken, refresh_token: refreshToken }),
        );
        const parsed = authenticateResultSchema.safeParse(raw);
        if (!parsed.success) {
          return null;
        }

        return buildPrincipalFromClaims(parsed.data.result, this.deps.policyTable, { sessionToken, refreshToken });
      },
      () => this.deps.fallback.authenticate(ctx, sessionToken, refreshToken),
    );
  }

  private async withFallback<T>(
    ctx: GatewayCallContext,
    tool: string,
    viaGateway: () => Promise<T | null>,
    direct: () => Promise<T>,
  ): Promise<T> {
    try {
      const result = await viaGateway();
      if (result !== null) {
        return result;
      }

      this.logger.warn({ tool, requestId: ctx.requestId }, "gateway returned an unexpected result, using direct router");
    } catch (error) {
      this.logger.warn({ err: error, tool, requestId: ctx.requestId }, "gateway call failed, using direct router");
    }

    return direct();
  }

  private startBackgroundRead(
    ctx: GatewayCallContext,
    readId: string,
    tool: string,
    fetchReal: () => Promise<LogsResult | MetricsResult>,
  ): void {
    void (async () => {
      try {
        this.deps.readCache.complete(readId, await fetchReal());
        this.logger.debug({ tool, readId, requestId: ctx.requestId }, "background gateway read completed");
      } catch (error) {
        this.deps.readCache.fail(readId, error);
        this.logger.warn({ err: error, tool, readId, requestId: ctx.requestId }, "background gateway read failed");
      }
    })();
  }
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new GatewayError(`Gateway returned an invalid ${label} payload`);
  }

  return parsed.data;
}

function compact(values: Record<string, string | number | undefined>): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
