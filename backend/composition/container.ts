import type { JWTVerifyGetKey } from "jose";
import type { Logger } from "pino";

import { GetLogsUseCase } from "@/backend/application/use-cases/get-logs";
import { GetMetricsUseCase } from "@/backend/application/use-cases/get-metrics";
import { DeployServiceUseCase } from "@/backend/application/use-cases/deploy-service";
import { RollbackDeploymentUseCase } from "@/backend/application/use-cases/rollback-deployment";
import { ClaimsPrincipalResolver } from "@/backend/adapters/auth/claims-principal-resolver";
import { OidcIdentityProvider } from "@/backend/adapters/auth/oidc-identity-provider";
import { PolicyPermissionEngine } from "@/backend/adapters/authorization/policy-permission-engine";
import { DirectRouter } from "@/backend/adapters/gateway/direct-router";
import { McpGatewayTransport } from "@/backend/adapters/gateway/mcp-gateway-transport";
import { PlaceholderTelemetry } from "@/backend/adapters/gateway/placeholder-telemetry";
import { ProxiedRouter } from "@/backend/adapters/gateway/proxied-router";
import { ReadResultCache } from "@/backend/adapters/gateway/read-result-cache";
import { RouterFactory } from "@/backend/adapters/gateway/router-factory";
import { DatadogClient } from "@/backend/adapters/telemetry/datadog/datadog-client";
import { DatadogLogsSource } from "@/backend/adapters/telemetry/datadog/datadog-logs-source";
import { DatadogMetricsSource } from "@/backend/adapters/telemetry/datadog/datadog-metrics-source";
import { SampleTelemetryGenerator } from "@/backend/adapters/telemetry/simulated/sample-telemetry";
import {
  SimulatedDeploymentPipeline,
  SimulatedRollbackExecutor,
} from "@/backend/adapters/telemetry/simulated/simulated-deployment-pipeline";
import {
  SimulatedLogsSource,
  SimulatedMetricsSource,
} from "@/backend/adapters/telemetry/simulated/simulated-telemetry-sources";
import type { GatewayRouter } from "@/backend/ports/gateway-router";
import type { IdentityProvider } from "@/backend/ports/identity-provider";
import type { PermissionEngine } from "@/backend/ports/permission-checker";
import type { PrincipalResolver } from "@/backend/ports/principal-resolver";
import type {
  DeploymentPipeline,
  LogsSource,
  MetricsSource,
  RollbackExecutor,
} from "@/backend/ports/telemetry";

import type { BackendConfig } from "@/backend/composition/config";
import { createLogger } from "@/backend/composition/logger";

const CLIENT_VERSION = "0.1.0";

export interface ApplicationContainer {
  config: BackendConfig;
  logger: Logger;
  identityProvider: IdentityProvider;
  principalResolver: PrincipalResolver;
  permissionEngine: PermissionEngine;
  telemetry: {
    logs: LogsSource;
    metrics: MetricsSource;
    pipeline: DeploymentPipeline;
    rollbacks: RollbackExecutor;
  };
  useCases: {
    getLogs: GetLogsUseCase;
    getMetrics: GetMetricsUseCase;
    deployService: DeployServiceUseCase;
    rollbackDeployment: RollbackDeploymentUseCase;
  };
  /** Serves gateway-originated tool calls and proxied write fallbacks. */
  directRouter: GatewayRouter;
  /** Null unless the proxied gateway is configured. */
  gatewayTransport: McpGatewayTransport | null;
  readCache: ReadResultCache;
  routerFactory: RouterFactory;
}

/** Seams for tests and alternative deployments. */
export interface ContainerOverrides {
  logger?: Logger;
  fetch?: typeof fetch;
  keySet?: JWTVerifyGetKey;
  identityProvider?: IdentityProvider;
  random?: () => number;
  telemetry?: Partial<ApplicationContainer["telemetry"]>;
}

export function createApplicationContainer(
  config: BackendConfig,
  overrides: ContainerOverrides = {},
): ApplicationContainer {
  const logger = overrides.logger ?? createLogger(config);
  const policyTable = config.auth.policyTable;

  const identityProvider =
    overrides.identityProvider ??
    new OidcIdentityProvider(config.idp, logger.child({ component: "identity-provider" }), {
      keySet: overrides.keySet,
      fetch: overrides.fetch,
    });

  const principalResolver = new ClaimsPrincipalResolver(
    identityProvider,
    policyTable,
    { allowAnonymous: config.auth.allowAnonymous },
    logger.child({ component: "principal-resolver" }),
  );

  const permissionEngine = new PolicyPermissionEngine(
    identityProvider,
    logger.child({ component: "permission-engine" }),
  );

  const generator = new SampleTelemetryGenerator({ random: overrides.random });
  const telemetry = {
    ...createTelemetrySources(config, generator, logger, overrides.fetch),
    pipeline: new SimulatedDeploymentPipeline({ random: overrides.random }),
    rollbacks: new SimulatedRollbackExecutor(),
    ...overrides.telemetry,
  };

  const useCases = {
    getLogs: new GetLogsUseCase(telemetry.logs),
    getMetrics: new GetMetricsUseCase(telemetry.metrics),
    deployService: new DeployServiceUseCase(telemetry.pipeline),
    rollbackDeployment: new RollbackDeploymentUseCase(telemetry.rollbacks),
  };

  const readCache = new ReadResultCache({ ttlMs: config.gateway.readResultTtlSeconds * 1000 });

  const gatewayTransport =
    config.gateway.enabled && config.gateway.url
      ? new McpGatewayTransport(
          {
            url: config.gateway.url,
            protocolVersion: config.gateway.protocolVersion,
            timeoutMs: config.gateway.timeoutMs,
            clientName: config.server.serviceName,
            clientVersion: CLIENT_VERSION,
          },
          logger.child({ component: "gateway-transport" }),
          overrides.fetch,
        )
      : null;

  const directRouter = new DirectRouter(
    {
      permissions: permissionEngine,
      principals: principalResolver,
      ...useCases,
    },
    logger.child({ component: "direct-router" }),
  );

  const routerFactory = new RouterFactory(
    { gatewayEnabled: config.gateway.enabled, gatewayUrl: config.gateway.url },
    () => directRouter,
    () => {
      if (!gatewayTransport) {
        throw new Error("Gateway transport is not configured");
      }

      return new ProxiedRouter(
        {
          transport: gatewayTransport,
          permissions: permissionEngine,
          fallback: directRouter,
          readCache,
          placeholders: new PlaceholderTelemetry(generator),
          policyTable,
          readStrategy: config.gateway.readStrategy,
        },
        logger.child({ component: "proxied-router" }),
      );
    },
    logger.child({ component: "router-factory" }),
  );

  return {
    config,
    logger,
    identityProvider,
    principalResolver,
    permissionEngine,
    telemetry,
    useCases,
    directRouter,
    gatewayTransport,
    readCache,
    routerFactory,
  };
}

function createTelemetrySources(
  config: BackendConfig,
  generator: SampleTelemetryGenerator,
  logger: Logger,
  fetchImpl: typeof fetch | undefined,
): { logs: LogsSource; metrics: MetricsSource } {
  const simulatedLogs = new SimulatedLogsSource(generator);
  const simulatedMetrics = new SimulatedMetricsSource(generator);

  const { apiKey, appKey } = config.datadog;
  if (!apiKey || !appKey) {
    logger.info("datadog keys not configured, serving sample telemetry");
    return { logs: simulatedLogs, metrics: simulatedMetrics };
  }

  const client = new DatadogClient(
    {
      apiKey,
      appKey,
      site: config.datadog.site,
      serviceName: config.datadog.serviceName,
      timeoutMs: config.datadog.timeoutMs,
    },
    logger.child({ component: "datadog" }),
    fetchImpl,
  );

  return {
    logs: new DatadogLogsSource(client, simulatedLogs, logger.child({ component: "datadog-logs" })),
    metrics: new DatadogMetricsSource(
      client,
      simulatedMetrics,
      { metricNames: config.datadog.metricQueries, unitFor: (name) => generator.unitFor(name) },
      logger.child({ component: "datadog-metrics" }),
    ),
  };
}
