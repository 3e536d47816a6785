import { vi } from "vitest";

import { GetLogsUseCase } from "@/backend/application/use-cases/get-logs";
import { GetMetricsUseCase } from "@/backend/application/use-cases/get-metrics";
import { DeployServiceUseCase } from "@/backend/application/use-cases/deploy-service";
import { RollbackDeploymentUseCase } from "@/backend/application/use-cases/rollback-deployment";
import { PolicyTable } from "@/backend/domain/policy-table";
import type { Principal } from "@/backend/domain/principal";
import type { GatewayCallContext } from "@/backend/ports/gateway-router";
import type { IdentityProvider } from "@/backend/ports/identity-provider";
import type { PrincipalResolver } from "@/backend/ports/principal-resolver";
import type { LogsSource } from "@/backend/ports/telemetry";
import { createSilentLogger } from "@/backend/composition/logger";

import { PolicyPermissionEngine } from "@/backend/adapters/authorization/policy-permission-engine";
import { DirectRouter } from "@/backend/adapters/gateway/direct-router";
import { SampleTelemetryGenerator } from "@/backend/adapters/telemetry/simulated/sample-telemetry";
import {
  SimulatedDeploymentPipeline,
  SimulatedRollbackExecutor,
} from "@/backend/adapters/telemetry/simulated/simulated-deployment-pipeline";
import {
  SimulatedLogsSource,
  SimulatedMetricsSource,
} from "@/backend/adapters/telemetry/simulated/simulated-telemetry-sources";

export const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

export const callContext: GatewayCallContext = {
  requestId: "req-test",
  authorization: "Bearer test-session",
};

export function principalWithRoles(roles: string[], overrides: Partial<Principal> = {}): Principal {
  const permissions = PolicyTable.default().expand(roles);

  return {
    userId: `user-${roles.join("-") || "none"}`,
    roles,
    permissions,
    scopes: [...permissions],
    authMethod: "session",
    rawClaims: {},
    ...overrides,
  };
}

export function createStubIdentityProvider(): IdentityProvider {
  return {
    validate: vi.fn(async (sessionToken: string) => ({ claims: { sub: "user-1" }, sessionToken })),
    refresh: vi.fn(async (): Promise<never> => {
      throw new Error("refresh is not expected here");
    }),
    logout: vi.fn(async () => true),
    delegatedCheck: vi.fn(async () => ({ allowed: false, matched: [] })),
  };
}

export function createStubPrincipalResolver(principal: Principal): PrincipalResolver {
  return {
    resolve: vi.fn(async () => principal),
    logout: vi.fn(async () => true),
  };
}

export function createDirectRouter(options: { logs?: LogsSource; principal?: Principal; random?: () => number } = {}) {
  const random = options.random ?? (() => 0);
  let nextId = 0;
  const generateId = () => `id-${++nextId}`;
  const now = () => FIXED_NOW;
  const generator = new SampleTelemetryGenerator({ random, now });

  const permissions = new PolicyPermissionEngine(createStubIdentityProvider(), createSilentLogger());
  const principals = createStubPrincipalResolver(options.principal ?? principalWithRoles(["developer"]));

  const router = new DirectRouter(
    {
      permissions,
      principals,
      getLogs: new GetLogsUseCase(options.logs ?? new SimulatedLogsSource(generator)),
      getMetrics: new GetMetricsUseCase(new SimulatedMetricsSource(generator)),
      deployService: new DeployServiceUseCase(new SimulatedDeploymentPipeline({ random, now, generateId })),
      rollbackDeployment: new RollbackDeploymentUseCase(new SimulatedRollbackExecutor({ now, generateId })),
    },
    createSilentLogger(),
  );

  return { router, permissions, principals, generator };
}
