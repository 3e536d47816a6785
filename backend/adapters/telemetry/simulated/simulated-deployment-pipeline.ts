import type {
  DeploymentReport,
  OperationStatus,
  RollbackReport,
  ServiceType,
} from "@/backend/domain/devops";
import type { Environment } from "@/backend/domain/operations";
import type { DeploymentPipeline, RollbackExecutor } from "@/backend/ports/telemetry";

export interface SimulationOptions {
  random?: () => number;
  now?: () => Date;
  generateId?: () => string;
}

type Weighted = ReadonlyArray<readonly [OperationStatus, number]>;

const CRITICAL_PRODUCTION: Weighted = [["SUCCESS", 70], ["FAILED", 30]];
const EXPERIMENTAL: Weighted = [["SUCCESS", 60], ["FAILED", 30], ["IN_PROGRESS", 10]];
const STANDARD: Weighted = [["SUCCESS", 85], ["FAILED", 15]];
const STAGING_RETRY: Weighted = [["SUCCESS", 80], ["IN_PROGRESS", 20]];

export function classifyService(serviceName: string): ServiceType {
  const name = serviceName.toLowerCase();

  if (name.includes("test") || name.includes("demo")) {
    return "test";
  }
  if (name.includes("critical") || name.includes("core")) {
    return "critical";
  }
  if (name.includes("experimental") || name.includes("beta")) {
    return "experimental";
  }
  return "standard";
}

/** Stand-in CI system whose outcome depends on the service name and target environment. */
export class SimulatedDeploymentPipeline implements DeploymentPipeline {
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: SimulationOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  async deploy(input: { serviceName: string; version: string; environment: Environment }): Promise<DeploymentReport> {
    const serviceType = classifyService(input.serviceName);
    const status = this.resolveStatus(serviceType, input.environment);
    const deploymentId = this.generateId();
    const timestamp = this.now().toISOString();

    return {
      success: status !== "FAILED",
      deployment: {
        deploymentId,
        serviceName: input.serviceName,
        version: input.version,
        environment: input.environment,
        status,
        timestamp,
      },
      message: deploymentMessage(status, input.serviceName, input.version, input.environment),
      metadata: {
        deploymentId,
        timestamp,
        environment: input.environment,
        serviceType,
      },
    };
  }

  private resolveStatus(serviceType: ServiceType, environment: Environment): OperationStatus {
    let status: OperationStatus;

    switch (serviceType) {
      case "test":
        status = "SUCCESS";
        break;
      case "critical":
        status = environment === "production" ? this.choose(CRITICAL_PRODUCTION) : "SUCCESS";
        break;
      case "experimental":
        status = this.choose(EXPERIMENTAL);
        break;
      case "standard":
        status = this.choose(STANDARD);
        break;
    }

    if (environment === "production" && status === "IN_PROGRESS") {
      return "SUCCESS";
    }

    if (environment === "staging" && status === "FAILED") {
      return this.choose(STAGING_RETRY);
    }

    return status;
  }

  private choose(options: Weighted): OperationStatus {
    const total = options.reduce((sum, [, weight]) => sum + weight, 0);
    let roll = this.random() * total;

    for (const [status, weight] of options) {
      if (roll < weight) {
        return status;
      }
      roll -= weight;
    }

    return options[options.length - 1]?.[0] ?? "SUCCESS";
  }
}

function deploymentMessage(status: OperationStatus, serviceName: string, version: string, environment: Environment): string {
  switch (status) {
    case "SUCCESS":
      return `Successfully deployed ${serviceName} ${version} to ${environment}`;
    case "FAILED":
      return `Failed to deploy ${serviceName} to ${environment}. Check logs for details.`;
    case "IN_PROGRESS":
      return `Deployment of ${serviceName} to ${environment} is in progress`;
  }
}

export class SimulatedRollbackExecutor implements RollbackExecutor {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: Omit<SimulationOptions, "random"> = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  async rollback(input: { deploymentId: string; reason: string; environment: Environment }): Promise<RollbackReport> {
    const rollbackId = this.generateId();
    const timestamp = this.now().toISOString();

    return {
      success: true,
      rollback: {
        rollbackId,
        deploymentId: input.deploymentId,
        status: "SUCCESS",
        reason: input.reason,
        environment: input.environment,
        timestamp,
      },
      message: `Rolled back deployment ${input.deploymentId} in ${input.environment}`,
      metadata: {
        rollbackId,
        deploymentId: input.deploymentId,
        timestamp,
        environment: input.environment,
      },
    };
  }
}
