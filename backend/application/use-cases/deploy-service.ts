import { ValidationError } from "@/backend/application/errors";
import type { DeploymentReport } from "@/backend/domain/devops";
import type { Environment } from "@/backend/domain/operations";
import type { DeploymentPipeline } from "@/backend/ports/telemetry";

export interface DeployServiceInput {
  serviceName: string;
  version: string;
  environment: Environment;
}

export class DeployServiceUseCase {
  constructor(private readonly pipeline: DeploymentPipeline) {}

  async execute(input: DeployServiceInput): Promise<DeploymentReport> {
    const serviceName = input.serviceName.trim();
    const version = input.version.trim();

    if (!serviceName || !version) {
      throw new ValidationError("Service name and version are required");
    }

    return this.pipeline.deploy({ serviceName, version, environment: input.environment });
  }
}
