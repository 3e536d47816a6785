import { ValidationError } from "@/backend/application/errors";
import type { RollbackReport } from "@/backend/domain/devops";
import type { Environment } from "@/backend/domain/operations";
import type { RollbackExecutor } from "@/backend/ports/telemetry";

export interface RollbackDeploymentInput {
  deploymentId: string;
  reason: string;
  environment: Environment;
}

export const MIN_ROLLBACK_REASON_LENGTH = 5;

export class RollbackDeploymentUseCase {
  constructor(private readonly executor: RollbackExecutor) {}

  async execute(input: RollbackDeploymentInput): Promise<RollbackReport> {
    const deploymentId = input.deploymentId.trim();
    const reason = input.reason.trim();

    if (!deploymentId) {
      throw new ValidationError("Deployment id is required");
    }

    if (reason.length < MIN_ROLLBACK_REASON_LENGTH) {
      throw new ValidationError(`Rollback reason must be at least ${MIN_ROLLBACK_REASON_LENGTH} characters`);
    }

    return this.executor.rollback({ deploymentId, reason, environment: input.environment });
  }
}
