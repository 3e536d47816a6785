import { ZodError, type ZodIssue } from "zod";

import { AuthVerificationError } from "@/backend/adapters/auth/errors";
import { ApplicationError, GatewayError } from "@/backend/application/errors";

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function toErrorResponse(error: unknown, requestId: string): Response {
  const normalized = normalizeError(error);

  return Response.json(
    {
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details,
      },
      requestId,
    },
    {
      status: normalized.status,
      headers: {
        "x-request-id": requestId,
      },
    },
  );
}

export function normalizeError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof GatewayError) {
    return new ApiError(
      error.status,
      error.code,
      error.message,
      error.upstreamStatus === undefined ? undefined : { upstreamStatus: error.upstreamStatus },
    );
  }

  if (error instanceof ApplicationError) {
    return new ApiError(error.status, error.code, error.message);
  }

  if (error instanceof AuthVerificationError) {
    return new ApiError(401, "unauthenticated", error.message);
  }

  if (error instanceof ZodError) {
    return new ApiError(400, "validation_error", "Request validation failed", { fields: groupIssues(error.issues) });
  }

  return new ApiError(500, "internal_error", "Unexpected server error");
}

function groupIssues(issues: ZodIssue[]): Record<string, string[]> {
  const fields: Record<string, string[]> = {};

  for (const issue of issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "body";
    (fields[key] ??= []).push(issue.message);
  }

  return fields;
}
