export class ApplicationError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = "ApplicationError";
  }
}

export class AuthenticationError extends ApplicationError {
  constructor(message = "Missing or invalid authentication session") {
    super("unauthenticated", message, 401);
    this.name = "AuthenticationError";
  }
}

export class PermissionError extends ApplicationError {
  constructor(message = "You do not have access to this resource") {
    super("forbidden", message, 403);
    this.name = "PermissionError";
  }
}

export class ValidationError extends ApplicationError {
  constructor(message: string) {
    super("validation_error", message, 400);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ApplicationError {
  constructor(message = "Resource not found") {
    super("not_found", message, 404);
    this.name = "NotFoundError";
  }
}

/** Proxied gateway transport failure. Writes recover from it through the direct router. */
export class GatewayError extends ApplicationError {
  constructor(
    message = "Gateway request failed",
    public readonly upstreamStatus?: number,
  ) {
    super("gateway_error", message, 502);
    this.name = "GatewayError";
  }
}

export class InternalError extends ApplicationError {
  constructor(message = "Unexpected server error", options?: { cause?: unknown }) {
    super("internal_error", message, 500);
    this.name = "InternalError";

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isClientFacingError(error: unknown): boolean {
  return (
    error instanceof AuthenticationError ||
    error instanceof PermissionError ||
    error instanceof ValidationError
  );
}
