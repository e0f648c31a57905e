/**
 * Root of the pipeline's error hierarchy. `code` is stable and machine-readable;
 * `context` carries whatever identifies the failing input or call.
 */
export abstract class BaseError extends Error {
  public readonly timestamp = new Date();

  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

export class ValidationError extends BaseError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    code = "VALIDATION_ERROR",
  ) {
    super(message, code, context);
  }
}

/**
 * Raised at startup when required settings are missing or malformed.
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly variables: string[],
    context?: Record<string, unknown>,
  ) {
    super(message, "CONFIGURATION_ERROR", { ...context, variables });
  }
}

export class InfrastructureError extends BaseError {
  constructor(
    message: string,
    code = "INFRASTRUCTURE_ERROR",
    context?: Record<string, unknown>,
  ) {
    super(message, code, context);
  }
}

export class PersistenceError extends InfrastructureError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PERSISTENCE_ERROR", context);
  }
}

/**
 * A call to a third-party service failed. `service` names the provider.
 */
export class ExternalServiceError extends InfrastructureError {
  constructor(
    public readonly service: string,
    message: string,
    public readonly statusCode?: number,
    context?: Record<string, unknown>,
  ) {
    super(message, "EXTERNAL_SERVICE_ERROR", {
      ...context,
      service,
      statusCode,
    });
  }
}
