/**
 * Base error class for typed engine errors.
 * All zoning and configuration errors should extend this.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number = 500) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string, code = "NOT_FOUND") {
    super(id ? `${resource} '${id}' not found` : `${resource} not found`, code, 404);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "VALIDATION_ERROR", 400);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** Static regulation data that failed to load or validate. */
export class ConfigurationError extends AppError {
  public readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`, "CONFIGURATION_ERROR", 500);
    this.name = "ConfigurationError";
    this.source = source;
  }
}
