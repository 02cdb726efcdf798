export class AppError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super('config_error', message, details);
  }
}

export class DatabaseConnectionError extends AppError {
  constructor(message: string, details?: unknown) {
    super('connection_error', message, details);
  }
}

export class QueryError extends AppError {
  constructor(message: string, details?: unknown) {
    super('query_error', message, details);
  }
}

export class FormatError extends AppError {
  constructor(message: string, details?: unknown) {
    super('format_error', message, details);
  }
}

export interface ErrorDescription {
  code: string;
  message: string;
  details?: unknown;
}

// Driver errors can echo connection parameters, so only config errors keep their details.
export function describeError(error: AppError): ErrorDescription {
  return {
    code: error.code,
    message: error.message,
    ...(error instanceof ConfigError && error.details !== undefined ? { details: error.details } : {})
  };
}

export function driverErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function driverErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
