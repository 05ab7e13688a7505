import logger from './logger';

export enum ErrorType {
  VALIDATION = 'VALIDATION',
  CONFIGURATION = 'CONFIGURATION',
  API = 'API',
  NETWORK = 'NETWORK',
  AUTHENTICATION = 'AUTHENTICATION',
  RATE_LIMIT = 'RATE_LIMIT',
  DELIVERY = 'DELIVERY',
  UNKNOWN = 'UNKNOWN',
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly statusCode?: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    type: ErrorType = ErrorType.UNKNOWN,
    statusCode: number | undefined = undefined,
    isOperational: boolean = true,
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised for user-supplied input that cannot be turned into something usable,
 * e.g. an unrecognized trader link. Surfaced to the caller, never retried.
 */
export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.VALIDATION, 400);
  }
}

/**
 * Fatal at startup. Carries every problem found, not just the first.
 */
export class ConfigurationError extends AppError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, ErrorType.CONFIGURATION, undefined, false);
    this.problems = problems;
  }
}

export class ApiError extends AppError {
  public readonly apiCode?: string;

  constructor(message: string, statusCode = 500, apiCode?: string) {
    super(message, ErrorType.API, statusCode);
    this.apiCode = apiCode;
  }
}

export class NetworkError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.NETWORK);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.AUTHENTICATION, 401);
  }
}

export class RateLimitError extends AppError {
  constructor(message: string) {
    super(message, ErrorType.RATE_LIMIT, 429);
  }
}

/**
 * Notification could not be delivered: bad chat target, network failure or a
 * malformed bot token. Logged by the caller, never re-queued.
 */
export class DeliveryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorType.DELIVERY, 502);
    this.cause = cause;
  }
}

export function handleError(error: Error | AppError): void {
  if (error instanceof AppError) {
    logger.error(`${error.type}: ${error.message}`, {
      type: error.type,
      statusCode: error.statusCode,
      stack: error.stack,
    });
  } else {
    logger.error(`Unhandled error: ${error.message}`, {
      type: ErrorType.UNKNOWN,
      stack: error.stack,
    });
  }
}

export function describeError(error: unknown): { type: ErrorType; message: string } {
  if (error instanceof AppError) {
    return { type: error.type, message: error.message };
  }
  if (error instanceof Error) {
    return { type: ErrorType.UNKNOWN, message: error.message };
  }
  return { type: ErrorType.UNKNOWN, message: String(error) };
}
