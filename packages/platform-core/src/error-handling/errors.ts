export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',
  DATABASE_ERROR = 'DATABASE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, statusCode: number, code: T, cause?: Error, serviceName?: string) {
    super(message, statusCode, cause, code);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

export interface DomainServiceErrorCodes<T extends string> {
  readonly INTERNAL_ERROR: T;
  readonly NOT_FOUND: T;
  readonly VALIDATION_ERROR: T;
  readonly SERVICE_UNAVAILABLE: T;
}

export function createDomainServiceError<T extends string>(serviceName: string, domainErrorCodes: DomainServiceErrorCodes<T>) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName);
    }

    static notFound(resource: string, id?: string | number) {
      const msg = id !== undefined ? `${resource} not found: ${id}` : `${resource} not found`;
      return new this(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new this(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static internalError(message: string, cause?: Error) {
      return new this(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new this(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
