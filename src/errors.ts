// Error taxonomy for the query pipeline
export type AppErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'PROTOCOL_ERROR'
  | 'SERVICE_ERROR'
  | 'PERSISTENCE_ERROR';

export abstract class AppError extends Error {
  abstract readonly code: AppErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed currency, date or batch arguments. Raised before any network I/O. */
export class InvalidArgumentError extends AppError {
  readonly code = 'INVALID_ARGUMENT';
}

export class NetworkError extends AppError {
  readonly code = 'NETWORK_ERROR';
}

export class HttpError extends AppError {
  readonly code = 'HTTP_ERROR';

  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`HTTP error ${status}. Details: ${body || 'No details.'}`);
  }
}

export class ProtocolError extends AppError {
  readonly code = 'PROTOCOL_ERROR';
}

/** The service answered with a non-empty `error` field. */
export class ServiceError extends AppError {
  readonly code = 'SERVICE_ERROR';

  constructor(readonly serviceMessage: string) {
    super(`Service error: ${serviceMessage}`);
  }
}

export class PersistenceError extends AppError {
  readonly code = 'PERSISTENCE_ERROR';
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
