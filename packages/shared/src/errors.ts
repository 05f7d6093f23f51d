export type DeepdubErrorCode =
  | 'connection'
  | 'auth'
  | 'protocol'
  | 'ordering'
  | 'unrecoverable'
  | 'cancelled'
  | 'config'
  | 'validation'
  | 'http';

export class DeepdubError extends Error {
  readonly code: DeepdubErrorCode;
  details?: unknown;

  constructor(code: DeepdubErrorCode, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

/**
 * Transport-level failure. Sessions treat these as transient and reconnect.
 */
export class ConnectionError extends DeepdubError {
  constructor(message: string, options?: { cause?: unknown; details?: unknown }) {
    super('connection', message, options);
  }
}

export class AuthError extends DeepdubError {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super('auth', message);
    this.status = status;
  }
}

export class ProtocolError extends DeepdubError {
  constructor(message: string, options?: { cause?: unknown; details?: unknown }) {
    super('protocol', message, options);
  }
}

export class OrderingError extends DeepdubError {
  readonly expectedSeq: number;
  readonly receivedSeq: number;

  constructor(expectedSeq: number, receivedSeq: number) {
    super('ordering', `Audio chunk out of order: expected seq ${expectedSeq}, received ${receivedSeq}`);
    this.expectedSeq = expectedSeq;
    this.receivedSeq = receivedSeq;
  }
}

export class UnrecoverableError extends DeepdubError {
  constructor(message: string, options?: { cause?: unknown; details?: unknown }) {
    super('unrecoverable', message, options);
  }
}

export class CancelledError extends DeepdubError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', message);
  }
}

export class ConfigError extends DeepdubError {
  constructor(message: string) {
    super('config', message);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends DeepdubError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('validation', message, { details: issues });
    this.issues = issues;
  }
}

export class HttpError extends DeepdubError {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, statusText: string, body: unknown) {
    super('http', `HTTP ${status} ${statusText || 'Error'}`.trim(), { details: body });
    this.status = status;
    this.body = body;
  }
}

export function isDeepdubError(err: unknown): err is DeepdubError {
  return err instanceof DeepdubError;
}

export function isTransientError(err: unknown): err is ConnectionError {
  return err instanceof ConnectionError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
