import type { ErrorCode } from '../types';

/**
 * Base class for every failure the server reports to a caller.
 * `status` mirrors the HTTP status class of the error kind.
 */
export class HypoForgeError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class NotFoundError extends HypoForgeError {
  constructor(message: string) {
    super('NOT_FOUND', 404, message);
  }
}

export class BadInputError extends HypoForgeError {
  constructor(message: string) {
    super('BAD_INPUT', 400, message);
  }
}

export class PermissionDeniedError extends HypoForgeError {
  constructor(message: string) {
    super('PERMISSION_DENIED', 403, message);
  }
}

/**
 * Non-success answer from a URL host or the completion service.
 * Carries the upstream status and body verbatim.
 */
export class UpstreamError extends HypoForgeError {
  readonly upstreamStatus: number;
  readonly body: string;

  constructor(message: string, upstreamStatus: number, body: string) {
    super('UPSTREAM_ERROR', upstreamStatus >= 400 ? upstreamStatus : 502, message);
    this.upstreamStatus = upstreamStatus;
    this.body = body;
  }
}

export class ExecutionError extends HypoForgeError {
  constructor(message: string) {
    super('EXECUTION_ERROR', 500, message);
  }
}

export class ConfigError extends HypoForgeError {
  constructor(message: string) {
    super('CONFIG_ERROR', 500, message);
  }
}

/**
 * A hypothesis test that ended in the Failed stage.
 */
export class StageFailedError extends HypoForgeError {
  constructor(
    readonly failedStage: string,
    code: ErrorCode,
    status: number,
    message: string,
    readonly upstream?: { status: number; body: string }
  ) {
    super(code, status, message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Translate a filesystem failure into the error taxonomy.
 */
export function fromFsError(error: unknown, path: string): HypoForgeError {
  if (error instanceof HypoForgeError) {
    return error;
  }
  switch (errnoCode(error)) {
    case 'ENOENT':
      return new NotFoundError(`File not found: ${path}`);
    case 'EACCES':
    case 'EPERM':
      return new PermissionDeniedError(`Permission denied accessing file: ${path}`);
    case 'EISDIR':
      return new BadInputError(`Path is not a file: ${path}`);
    default:
      return new HypoForgeError('INTERNAL_ERROR', 500, `Error accessing ${path}: ${errorMessage(error)}`);
  }
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === 'AbortError' || error.name === 'CanceledError' || errnoCode(error) === 'ERR_CANCELED';
}
