/**
 * Error taxonomy shared by the store, the job runner and the HTTP layer
 */

export type ErrorKind = 'not_found' | 'conflict' | 'validation' | 'transient_io' | 'internal';

export class ResearchFlowError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Unknown session, group or task index. A stale index after a removal lands
 * here too; clients re-fetch instead of treating it as fatal.
 */
export class NotFoundError extends ResearchFlowError {
  constructor(message: string) {
    super('not_found', message);
  }
}

export class ConflictError extends ResearchFlowError {
  constructor(message: string) {
    super('conflict', message);
  }
}

export class ValidationError extends ResearchFlowError {
  constructor(message: string) {
    super('validation', message);
  }
}

/**
 * Network failure or unreadable response seen by a client
 */
export class TransientIOError extends ResearchFlowError {
  constructor(message: string, readonly original?: unknown) {
    super('transient_io', message);
  }
}

/**
 * Structured failure the server reported without a more specific kind
 */
export class ServiceError extends ResearchFlowError {
  constructor(message: string) {
    super('internal', message);
  }
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  not_found: 404,
  conflict: 409,
  validation: 400,
  transient_io: 502,
  internal: 500,
};

export function httpStatusFor(error: unknown): number {
  return error instanceof ResearchFlowError ? STATUS_BY_KIND[error.kind] : 500;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
