/**
 * Error taxonomy
 * not-found / unauthorized / malformed-input are local and never retried;
 * transient-infra failures are retried by whoever owns the loop.
 */

export type RealtimeErrorKind = 'not_found' | 'unauthorized' | 'malformed_input' | 'transient';

export abstract class RealtimeError extends Error {
  abstract readonly kind: RealtimeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends RealtimeError {
  readonly kind = 'not_found';

  constructor(readonly resource: string, readonly id: string) {
    super(`${resource} ${id} not found`);
  }
}

export class UnauthorizedError extends RealtimeError {
  readonly kind = 'unauthorized';
}

export class MalformedInputError extends RealtimeError {
  readonly kind = 'malformed_input';
}

export class TransientError extends RealtimeError {
  readonly kind = 'transient';
}

export function isRealtimeError(error: unknown): error is RealtimeError {
  return error instanceof RealtimeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
