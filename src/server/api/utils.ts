/**
 * API Utilities
 * Shared helpers for API endpoints
 */

import type { Context } from 'hono';
import { MalformedInputError, UnauthorizedError, errorMessage, isRealtimeError } from '../../core/errors.js';

export const USER_HEADER = 'X-User-ID';

export type ErrorStatus = 400 | 403 | 404 | 500;

/**
 * HTTP status for an error from the core
 */
export function statusForError(error: unknown): ErrorStatus {
  if (!isRealtimeError(error)) return 500;

  switch (error.kind) {
    case 'malformed_input':
      return 400;
    case 'unauthorized':
      return 403;
    case 'not_found':
      return 404;
    default:
      return 500;
  }
}

export function errorResponse(c: Context, error: unknown): Response {
  const status = statusForError(error);
  if (status === 500) {
    console.error(`[API] ${c.req.method} ${c.req.path} failed:`, error);
  }
  return c.json({ error: errorMessage(error) }, status);
}

/**
 * Calling user from the X-User-ID header
 */
export function requireCaller(c: Context): string {
  const caller = c.req.header(USER_HEADER)?.trim();
  if (!caller) {
    throw new UnauthorizedError(`Missing ${USER_HEADER} header`);
  }
  return caller;
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch (error) {
    throw new MalformedInputError('Request body must be JSON', { cause: error });
  }
}

export function parseLimit(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = parseInt(value, 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new MalformedInputError(`Invalid limit: ${value}`);
  }
  return Math.min(n, 1000);
}
