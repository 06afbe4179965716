import { type ErrorKind, HelixError } from '../errors';
import { TimeoutError } from './timeout';

const TRANSIENT_HINTS = [
  'timeout',
  'timed out',
  'temporar',
  'unavailable',
  'network',
  'econnreset',
  'econnrefused',
  'rate limit',
  '429',
  '502',
  '503',
  '504'
];

/**
 * Maps any thrown value onto the error taxonomy. Errors from the taxonomy carry
 * their own kind; anything else is judged by its message.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof HelixError) return error.kind;
  if (error instanceof TimeoutError) return 'transient';
  if (error instanceof Error && error.name === 'AbortError') return 'cancelled';

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return TRANSIENT_HINTS.some((hint) => message.includes(hint)) ? 'transient' : 'permanent';
}

export function isTransientError(error: unknown): boolean {
  return classifyError(error) === 'transient';
}
