/**
 * Helpers for errors raised by `fs` and other Node APIs.
 *
 * Errors created in another realm (a Jest sandbox, a worker) fail
 * `instanceof Error`, so both helpers read the fields structurally.
 */

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
