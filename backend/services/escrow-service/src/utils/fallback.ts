/**
 * A value read from the chain, or the documented substitute used when the
 * read failed. Callers that care (tests, UI hints) can tell the two apart.
 */
export interface Fallback<T> {
  value: T;
  wasFallback: boolean;
}

export function actual<T>(value: T): Fallback<T> {
  return { value, wasFallback: false };
}

export function fallback<T>(value: T): Fallback<T> {
  return { value, wasFallback: true };
}
