/** Outcome of a best-effort lookup: either a value or the reason it could not be had. */
export type Resolution<T> =
  | { status: 'resolved'; value: T }
  | { status: 'unavailable'; reason: string };

export function resolved<T>(value: T): Resolution<T> {
  return { status: 'resolved', value };
}

export function unavailable<T = never>(reason: string): Resolution<T> {
  return { status: 'unavailable', reason };
}
