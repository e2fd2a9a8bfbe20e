/**
 * Explicit present/absent wrapper for partial updates.
 * Distinguishes "field omitted" from "field set to null or empty".
 */

export type Presence<T> = { present: true; value: T } | { present: false };

export const absent: Presence<never> = { present: false };

export function present<T>(value: T): Presence<T> {
  return { present: true, value };
}

/** Parsed request bodies leave omitted keys undefined; JSON has no undefined. */
export function fromOptional<T>(value: T | undefined): Presence<T> {
  return value === undefined ? absent : present(value);
}

export function resolve<T>(field: Presence<T>, current: T): T {
  return field.present ? field.value : current;
}
