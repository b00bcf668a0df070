/**
 * Domain core: structural primitives only.
 * Framework-independent. No calendar or unit assumptions.
 */

// --- Branded scalars (safer than plain numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Point in time (floating seconds since 1970-01-01T00:00:00Z). */
export type Instant = Brand<number, "InstantSeconds">;

/** Signed span of time (floating seconds). */
export type Duration = Brand<number, "DurationSeconds">;

// --- Constructors (no validation) ---

export const asInstant = (seconds: number) => seconds as Instant;
export const asDuration = (seconds: number) => seconds as Duration;

// --- Ordering ---

/** Result of every comparison in the library. */
export type Ordering = "before" | "same" | "after";

/** Maps a signed difference onto an Ordering. */
export function orderingOf(diff: number): Ordering {
  if (diff < 0) return "before";
  if (diff > 0) return "after";
  return "same";
}

/** Lexicographic comparison of equal-length numeric tuples. */
export function compareTuples(a: readonly number[], b: readonly number[]): Ordering {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return orderingOf(diff);
  }
  return orderingOf(a.length - b.length);
}
