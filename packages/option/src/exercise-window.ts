/**
 * Exercise window: the fixed period before expiration when units may be
 * exercised. Both boundary instants are inside the window.
 *
 *   [expiration - EXERCISE_WINDOW_SECONDS, expiration]
 */

/** One calendar day. */
export const EXERCISE_WINDOW_SECONDS = 86_400;

export function windowOpensAt(expiration: number): number {
  return expiration - EXERCISE_WINDOW_SECONDS;
}

export function isExercisable(now: number, expiration: number): boolean {
  return now >= windowOpensAt(expiration) && now <= expiration;
}
