/**
 * Time source, injectable so tests can pin "now"
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that always returns the given instant (or whatever `set` last stored).
 */
export function fixedClock(instant: Date): Clock & { set(next: Date): void } {
  let current = new Date(instant.getTime());
  return {
    now: () => new Date(current.getTime()),
    set(next: Date) {
      current = new Date(next.getTime());
    },
  };
}
