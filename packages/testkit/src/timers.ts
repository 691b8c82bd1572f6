/**
 * Manually advanced clock, usable wherever the store accepts `now`
 */
export interface TestClock {
  now: () => Date;
  /** Move the clock forward */
  advance(ms: number): void;
}

export function createClock(start = "2026-01-01T00:00:00.000Z"): TestClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}
