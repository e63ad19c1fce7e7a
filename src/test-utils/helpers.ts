/**
 * Test helper utilities
 */

export interface TestClock {
  (): Date;
  set(iso: string): void;
  advance(ms: number): void;
}

/**
 * Settable clock for code that takes `clock?: () => Date`
 */
export function createClock(start: string): TestClock {
  let current = new Date(start).getTime();
  const clock = () => new Date(current);
  return Object.assign(clock, {
    set(iso: string) {
      current = new Date(iso).getTime();
    },
    advance(ms: number) {
      current += ms;
    },
  });
}

