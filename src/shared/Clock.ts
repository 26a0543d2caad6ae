/**
 * Time source injected into the engine.
 *
 * Components never call Date.now() directly so tests can drive acceptance,
 * completion and time-limit expiry with a fixed or stepped clock.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Creates a clock whose value only changes when advanced.
 */
export function createManualClock(start = 0): Clock & {
  advance(ms: number): number;
  set(ms: number): void;
} {
  let current = start;
  const clock = (): number => current;
  return Object.assign(clock, {
    advance(ms: number): number {
      current += ms;
      return current;
    },
    set(ms: number): void {
      current = ms;
    },
  });
}
