import type { Clock } from "../../../src/shared/time/clock";

export type FakeClock = Clock & { sleeps: number[]; advance(ms: number): void };

export const createFakeClock = (start = 0): FakeClock => {
  let current = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
    advance: (ms) => {
      current += ms;
    }
  };
};
