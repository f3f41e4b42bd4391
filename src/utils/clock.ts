/**
 * Wall-clock source for expiry calculations; swapped for a fixed clock in tests
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
