export interface Clock {
  /** Milliseconds since epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function secondsBetween(from: number, to: number): number {
  return (to - from) / 1000;
}
