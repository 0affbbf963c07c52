// Millisecond wall clock; injected so cooldown and token expiry are testable
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
