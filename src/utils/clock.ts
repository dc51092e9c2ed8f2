/**
 * Time source abstraction so cache expiry and calendar timestamps can be
 * driven by tests
 */

export interface Clock {
  /** Current time in milliseconds since the epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};
