/**
 * Abstraction for time-related operations.
 * Allows injecting fake clocks for testing.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now()
};
