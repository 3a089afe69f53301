/**
 * Time source for lease bookkeeping and backoff.
 */

/**
 * Wall clock in seconds plus the wait used between attempts.
 */
export interface Clock {
    /** Current time in seconds, sub-second precision */
    now(): number;

    /** Wait the given number of milliseconds */
    sleep(ms: number): Promise<void>;
}

/**
 * Clock backed by `Date.now()` and timers.
 */
export const systemClock: Clock = {

    now: () => Date.now() / 1000,

    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),

};
