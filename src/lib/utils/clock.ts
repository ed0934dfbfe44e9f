/**
 * Time source for polling loops. Injected so tests can run on virtual time.
 */
export interface Clock {
  /** Milliseconds since an arbitrary fixed origin */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};
