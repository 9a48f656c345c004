// ===========================================
// TIMING HELPERS
// ===========================================

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timed suspension. Resolves early (never rejects) when the signal aborts.
 */
export const sleep: Sleeper = (ms, signal) => {
  if (signal?.aborted) return Promise.resolve();

  return new Promise(resolve => {
    const timer = setTimeout(done, ms);

    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }

    signal?.addEventListener('abort', done, { once: true });
  });
};

/**
 * Uniform integer in [min, max], both inclusive.
 */
export function randomInt(min: number, max: number, random: () => number = Math.random): number {
  const lo = Math.ceil(min);
  const hi = Math.floor(max);
  if (hi <= lo) return lo;
  return lo + Math.floor(random() * (hi - lo + 1));
}
