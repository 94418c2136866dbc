/**
 * Timer abstraction used by the waiting strategies
 */

export interface Scheduler {
  /** Milliseconds on a monotonic-enough clock */
  now(): number;
  /** Resolve after `ms`; reject with the signal's reason if aborted first */
  sleep(ms: number, abortSignal?: AbortSignal): Promise<void>;
}

export function abortReason(abortSignal: AbortSignal): unknown {
  return abortSignal.reason ?? new Error('Aborted');
}

export const systemScheduler: Scheduler = {
  now: () => Date.now(),

  sleep: (ms, abortSignal) =>
    new Promise<void>((resolve, reject) => {
      if (abortSignal?.aborted) {
        reject(abortReason(abortSignal));
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        if (abortSignal) {
          reject(abortReason(abortSignal));
        }
      };

      const timer = setTimeout(() => {
        abortSignal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      abortSignal?.addEventListener('abort', onAbort, { once: true });
    }),
};
