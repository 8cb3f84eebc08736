// ============================================================================
// TIMING HELPERS
// ============================================================================

export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

/**
 * Settle with the promise, or reject with `onTimeout()` after `ms`.
 * A late rejection of the original promise is absorbed by the settled race.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), Math.max(0, ms));

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
