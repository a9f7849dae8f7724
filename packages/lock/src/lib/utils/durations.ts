// SPDX-License-Identifier: Apache-2.0

/**
 * Converts a duration in (possibly fractional) seconds to whole milliseconds, rounding up.
 */
export function toMilliseconds(seconds: number): number {
  return Math.ceil(seconds * 1000);
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 *
 * @returns true if the full duration elapsed, false if the wait was cut short
 */
export function waitFor(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
