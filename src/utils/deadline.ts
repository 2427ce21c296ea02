/**
 * @module utils/deadline
 * @fileoverview Bound a promise by an absolute deadline or an abort signal
 * without cancelling the underlying work.
 *
 * The wrapped promise keeps running after the bound fires; its eventual
 * result or rejection is observed and dropped, so a late failure never
 * surfaces as an unhandled rejection.
 */

import { CancelledError, TimeoutError } from "./errors.js";

/**
 * Settle with `work`, or reject with {@link TimeoutError} once
 * `Date.now()` reaches `deadline` (epoch milliseconds), whichever is first.
 */
export function withDeadline<T>(work: Promise<T>, deadline: number, message: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const remaining = deadline - Date.now();
    const timer =
      remaining > 0 ? setTimeout(() => reject(new TimeoutError(message)), remaining) : undefined;
    if (timer === undefined) reject(new TimeoutError(message));

    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Settle with `work`, or reject with {@link CancelledError} as soon as
 * `signal` aborts. Without a signal, returns `work` unchanged.
 */
export function withSignal<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
