/**
 * @module crawler/rate-limiter
 * @fileoverview Per-crawl fetch pacing on top of p-queue.
 *
 * One queue per crawl with `concurrency: 1` and `intervalCap: 1`: task starts
 * are at least `interval` apart, so a crawl running for T seconds at R
 * fetches per second starts at most R*T + 1 fetches.
 *
 * ```
 *  schedule(fetch A) ──┐
 *  schedule(fetch B) ──┼──> [ PQueue  concurrency=1  intervalCap=1 ] ──> A ... B ... C
 *  schedule(fetch C) ──┘         interval = ceil(1000 / R) ms
 * ```
 */

import PQueue from "p-queue";
import { OrchestratorError } from "../utils/errors.js";

/** Rejection of a task that was still waiting when its signal aborted. */
export class AbortedWhileQueuedError extends OrchestratorError {
  constructor() {
    super("Aborted before the task started", "ABORTED");
  }
}

export class RateLimiter {
  private readonly queue: PQueue;

  /** Minimum gap between two task starts, in milliseconds. */
  readonly intervalMs: number;

  constructor(ratePerSecond: number) {
    this.intervalMs = Math.ceil(1000 / ratePerSecond);
    this.queue = new PQueue({
      concurrency: 1,
      intervalCap: 1,
      interval: this.intervalMs,
    });
  }

  /**
   * Run `task` when its turn comes.
   *
   * Aborting `signal` rejects a task that has not started yet with
   * {@link AbortedWhileQueuedError}. A task that already started runs to
   * completion and settles normally.
   */
  schedule<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortedWhileQueuedError());
        return;
      }

      let started = false;
      const onAbort = (): void => {
        if (!started) reject(new AbortedWhileQueuedError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.queue
        .add(
          async () => {
            signal?.removeEventListener("abort", onAbort);
            if (signal?.aborted) return;
            started = true;
            try {
              resolve(await task());
            } catch (error) {
              reject(error);
            }
          },
          { throwOnTimeout: true },
        )
        .catch(reject);
    });
  }

  /** Drop every task that has not started. Their promises never settle. */
  clear(): void {
    this.queue.clear();
  }

  /** Tasks waiting plus tasks running. */
  get load(): number {
    return this.queue.size + this.queue.pending;
  }
}
