/**
 * Copyright (c) 2022 Google LLC
 *
 * Permission is hereby granted, free of charge, to any person obtaining a copy of
 * this software and associated documentation files (the "Software"), to deal in
 * the Software without restriction, including without limitation the rights to
 * use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of
 * the Software, and to permit persons to whom the Software is furnished to do so,
 * subject to the following conditions:
 *
 * The above copyright notice and this permission notice shall be included in all
 * copies or substantial portions of the Software.
 *
 * THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
 * IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY, FITNESS
 * FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR
 * COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER
 * IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM, OUT OF OR IN
 * CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE SOFTWARE.
 */

import * as api from "./api";
import { AdminError, MalformedResponseError, getError } from "./error";
import { Queue } from "./throttler/queue";
import { TaskAttempt } from "./throttler/throttler";

/**
 * Timed-retry policy for polling a long-running operation.
 */
export interface RetrySettings {
  /** Delay before the second poll. */
  initialRetryDelayMillis: number;
  retryDelayMultiplier: number;
  maxRetryDelayMillis: number;
  /** Timeout of the first "get operation" call. */
  initialRpcTimeoutMillis: number;
  rpcTimeoutMultiplier: number;
  maxRpcTimeoutMillis: number;
  /** Client-side budget for the whole wait. Must be positive: there is no unbounded wait. */
  totalTimeoutMillis: number;
  /** Upper bound on polls; 0 means no bound other than totalTimeoutMillis. */
  maxAttempts: number;
}

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  initialRetryDelayMillis: api.lroInitialDelayMillis,
  retryDelayMultiplier: 1.5,
  maxRetryDelayMillis: 45000,
  initialRpcTimeoutMillis: 30000,
  rpcTimeoutMultiplier: 1,
  maxRpcTimeoutMillis: 60000,
  totalTimeoutMillis: api.lroTotalTimeoutMillis,
  maxAttempts: 0,
};

/**
 * Per-RPC timeout for the given attempt, never longer than what is left of the budget.
 */
export function rpcTimeout(settings: RetrySettings, attempt: TaskAttempt): number {
  const timeout = Math.min(
    settings.maxRpcTimeoutMillis,
    settings.initialRpcTimeoutMillis * Math.pow(settings.rpcTimeoutMultiplier, attempt.retryCount),
  );
  if (attempt.remainingMillis === undefined) {
    return timeout;
  }
  return Math.max(1, Math.min(timeout, attempt.remainingMillis));
}

/**
 * The fields of a google.longrunning.Operation the poller looks at.
 */
export interface PolledOperation {
  name: string;
  done?: boolean;
}

export interface OperationPollerOptions<T extends PolledOperation> {
  pollerName?: string;
  operationResourceName: string;
  retrySettings: RetrySettings;
  /** Fetches the operation once. Must reject with an AdminError on failure. */
  getOperation: (rpcTimeoutMillis: number) => Promise<T>;
  onPoll?: (operation: T) => void;
}

/**
 * Failures that say nothing about the operation itself: the poll is retried.
 */
export function isTransientPollError(err: unknown): boolean {
  if (!(err instanceof AdminError) || err instanceof MalformedResponseError) {
    return true;
  }
  return err.code === "UNAVAILABLE" || err.code === "DEADLINE_EXCEEDED";
}

type PollOutcome<T> = { operation: T; error?: never } | { operation?: never; error: Error };

export class OperationPoller<T extends PolledOperation> {
  /**
   * Returns a promise that resolves with the operation once it is "done", successful or not.
   * Rejects if the totalTimeout runs out before the operation is "done" (TimeoutError), if
   * maxAttempts polls all saw a running operation (RetriesExhaustedError), or when fetching the
   * operation fails with an unrecoverable error.
   */
  async poll(options: OperationPollerOptions<T>): Promise<T> {
    const settings = options.retrySettings;
    if (!(settings.totalTimeoutMillis > 0)) {
      throw new AdminError(
        `totalTimeoutMillis must be a positive number of milliseconds, got ${settings.totalTimeoutMillis}`,
        { code: "INVALID_ARGUMENT" },
      );
    }
    const queue = new Queue<string, PollOutcome<T>>({
      name: options.pollerName || "LRO Poller",
      concurrency: 1,
      retries: settings.maxAttempts > 0 ? settings.maxAttempts - 1 : Number.MAX_SAFE_INTEGER,
      backoff: settings.initialRetryDelayMillis,
      maxBackoff: settings.maxRetryDelayMillis,
      backoffMultiplier: settings.retryDelayMultiplier,
      handler: (_name, attempt) => this.pollOnce(options, attempt),
    });

    try {
      const { operation, error } = await queue.run(
        options.operationResourceName,
        settings.totalTimeoutMillis,
      );
      if (error) {
        throw error;
      }
      return operation;
    } finally {
      queue.close();
    }
  }

  private async pollOnce(
    options: OperationPollerOptions<T>,
    attempt: TaskAttempt,
  ): Promise<PollOutcome<T>> {
    let operation: T;
    try {
      operation = await options.getOperation(rpcTimeout(options.retrySettings, attempt));
    } catch (err: unknown) {
      // Unavailable backends, timed out calls and garbled replies are retried with backoff.
      if (isTransientPollError(err)) {
        throw err;
      }
      return { error: getError(err) };
    }
    if (options.onPoll) {
      options.onPoll(operation);
    }
    if (!operation.done) {
      throw new Error("Polling incomplete, should trigger retry with backoff");
    }
    return { operation };
  }
}

export function pollOperation<T extends PolledOperation>(
  options: OperationPollerOptions<T>,
): Promise<T> {
  return new OperationPoller<T>().poll(options);
}
