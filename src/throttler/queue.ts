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

import { Throttler, ThrottlerOptions } from "./throttler";

/**
 * Throttler that starts tasks in the order they were added. The operation poller
 * runs each poll as the only task of a queue with a concurrency of 1.
 */
export class Queue<T, R> extends Throttler<T, R> {
  /** Index of the next task to hand to the handler. */
  private started = 0;

  constructor(options: ThrottlerOptions<T, R>) {
    super({ ...options, name: options.name || "queue" });
  }

  hasWaitingTask(): boolean {
    return this.started < this.total;
  }

  nextWaitingTaskIndex(): number {
    if (!this.hasWaitingTask()) {
      throw new Error(`${this.name} has no task waiting to start`);
    }
    return this.started++;
  }
}

export default Queue;
