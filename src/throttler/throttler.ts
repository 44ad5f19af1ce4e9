import { logger } from "../logger";
import { sleep } from "../utils";
import RetriesExhaustedError from "./errors/retries-exhausted-error";
import TimeoutError from "./errors/timeout-error";

/**
 * Delay before retry number `retryNumber + 1`: `delay * multiplier^retryNumber`,
 * capped at maxDelay.
 */
export function timeToWait(
  retryNumber: number,
  delay: number,
  maxDelay: number,
  multiplier = 2,
): number {
  return Math.min(delay * Math.pow(multiplier, retryNumber), maxDelay);
}

/**
 * What a handler knows about the attempt it is running.
 */
export interface TaskAttempt {
  /** 0 for the first attempt. */
  retryCount: number;
  /** Milliseconds left before the task's timeout, if it has one. */
  remainingMillis?: number;
}

export type TaskFn<R> = (attempt: TaskAttempt) => Promise<R>;

function isTaskFn<R>(task: unknown): task is TaskFn<R> {
  return typeof task === "function";
}

function runTaskFn<T, R>(task: T, attempt: TaskAttempt): Promise<R> {
  if (isTaskFn<R>(task)) {
    return task(attempt);
  }
  return Promise.reject(new Error("Tasks must be functions when no handler is given"));
}

export interface ThrottlerOptions<T, R> {
  name?: string;
  /** Maximum number of tasks running at once. Defaults to 200. */
  concurrency?: number;
  handler?: (task: T, attempt: TaskAttempt) => Promise<R>;
  /** Attempts after the first one. Defaults to 0. */
  retries?: number;
  /** Delay before the first retry. Defaults to 200ms. */
  backoff?: number;
  /** Defaults to one minute. */
  maxBackoff?: number;
  /** Growth factor between consecutive backoffs. Defaults to 2. */
  backoffMultiplier?: number;
}

export interface ThrottlerStats {
  active: number;
  complete: number;
  success: number;
  errored: number;
  retried: number;
  total: number;
  elapsed: number;
}

interface Deferred<V> {
  resolve: (value: V) => void;
  reject: (err: Error) => void;
}

interface TaskRecord<T, R> {
  task: T;
  retryCount: number;
  timeoutMillis?: number;
  deadline?: number;
  timer?: NodeJS.Timeout;
  expired: boolean;
  caller?: Deferred<R>;
}

type AttemptOutcome<R> = { ok: true; value: R } | { ok: false; error: Error };

/**
 * Runs tasks through a handler with at most `concurrency` of them in flight. A failed
 * attempt is retried after an exponential backoff until the retries run out
 * (RetriesExhaustedError) or the task's timeout passes (TimeoutError). No backoff
 * sleeps past the timeout.
 *
 * Without a handler, each task must itself be a TaskFn.
 *
 * Subclasses decide the order in which added tasks start.
 */
export abstract class Throttler<T, R> {
  name = "";
  readonly concurrency: number;
  readonly retries: number;
  readonly backoff: number;
  readonly maxBackoff: number;
  readonly backoffMultiplier: number;

  private readonly handler: (task: T, attempt: TaskAttempt) => Promise<R>;
  private readonly records = new Map<number, TaskRecord<T, R>>();
  private readonly counts = { active: 0, complete: 0, success: 0, errored: 0, retried: 0 };
  private added = 0;
  private waiters: Array<Deferred<void>> = [];
  private closed = false;
  private drained = false;
  private startTime = 0;

  constructor(options: ThrottlerOptions<T, R>) {
    this.name = options.name ?? "";
    this.handler = options.handler ?? runTaskFn;
    this.concurrency = options.concurrency ?? 200;
    this.retries = options.retries ?? 0;
    this.backoff = options.backoff ?? 200;
    this.maxBackoff = options.maxBackoff ?? 60_000;
    this.backoffMultiplier = options.backoffMultiplier ?? 2;
  }

  /** Number of tasks added so far. */
  get total(): number {
    return this.added;
  }

  /**
   * @return `true` if some added task has not started yet.
   */
  abstract hasWaitingTask(): boolean;

  /**
   * Claims the next task to start and returns its index.
   */
  abstract nextWaitingTaskIndex(): number;

  /**
   * Resolves once the throttler is closed and every task has finished. Rejects with the
   * first task failure that happens while waiting.
   */
  wait(): Promise<void> {
    if (this.drained) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Adds a task whose result nobody awaits. Failures still reach wait().
   */
  add(task: T, timeoutMillis?: number): void {
    this.enqueue(task, timeoutMillis);
  }

  /**
   * Adds a task and resolves with the handler's result for it.
   */
  run(task: T, timeoutMillis?: number): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.enqueue(task, timeoutMillis, { resolve, reject });
    });
  }

  /**
   * Stops accepting tasks. Tasks already added still run.
   */
  close(): void {
    this.closed = true;
    this.pump();
  }

  stats(): ThrottlerStats {
    return {
      ...this.counts,
      total: this.added,
      elapsed: this.startTime ? Date.now() - this.startTime : 0,
    };
  }

  /**
   * Tasks that are strings are named by themselves, others by their index.
   */
  taskName(index: number): string {
    const record = this.records.get(index);
    if (!record) {
      return "finished task";
    }
    return typeof record.task === "string" ? record.task : `index ${index}`;
  }

  private enqueue(task: T, timeoutMillis?: number, caller?: Deferred<R>): void {
    if (this.closed) {
      throw new Error("Cannot add a task to a closed throttler.");
    }
    if (!this.startTime) {
      this.startTime = Date.now();
    }
    this.records.set(this.added, {
      task,
      retryCount: 0,
      timeoutMillis,
      deadline: timeoutMillis ? Date.now() + timeoutMillis : undefined,
      expired: false,
      caller,
    });
    this.added++;
    this.pump();
  }

  private pump(): void {
    while (!this.drainIfIdle() && this.counts.active < this.concurrency && this.hasWaitingTask()) {
      const index = this.nextWaitingTaskIndex();
      const record = this.records.get(index);
      if (!record) {
        throw new Error(`No task was added at index ${index}`);
      }
      this.counts.active++;
      void this.start(index, record).then(
        (result) => this.onSuccess(index, record, result),
        (thrown: unknown) =>
          this.onFailure(index, record, thrown instanceof Error ? thrown : new Error(String(thrown))),
      );
    }
  }

  private drainIfIdle(): boolean {
    if (!this.closed || this.counts.active > 0 || this.hasWaitingTask()) {
      return false;
    }
    this.drained = true;
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((w) => w.resolve());
    return true;
  }

  private start(index: number, record: TaskRecord<T, R>): Promise<R> {
    const attempts = this.attemptUntilSettled(index, record);
    if (!record.timeoutMillis) {
      return attempts;
    }
    const timeoutMillis = record.timeoutMillis;
    const timeout = new Promise<never>((_, reject) => {
      record.timer = setTimeout(() => {
        record.expired = true;
        reject(new TimeoutError(this.taskName(index), timeoutMillis));
      }, timeoutMillis);
    });
    return Promise.race([attempts, timeout]);
  }

  private async attemptUntilSettled(index: number, record: TaskRecord<T, R>): Promise<R> {
    for (;;) {
      const outcome = await this.handler(record.task, {
        retryCount: record.retryCount,
        remainingMillis: this.remainingMillis(record),
      }).then(
        (value): AttemptOutcome<R> => ({ ok: true, value }),
        (thrown: unknown): AttemptOutcome<R> => ({
          ok: false,
          error: thrown instanceof Error ? thrown : new Error(String(thrown)),
        }),
      );
      if (record.expired) {
        throw this.timeoutError(index, record);
      }
      if (outcome.ok) {
        return outcome.value;
      }
      if (record.retryCount >= this.retries) {
        throw new RetriesExhaustedError(this.taskName(index), this.retries, outcome.error);
      }

      const delay = timeToWait(
        record.retryCount,
        this.backoff,
        this.maxBackoff,
        this.backoffMultiplier,
      );
      const remaining = this.remainingMillis(record);
      if (remaining !== undefined && remaining <= delay) {
        // The next attempt would start past the deadline.
        await sleep(Math.max(remaining, 0));
        throw this.timeoutError(index, record);
      }
      await sleep(delay);
      if (record.expired) {
        throw this.timeoutError(index, record);
      }
      record.retryCount++;
      this.counts.retried++;
      logger.debug(`[${this.name}] Retrying task`, this.taskName(index));
    }
  }

  private remainingMillis(record: TaskRecord<T, R>): number | undefined {
    return record.deadline === undefined ? undefined : record.deadline - Date.now();
  }

  private timeoutError(index: number, record: TaskRecord<T, R>): TimeoutError {
    return new TimeoutError(this.taskName(index), record.timeoutMillis ?? 0);
  }

  private onSuccess(index: number, record: TaskRecord<T, R>, result: R): void {
    this.counts.active--;
    this.counts.complete++;
    this.counts.success++;
    this.release(index, record);
    record.caller?.resolve(result);
    this.pump();
  }

  private onFailure(index: number, record: TaskRecord<T, R>, err: Error): void {
    this.counts.active--;
    this.counts.complete++;
    this.counts.errored++;
    logger.debug(err);
    this.release(index, record);
    record.caller?.reject(err);
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((w) => w.reject(err));
    this.pump();
  }

  private release(index: number, record: TaskRecord<T, R>): void {
    clearTimeout(record.timer);
    this.records.delete(index);
  }
}
