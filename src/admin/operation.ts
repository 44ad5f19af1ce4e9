import * as _ from "lodash";

import { AdminError, Result, toAdminError } from "../error";
import { logger } from "../logger";
import { PolledOperation, RetrySettings, pollOperation } from "../operation-poller";
import { errorFromStatus } from "../responseToError";
import { CallOptions, Transport } from "./transport";
import { Any, Operation } from "./types";

export type OperationState = "RUNNING" | "DONE_OK" | "DONE_ERROR" | "CANCELLED";

export interface OperationSnapshot<R, M> {
  name: string;
  state: OperationState;
  metadata?: M;
  /** Only meaningful in DONE_OK. */
  result?: R;
  error?: AdminError;
}

export interface OperationHandleOptions<R, M> {
  transport: Transport;
  /** The operation as returned by the call that started it. */
  operation: Operation;
  retrySettings: RetrySettings;
  decodeMetadata: (envelope: Any | undefined) => M | undefined;
  decodeResult: (response: Any | undefined) => R;
}

/**
 * Client-side view of a long-running operation. The state only moves forward:
 * RUNNING, then one of DONE_OK, DONE_ERROR or CANCELLED. Once there, later
 * observations are ignored and no more RPCs are made.
 *
 * At most one "get operation" call is in flight per handle; concurrent poll()
 * and awaitResult() callers share it.
 */
export class OperationHandle<R, M> {
  readonly name: string;

  private readonly transport: Transport;
  private readonly retrySettings: RetrySettings;
  private readonly decodeMetadata: (envelope: Any | undefined) => M | undefined;
  private readonly decodeResult: (response: Any | undefined) => R;

  private currentState: OperationState = "RUNNING";
  private currentMetadata: M | undefined;
  private outcome: Result<R> | undefined;
  private inflight: Promise<PolledOperation> | undefined;

  constructor(options: OperationHandleOptions<R, M>) {
    this.name = options.operation.name;
    this.transport = options.transport;
    this.retrySettings = options.retrySettings;
    this.decodeMetadata = options.decodeMetadata;
    this.decodeResult = options.decodeResult;
    this.observe(options.operation);
  }

  get state(): OperationState {
    return this.currentState;
  }

  get metadata(): M | undefined {
    return this.currentMetadata;
  }

  get result(): R | undefined {
    return this.outcome?.ok ? this.outcome.value : undefined;
  }

  get error(): AdminError | undefined {
    return this.outcome && !this.outcome.ok ? this.outcome.error : undefined;
  }

  /**
   * Current state, without contacting the server.
   */
  snapshot(): OperationSnapshot<R, M> {
    return {
      name: this.name,
      state: this.currentState,
      metadata: this.currentMetadata,
      result: this.result,
      error: this.error,
    };
  }

  isTerminal(): boolean {
    return this.currentState !== "RUNNING";
  }

  /** Named after the operation's `done` field; same as isTerminal(). */
  isDone(): boolean {
    return this.isTerminal();
  }

  /**
   * Runs one poll tick and returns the resulting snapshot.
   */
  async poll(options: CallOptions = {}): Promise<OperationSnapshot<R, M>> {
    await this.tick(options.timeout);
    return this.snapshot();
  }

  /**
   * Polls until the operation is terminal, then resolves with its result or rejects with its
   * error. Running out of the client-side budget rejects with a TimeoutError and leaves the
   * handle RUNNING, so it can be awaited again.
   */
  async awaitResult(settings: Partial<RetrySettings> = {}): Promise<R> {
    if (!this.isTerminal()) {
      await pollOperation({
        pollerName: "Operation poller",
        operationResourceName: this.name,
        retrySettings: { ...this.retrySettings, ..._.omitBy(settings, _.isUndefined) },
        getOperation: (rpcTimeoutMillis) => this.tick(rpcTimeoutMillis),
      });
    }
    if (!this.outcome) {
      throw new AdminError(`Operation ${this.name} reported done without an outcome`);
    }
    if (!this.outcome.ok) {
      throw this.outcome.error;
    }
    return this.outcome.value;
  }

  /**
   * Same as awaitResult, with failures returned instead of thrown.
   */
  async settle(settings: Partial<RetrySettings> = {}): Promise<Result<R>> {
    try {
      return { ok: true, value: await this.awaitResult(settings) };
    } catch (err: unknown) {
      return { ok: false, error: toAdminError(err) };
    }
  }

  /**
   * Asks the server to cancel the operation. The handle only becomes CANCELLED once a later
   * poll sees it; the operation may still finish successfully.
   */
  async cancel(): Promise<void> {
    logger.debug(`[admin] Cancelling operation ${this.name}`);
    await this.transport.unaryCall("CancelOperation", { name: this.name });
  }

  private tick(timeout?: number): Promise<PolledOperation> {
    if (this.isTerminal()) {
      return Promise.resolve({ name: this.name, done: true });
    }
    if (!this.inflight) {
      this.inflight = this.fetch(timeout).finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  private async fetch(timeout?: number): Promise<PolledOperation> {
    const operation = await this.transport.unaryCall(
      "GetOperation",
      { name: this.name },
      timeout ? { timeout } : {},
    );
    this.observe(operation);
    return { name: this.name, done: this.isTerminal() };
  }

  private observe(operation: Operation): void {
    if (this.isTerminal()) {
      return;
    }
    if (operation.metadata) {
      this.currentMetadata = this.decodeMetadata(operation.metadata);
    }
    if (!operation.done) {
      return;
    }
    if (operation.error) {
      const error = errorFromStatus(operation.error);
      this.outcome = { ok: false, error };
      this.currentState = error.code === "CANCELLED" ? "CANCELLED" : "DONE_ERROR";
      return;
    }
    try {
      this.outcome = { ok: true, value: this.decodeResult(operation.response) };
      this.currentState = "DONE_OK";
    } catch (err: unknown) {
      this.outcome = { ok: false, error: toAdminError(err) };
      this.currentState = "DONE_ERROR";
    }
  }
}
