import { defaultTo } from "lodash";

/**
 * Canonical error codes surfaced to callers. These mirror the subset of
 * google.rpc.Code values the admin service reports.
 */
export type ErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_ARGUMENT"
  | "DEADLINE_EXCEEDED"
  | "CANCELLED"
  | "PERMISSION_DENIED"
  | "UNAVAILABLE"
  | "UNKNOWN";

export const ERROR_CODES: readonly ErrorCode[] = [
  "NOT_FOUND",
  "ALREADY_EXISTS",
  "INVALID_ARGUMENT",
  "DEADLINE_EXCEEDED",
  "CANCELLED",
  "PERMISSION_DENIED",
  "UNAVAILABLE",
  "UNKNOWN",
];

interface AdminErrorOptions {
  code?: ErrorCode;
  children?: unknown[];
  context?: unknown;
  exit?: number;
  original?: Error;
  status?: number;
}

const RPC_CODES: Record<number, ErrorCode> = {
  1: "CANCELLED",
  2: "UNKNOWN",
  3: "INVALID_ARGUMENT",
  4: "DEADLINE_EXCEEDED",
  5: "NOT_FOUND",
  6: "ALREADY_EXISTS",
  7: "PERMISSION_DENIED",
  14: "UNAVAILABLE",
};

const HTTP_CODES: Record<number, ErrorCode> = {
  400: "INVALID_ARGUMENT",
  403: "PERMISSION_DENIED",
  404: "NOT_FOUND",
  409: "ALREADY_EXISTS",
  499: "CANCELLED",
  503: "UNAVAILABLE",
  504: "DEADLINE_EXCEEDED",
};

const HTTP_STATUS: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  INVALID_ARGUMENT: 400,
  DEADLINE_EXCEEDED: 504,
  CANCELLED: 499,
  PERMISSION_DENIED: 403,
  UNAVAILABLE: 503,
  UNKNOWN: 500,
};

const DEFAULT_CHILDREN: NonNullable<AdminErrorOptions["children"]> = [];
const DEFAULT_CODE: NonNullable<AdminErrorOptions["code"]> = "UNKNOWN";
const DEFAULT_EXIT: NonNullable<AdminErrorOptions["exit"]> = 1;

/**
 * Maps a numeric google.rpc.Code (as found in an Operation's `error.code`).
 */
export function codeFromRpcCode(code: number): ErrorCode {
  return RPC_CODES[code] ?? "UNKNOWN";
}

export function codeFromHttpStatus(status: number): ErrorCode {
  return HTTP_CODES[status] ?? "UNKNOWN";
}

export function httpStatusForCode(code: ErrorCode): number {
  return HTTP_STATUS[code];
}

/**
 * Narrows a string (such as the `status` of a Google API error body) to an ErrorCode.
 */
export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && ERROR_CODES.some((c) => c === value);
}

export class AdminError extends Error {
  readonly code: ErrorCode;
  readonly children: unknown[];
  readonly context: unknown | undefined;
  readonly exit: number;
  readonly name: string = "AdminError";
  readonly original: Error | undefined;
  readonly status: number;

  constructor(message: string, options: AdminErrorOptions = {}) {
    super(message);

    this.code = defaultTo(options.code, DEFAULT_CODE);
    this.children = defaultTo(options.children, DEFAULT_CHILDREN);
    this.context = options.context;
    this.exit = defaultTo(options.exit, DEFAULT_EXIT);
    this.original = options.original;
    this.status = defaultTo(options.status, httpStatusForCode(this.code));
  }

  /** Only UNAVAILABLE is safe to retry blindly. */
  get retryable(): boolean {
    return this.code === "UNAVAILABLE";
  }
}

/**
 * Thrown when a resource name does not have the expected shape.
 */
export class MalformedIdentifierError extends AdminError {
  readonly name = "MalformedIdentifierError";

  constructor(kind: string, value: string, reason: string) {
    super(`Malformed ${kind} "${value}": ${reason}`, { code: "INVALID_ARGUMENT" });
  }
}

/**
 * Thrown when operation metadata is unpacked against a type it was not packed as.
 */
export class InvalidMetadataTypeError extends AdminError {
  readonly name = "InvalidMetadataTypeError";

  constructor(
    readonly expectedType: string,
    readonly actualType: string | undefined,
  ) {
    super(
      `Operation metadata has type ${actualType ?? "[none]"}, expected ${expectedType}`,
      { code: "INVALID_ARGUMENT" },
    );
  }
}

/**
 * Thrown when a response body is not JSON, or not the shape the call returns. The
 * server's view of the resource is unknown, so a poll that sees this may try again.
 */
export class MalformedResponseError extends AdminError {
  readonly name = "MalformedResponseError";

  constructor(message: string, original?: Error) {
    super(message, { code: "UNKNOWN", original });
  }
}

/**
 * Safely gets an error message from an unknown object
 * @param err an unknown error type
 * @param defaultMsg an optional message to return if the err is not Error or string
 * @return An error string
 */
export function getErrMsg(err: unknown, defaultMsg?: string): string {
  if (err instanceof Error) {
    return err.message;
  } else if (typeof err === "string") {
    return err;
  } else if (defaultMsg) {
    return defaultMsg;
  }
  return JSON.stringify(err);
}

/**
 * A typeguard for objects
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Safely gets an error object from an unknown object
 */
export function getError(err: unknown): Error {
  if (err instanceof Error) {
    return err;
  }
  return Error(getErrMsg(err));
}

/**
 * Returns the code of an AdminError, or UNKNOWN for anything else.
 */
export function getErrCode(err: unknown): ErrorCode {
  return err instanceof AdminError ? err.code : "UNKNOWN";
}

/**
 * Outcome of an operation, for callers that prefer values to exceptions.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: AdminError };

/**
 * Wraps anything thrown into an AdminError, keeping AdminErrors as they are.
 */
export function toAdminError(err: unknown): AdminError {
  if (err instanceof AdminError) {
    return err;
  }
  return new AdminError(getErrMsg(err), { original: getError(err) });
}
