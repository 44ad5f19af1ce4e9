import * as _ from "lodash";

import {
  AdminError,
  codeFromHttpStatus,
  codeFromRpcCode,
  isErrorCode,
  isObject,
} from "./error";

interface ErrorBody {
  error: {
    message?: string;
    status?: string;
    code?: number;
    details?: unknown[];
  };
}

function normalizeBody(statusCode: number, body: unknown): ErrorBody {
  if (typeof body === "string") {
    if (statusCode === 404) {
      return { error: { message: "Not Found" } };
    }
    try {
      return normalizeBody(statusCode, JSON.parse(body));
    } catch (e: unknown) {
      return { error: { message: body } };
    }
  }

  if (isObject(body) && isObject(body.error)) {
    const error = body.error;
    return {
      error: {
        message: typeof error.message === "string" ? error.message : undefined,
        status: typeof error.status === "string" ? error.status : undefined,
        code: typeof error.code === "number" ? error.code : undefined,
        details: Array.isArray(error.details) ? error.details : undefined,
      },
    };
  }
  if (isObject(body) && typeof body.error === "string") {
    return { error: { message: body.error } };
  }

  return { error: { message: statusCode === 404 ? "Not Found" : "Unknown Error" } };
}

/**
 * Converts an HTTP error response into an AdminError. Returns undefined for
 * non-error status codes.
 */
export function errorFromResponse(
  statusCode: number,
  body: unknown,
  url?: string,
): AdminError | undefined {
  if (statusCode < 400) {
    return;
  }
  const normalized = normalizeBody(statusCode, body);

  let message = `HTTP Error: ${statusCode}, ${normalized.error.message || "Unknown Error"}`;
  if (url) {
    message = `Request to ${url} had ${message}`;
  }

  const status = normalized.error.status;
  const code = isErrorCode(status) ? status : codeFromHttpStatus(statusCode);

  return new AdminError(message, {
    code,
    context: {
      body: _.omitBy(normalized, _.isUndefined),
    },
    // 5xx errors are unexpected
    exit: statusCode >= 500 ? 2 : 1,
    status: statusCode,
  });
}

/**
 * Converts the google.rpc.Status of a finished operation into an AdminError.
 */
export function errorFromStatus(status: { code?: number; message?: string }): AdminError {
  const code = codeFromRpcCode(status.code ?? 2);
  return new AdminError(status.message || `Operation failed with code ${code}`, {
    code,
    context: { status },
  });
}
