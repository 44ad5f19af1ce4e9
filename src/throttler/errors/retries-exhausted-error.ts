import { getErrCode } from "../../error";
import TaskError from "./task-error";

/**
 * Every attempt a task was allowed failed. The code is the last failure's, or
 * DEADLINE_EXCEEDED when that failure carried none: for the operation poller that
 * means the operation was still running after the last allowed poll.
 */
export default class RetriesExhaustedError extends TaskError {
  readonly name = "RetriesExhaustedError";
  readonly attempts: number;

  constructor(taskName: string, retries: number, lastError: Error) {
    const attempts = retries + 1;
    const code = getErrCode(lastError);
    super(taskName, `retries exhausted after ${attempts} attempts, with error: ${lastError.message}`, {
      code: code === "UNKNOWN" ? "DEADLINE_EXCEEDED" : code,
      original: lastError,
    });
    this.attempts = attempts;
  }
}
