import TaskError from "./task-error";

/**
 * The client-side budget for a task ran out. Whatever the task was waiting on
 * (such as a server-side operation) may still be running.
 */
export default class TimeoutError extends TaskError {
  readonly name = "TimeoutError";

  constructor(taskName: string, timeout: number) {
    super(taskName, `timed out after ${timeout}ms.`, { code: "DEADLINE_EXCEEDED" });
  }
}
