import { AdminError, ErrorCode } from "../../error";

export default abstract class TaskError extends AdminError {
  constructor(
    taskName: string,
    message: string,
    options: { code?: ErrorCode; original?: Error } = {},
  ) {
    super(`Task ${taskName} failed: ${message}`, options);
  }
}
