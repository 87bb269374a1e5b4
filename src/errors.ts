/**
 * Error types surfaced to callers of the runner, the store and config loading.
 * Device and transcription failures never reach callers; they are logged and
 * degraded to empty data at the point of use.
 */

export type TaskRunnerErrorCode = "INVALID_STATE" | "NO_ACTIVE_TASK";

export class TaskRunnerError extends Error {
  readonly code: TaskRunnerErrorCode;

  constructor(code: TaskRunnerErrorCode, message: string) {
    super(message);
    this.name = "TaskRunnerError";
    this.code = code;
  }

  static invalidState(message = "Invalid state for operation"): TaskRunnerError {
    return new TaskRunnerError("INVALID_STATE", message);
  }

  static noActiveTask(): TaskRunnerError {
    return new TaskRunnerError("NO_ACTIVE_TASK", "No active task");
  }
}

export type StoreErrorCode = "NOT_FOUND" | "INVALID_RECORD";

export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string) {
    super(message);
    this.name = "StoreError";
    this.code = code;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
