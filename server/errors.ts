export class TaskValidationError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "TaskValidationError";
  }
}

export class BlockNotFoundError extends TaskValidationError {
  readonly blockType: string;
  readonly blockName: string;

  constructor(blockType: string, blockName: string) {
    super(`${capitalize(blockType)} block ${blockName} not found`);
    this.name = "BlockNotFoundError";
    this.blockType = blockType;
    this.blockName = blockName;
  }
}

export class TaskAlreadyRunningError extends Error {
  readonly statusCode = 409;
  readonly taskId: string;
  readonly runId: string;

  constructor(taskId: string, runId: string) {
    super("Task is already running");
    this.name = "TaskAlreadyRunningError";
    this.taskId = taskId;
    this.runId = runId;
  }
}

export function capitalize(value: string): string {
  return value.length === 0 ? value : `${value[0].toUpperCase()}${value.slice(1)}`;
}

export function isTaskValidationError(error: unknown): error is TaskValidationError {
  return error instanceof TaskValidationError;
}

export function isTaskAlreadyRunningError(error: unknown): error is TaskAlreadyRunningError {
  return error instanceof TaskAlreadyRunningError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : String(error);
}
