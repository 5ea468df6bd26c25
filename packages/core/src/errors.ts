/**
 * Error taxonomy shared by the store and the codec.
 * Validation and not-found errors are raised before any state changes.
 */

import type { TaskId } from './types/task.js';

export type TodoErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'FORMAT';

export class TodoError extends Error {
  readonly code: TodoErrorCode;

  constructor(code: TodoErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TodoError';
    this.code = code;
  }
}

/** Bad input shape: empty title, invalid tag or date, duplicate id on replace */
export class ValidationError extends TodoError {
  constructor(message: string) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends TodoError {
  readonly taskId: TaskId;

  constructor(taskId: TaskId) {
    super('NOT_FOUND', `Could not find task with id ${taskId}`);
    this.name = 'NotFoundError';
    this.taskId = taskId;
  }
}

/** Input that cannot be read as UTF-8 text at all */
export class FormatError extends TodoError {
  constructor(message: string, options?: ErrorOptions) {
    super('FORMAT', message, options);
    this.name = 'FormatError';
  }
}

export function isTodoError(err: unknown): err is TodoError {
  return err instanceof TodoError;
}
