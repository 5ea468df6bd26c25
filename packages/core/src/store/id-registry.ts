import type { TaskId } from '../types/task.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 4;
const MAX_ATTEMPTS = 1000;

/** Random 4-character base36 candidate */
export function generateId(): TaskId {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_CHARS.charAt(Math.floor(Math.random() * ID_CHARS.length));
  }
  return id;
}

/**
 * Every id issued or loaded so far. An id is never issued twice, even
 * after its task has been removed.
 */
export class IdRegistry {
  private ids = new Set<TaskId>();

  has(id: TaskId): boolean {
    return this.ids.has(id);
  }

  claim(id: TaskId): void {
    this.ids.add(id);
  }

  /** Draw candidates until one has never been seen, and claim it */
  issue(factory: () => TaskId = generateId): TaskId {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const id = factory();
      if (!this.ids.has(id)) {
        this.ids.add(id);
        return id;
      }
    }
    throw new Error(`Could not allocate a free task id after ${MAX_ATTEMPTS} attempts`);
  }
}

/** Shared by every store and decode call not given a registry of its own */
export const processIds = new IdRegistry();
