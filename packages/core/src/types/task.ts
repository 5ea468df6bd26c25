export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly urgent: boolean;
  readonly important: boolean;
  /** De-duplicated, sorted by code point */
  readonly tags: readonly string[];
  readonly dueDate: string | null; // yyyy-MM-dd
  readonly notes: string | null;
  readonly completed: boolean;
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

/** Input for TaskStore.add */
export interface NewTask {
  title: string;
  urgent?: boolean;
  important?: boolean;
  tags?: readonly string[];
  dueDate?: string | null;
  notes?: string | null;
}

/**
 * Partial update. A field left out (or undefined) is untouched;
 * `null` clears the nullable ones.
 */
export interface TaskUpdate {
  title?: string;
  urgent?: boolean;
  important?: boolean;
  tags?: readonly string[];
  dueDate?: string | null;
  notes?: string | null;
  completed?: boolean;
}
