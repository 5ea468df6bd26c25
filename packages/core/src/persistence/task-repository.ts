/**
 * Saves and loads whole store snapshots. The store never talks to the
 * database itself; callers load on start and save after mutating.
 */

import { asc } from 'drizzle-orm';
import type { TodoDb } from '../db.js';
import type { Task } from '../types/task.js';
import { tasks } from '../schema/tasks.js';

type TaskRow = typeof tasks.$inferSelect;
type NewTaskRow = typeof tasks.$inferInsert;

/** Serialize tags array to JSON for storage, or null if empty */
export function serializeTags(tags: readonly string[]): string | null {
  if (tags.length === 0) return null;
  return JSON.stringify(tags);
}

/** Deserialize tags from JSON string; empty when missing or malformed */
export function deserializeTags(json: string | null): string[] {
  if (!json) return [];
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
  } catch {
    return [];
  }
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    urgent: row.urgent,
    important: row.important,
    tags: deserializeTags(row.tags),
    dueDate: row.dueDate,
    notes: row.notes,
    completed: row.completed,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** All persisted tasks in their saved order */
export function loadTasks(db: TodoDb): Task[] {
  return db.select().from(tasks).orderBy(asc(tasks.position)).all().map(toTask);
}

/** Rows per INSERT; keeps each statement under SQLite's bound-parameter limit */
const SAVE_BATCH_SIZE = 500;

function toRow(task: Task, position: number): NewTaskRow {
  return {
    id: task.id,
    title: task.title,
    urgent: task.urgent,
    important: task.important,
    tags: serializeTags(task.tags),
    dueDate: task.dueDate,
    notes: task.notes,
    completed: task.completed,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
    position,
  };
}

/** Replace the persisted collection with a snapshot, in one transaction */
export function saveTasks(db: TodoDb, snapshot: readonly Task[]): void {
  const rows = snapshot.map(toRow);
  db.transaction((tx) => {
    tx.delete(tasks).run();
    for (let start = 0; start < rows.length; start += SAVE_BATCH_SIZE) {
      tx.insert(tasks).values(rows.slice(start, start + SAVE_BATCH_SIZE)).run();
    }
  });
}
