import type { Task } from '../types/task.js';
import { ValidationError } from '../errors.js';
import { isIsoDate } from '../parsers/date-parser.js';

const TAG_RE = /^[\p{L}\p{N}_-]+$/u;

export function isValidTag(tag: string): boolean {
  return TAG_RE.test(tag);
}

/** Trim and check a title: non-empty, single line */
export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) throw new ValidationError('Task title cannot be empty');
  if (/[\r\n]/.test(trimmed)) throw new ValidationError('Task title must be a single line');
  return trimmed;
}

/** Strip a leading '#', validate, de-duplicate and sort (by code point) */
export function normalizeTags(tags: readonly string[]): readonly string[] {
  const result = new Set<string>();
  for (const raw of tags) {
    const tag = raw.trim().replace(/^#/, '');
    if (!isValidTag(tag)) throw new ValidationError(`Invalid tag '${raw}' (letters, digits, '_' and '-' only)`);
    result.add(tag);
  }
  return Object.freeze([...result].sort(compareStrings));
}

export function normalizeDueDate(dueDate: string | null | undefined): string | null {
  if (dueDate == null) return null;
  const trimmed = dueDate.trim();
  if (!isIsoDate(trimmed)) throw new ValidationError(`Invalid due date '${dueDate}' (expected yyyy-MM-dd)`);
  return trimmed;
}

/** Notes keep their inner line breaks; blank notes become null */
export function normalizeNotes(notes: string | null | undefined): string | null {
  if (notes == null) return null;
  const normalized = notes.replace(/\r\n?/g, '\n').trim();
  return normalized ? normalized : null;
}

/** Validate every field of a complete task and return a frozen, normalized copy */
export function normalizeTask(task: Task): Task {
  if (!task.id.trim()) throw new ValidationError('Task id cannot be empty');
  return Object.freeze({
    id: task.id,
    title: normalizeTitle(task.title),
    urgent: task.urgent,
    important: task.important,
    tags: normalizeTags(task.tags),
    dueDate: normalizeDueDate(task.dueDate),
    notes: normalizeNotes(task.notes),
    completed: task.completed,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  });
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Display order within a quadrant: incomplete first, then due date
 * ascending with undated tasks last, then oldest first.
 */
export function compareForDisplay(a: Task, b: Task): number {
  if (a.completed !== b.completed) return a.completed ? 1 : -1;

  if (a.dueDate !== b.dueDate) {
    if (a.dueDate === null) return 1;
    if (b.dueDate === null) return -1;
    return compareStrings(a.dueDate, b.dueDate);
  }

  return compareStrings(a.createdAt, b.createdAt);
}

/** Stable sort into display order (returns new array) */
export function sortForDisplay(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareForDisplay);
}
