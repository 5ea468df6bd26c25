/**
 * In-memory task collection keyed by id. Every mutation validates first,
 * then applies, then notifies subscribers; a failed call changes nothing
 * and emits nothing.
 */

import type { NewTask, Task, TaskId, TaskUpdate } from '../types/task.js';
import type { StoreEvent } from '../types/events.js';
import { Quadrant, QUADRANT_ORDER } from '../types/quadrant.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { quadrantOf } from '../classifier/quadrant-classifier.js';
import { ChangeNotifier, type ChangeHandler, type SubscriptionToken } from '../notifier/change-notifier.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { parseSearchFilters } from '../parsers/search-filter-parser.js';
import { matchesFilters } from './task-filter.js';
import { IdRegistry, generateId, processIds } from './id-registry.js';
import {
  compareStrings, sortForDisplay, normalizeTitle, normalizeTags, normalizeDueDate, normalizeNotes, normalizeTask,
} from './task-helpers.js';

export interface TaskStoreOptions {
  logger?: Logger;
  /** Source of "now" for createdAt/updatedAt and due-date filters */
  clock?: () => Date;
  /** Candidate id generator; the store retries until the id is unused */
  idFactory?: () => TaskId;
  /** Ids already handed out; defaults to the process-wide registry */
  ids?: IdRegistry;
}

export interface TagCount {
  readonly tag: string;
  readonly count: number;
}

export type QuadrantMatrix = Record<Quadrant, Task[]>;

export class TaskStore {
  private tasks = new Map<TaskId, Task>();
  private notifier: ChangeNotifier;
  private logger: Logger;
  private clock: () => Date;
  private idFactory: () => TaskId;
  private ids: IdRegistry;

  constructor(options: TaskStoreOptions = {}) {
    this.logger = options.logger ?? getLogger('task-store');
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? generateId;
    this.ids = options.ids ?? processIds;
    this.notifier = new ChangeNotifier(this.logger);
  }

  get size(): number {
    return this.tasks.size;
  }

  // ---------------------------------------------------------------------------
  // Subscriptions
  // ---------------------------------------------------------------------------

  subscribe(handler: ChangeHandler): SubscriptionToken {
    return this.notifier.subscribe(handler);
  }

  unsubscribe(token: SubscriptionToken): void {
    this.notifier.unsubscribe(token);
  }

  /** Drop every subscriber. The collection itself is left as is. */
  dispose(): void {
    this.notifier.clear();
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  add(input: NewTask): Task {
    const title = normalizeTitle(input.title);
    const tags = normalizeTags(input.tags ?? []);
    const dueDate = normalizeDueDate(input.dueDate);
    const notes = normalizeNotes(input.notes);
    const now = this.clock().toISOString();

    const task: Task = Object.freeze({
      id: this.ids.issue(this.idFactory),
      title,
      urgent: input.urgent ?? false,
      important: input.important ?? false,
      tags,
      dueDate,
      notes,
      completed: false,
      createdAt: now,
      updatedAt: now,
    });

    this.tasks.set(task.id, task);
    this.logger.debug({ id: task.id, quadrant: quadrantOf(task) }, 'task added');
    this.emit({ kind: 'added', id: task.id });
    return task;
  }

  update(id: TaskId, fields: TaskUpdate): Task {
    const current = this.require(id);

    const updated: Task = Object.freeze({
      ...current,
      title: fields.title !== undefined ? normalizeTitle(fields.title) : current.title,
      urgent: fields.urgent ?? current.urgent,
      important: fields.important ?? current.important,
      tags: fields.tags !== undefined ? normalizeTags(fields.tags) : current.tags,
      dueDate: fields.dueDate !== undefined ? normalizeDueDate(fields.dueDate) : current.dueDate,
      notes: fields.notes !== undefined ? normalizeNotes(fields.notes) : current.notes,
      completed: fields.completed ?? current.completed,
      updatedAt: this.clock().toISOString(),
    });

    this.tasks.set(id, updated);
    this.logger.debug({ id, fields: Object.keys(fields) }, 'task updated');
    this.emit({ kind: 'updated', id });
    return updated;
  }

  remove(id: TaskId): void {
    this.require(id);
    this.tasks.delete(id);
    this.logger.debug({ id }, 'task removed');
    this.emit({ kind: 'removed', id });
  }

  toggleCompleted(id: TaskId): Task {
    const current = this.require(id);
    return this.update(id, { completed: !current.completed });
  }

  /**
   * Swap the whole collection (import / load). Validates everything up
   * front and emits a single reset event.
   */
  replace(tasks: readonly Task[]): void {
    const next = new Map<TaskId, Task>();
    for (const task of tasks) {
      if (next.has(task.id)) throw new ValidationError(`Duplicate task id '${task.id}'`);
      next.set(task.id, normalizeTask(task));
    }

    for (const id of next.keys()) this.ids.claim(id);
    this.tasks = next;
    this.logger.debug({ count: next.size }, 'store replaced');
    this.emit({ kind: 'reset' });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get(id: TaskId): Task | null {
    return this.tasks.get(id) ?? null;
  }

  has(id: TaskId): boolean {
    return this.tasks.has(id);
  }

  /** Snapshot of every task in insertion order */
  list(): Task[] {
    return [...this.tasks.values()];
  }

  listByQuadrant(quadrant: Quadrant): Task[] {
    return sortForDisplay(this.list().filter(t => quadrantOf(t) === quadrant));
  }

  /** All four quadrants, each in display order */
  matrix(): QuadrantMatrix {
    const matrix: QuadrantMatrix = {
      [Quadrant.DoFirst]: [],
      [Quadrant.Schedule]: [],
      [Quadrant.Delegate]: [],
      [Quadrant.Eliminate]: [],
    };
    for (const task of this.tasks.values()) {
      matrix[quadrantOf(task)].push(task);
    }
    for (const q of QUADRANT_ORDER) {
      matrix[q] = sortForDisplay(matrix[q]);
    }
    return matrix;
  }

  /** Tasks carrying the tag, compared case-insensitively like `tag:` in search */
  listByTag(tag: string): Task[] {
    const wanted = tag.trim().replace(/^#/, '').toLowerCase();
    return this.sorted(this.list().filter(t => t.tags.some(x => x.toLowerCase() === wanted)));
  }

  /** Tag catalogue with usage counts, sorted by tag */
  tagCounts(): TagCount[] {
    const counts = new Map<string, number>();
    for (const task of this.tasks.values()) {
      for (const tag of task.tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }
    return [...counts.entries()]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([tag, count]) => ({ tag, count }));
  }

  /** Search by free text and filters (tag:x quadrant:q1 status:done due:today ...) */
  search(query: string): Task[] {
    const filters = parseSearchFilters(query);
    const today = this.clock();
    return this.sorted(this.list().filter(t => matchesFilters(t, filters, today)));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private require(id: TaskId): Task {
    const task = this.tasks.get(id);
    if (!task) throw new NotFoundError(id);
    return task;
  }

  /** Quadrant order first, then display order within each quadrant */
  private sorted(tasks: Task[]): Task[] {
    return QUADRANT_ORDER.flatMap(q => sortForDisplay(tasks.filter(t => quadrantOf(t) === q)));
  }

  private emit(event: StoreEvent): void {
    this.notifier.notify(event);
  }
}
