import type { TodoDb, TaskStoreOptions } from '@eisen/core';
import { TaskStore, loadTasks, saveTasks } from '@eisen/core';

/** What every command works against */
export interface CliContext {
  db: TodoDb;
  store: TaskStore;
  /** Current time, for relative dates and due labels */
  now(): Date;
  /** Write the store snapshot back to the database */
  save(): void;
}

/** Load the persisted tasks into a fresh store */
export function createContext(db: TodoDb, options: TaskStoreOptions = {}): CliContext {
  const clock = options.clock ?? (() => new Date());
  const store = new TaskStore({ ...options, clock });
  store.replace(loadTasks(db));

  return {
    db,
    store,
    now: clock,
    save: () => saveTasks(db, store.list()),
  };
}
