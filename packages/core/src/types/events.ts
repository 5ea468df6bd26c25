import type { TaskId } from './task.js';

/** Emitted by TaskStore after every successful mutation */
export type StoreEvent =
  | { readonly kind: 'added'; readonly id: TaskId }
  | { readonly kind: 'updated'; readonly id: TaskId }
  | { readonly kind: 'removed'; readonly id: TaskId }
  | { readonly kind: 'reset' };

export type StoreEventKind = StoreEvent['kind'];
