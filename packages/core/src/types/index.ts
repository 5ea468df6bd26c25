export { Quadrant, QuadrantName, QUADRANT_ORDER } from './quadrant.js';
export type { TaskId, Task, NewTask, TaskUpdate } from './task.js';
export type { StoreEvent, StoreEventKind } from './events.js';
