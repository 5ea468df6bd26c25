// Types
export { Quadrant, QuadrantName, QUADRANT_ORDER } from './types/index.js';
export type { TaskId, Task, NewTask, TaskUpdate, StoreEvent, StoreEventKind } from './types/index.js';

// Errors
export { TodoError, ValidationError, NotFoundError, FormatError, isTodoError } from './errors.js';
export type { TodoErrorCode } from './errors.js';

// Classifier
export { classify, quadrantOf, quadrantFlags, parseQuadrant } from './classifier/quadrant-classifier.js';
export type { QuadrantFlags } from './classifier/quadrant-classifier.js';

// Notifier
export { ChangeNotifier, SubscriptionToken } from './notifier/change-notifier.js';
export type { ChangeHandler } from './notifier/change-notifier.js';

// Store
export { TaskStore } from './store/task-store.js';
export type { TaskStoreOptions, TagCount, QuadrantMatrix } from './store/task-store.js';
export { isValidTag, compareForDisplay, sortForDisplay } from './store/task-helpers.js';
export { IdRegistry, generateId, processIds } from './store/id-registry.js';

// Codec
export { encode as encodeMarkdown, decode as decodeMarkdown } from './codec/markdown-codec.js';
export type { DecodeOptions } from './codec/markdown-codec.js';

// Parsers
export { parseDate, parseDueInput, formatDate, addDays, isIsoDate } from './parsers/date-parser.js';
export { parseSearchFilters } from './parsers/search-filter-parser.js';
export type { SearchFilters } from './parsers/search-filter-parser.js';

// Logging
export { createLogger, getLogger, levelFromEnv } from './logging/logger.js';
export type { Logger, LoggerOptions } from './logging/logger.js';

// Database
export { createDb, createTestDb, closeDb, getDefaultDbPath } from './db.js';
export type { TodoDb } from './db.js';

// Persistence
export { loadTasks, saveTasks } from './persistence/task-repository.js';
export { readTextFile, writeTextFile } from './persistence/text-file.js';

// Config
export {
  CONFIG_KEYS, isConfigKey, getConfig, setConfig,
  getExportPath, setExportPath, getHideCompleted, setHideCompleted,
} from './queries/config-queries.js';
export type { ConfigKey } from './queries/config-queries.js';
