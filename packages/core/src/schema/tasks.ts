import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  urgent: integer('urgent', { mode: 'boolean' }).notNull().default(false),
  important: integer('important', { mode: 'boolean' }).notNull().default(false),
  /** JSON array of strings, stored as TEXT */
  tags: text('tags'),
  dueDate: text('due_date'),
  notes: text('notes'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  /** Insertion order of the in-memory store */
  position: integer('position').notNull().default(0),
}, (table) => [
  index('idx_tasks_flags').on(table.urgent, table.important),
  index('idx_tasks_position').on(table.position),
]);
