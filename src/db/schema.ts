import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

// Single-row table: the tenant validation settings document
export const validationSettings = sqliteTable('validation_settings', {
  id: integer('id').primaryKey(),
  document: text('document').notNull(), // JSON
  updatedAt: text('updated_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

export type InsertValidationSettings = typeof validationSettings.$inferInsert;
export type SelectValidationSettings = typeof validationSettings.$inferSelect;
