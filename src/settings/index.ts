import { eq } from 'drizzle-orm';
import { getDatabase, schema } from '../db/index.js';
import { ValidationSettingsSchema, type ValidationSettings } from './schema.js';

export * from './schema.js';

const SETTINGS_ROW_ID = 1;

/**
 * Persistence for the validation settings document. The tenant validation
 * service only reads and writes through this interface.
 */
export interface SettingsStore {
  load(): Promise<ValidationSettings | null>;
  save(settings: ValidationSettings): Promise<void>;
}

export function createSettingsStore(): SettingsStore {
  return {
    async load() {
      const db = getDatabase();
      const row = db
        .select()
        .from(schema.validationSettings)
        .where(eq(schema.validationSettings.id, SETTINGS_ROW_ID))
        .get();

      if (!row) {
        return null;
      }
      return ValidationSettingsSchema.parse(JSON.parse(row.document));
    },

    async save(settings) {
      const db = getDatabase();
      const now = new Date().toISOString();
      const document = JSON.stringify(settings);

      db.insert(schema.validationSettings)
        .values({ id: SETTINGS_ROW_ID, document, updatedAt: now })
        .onConflictDoUpdate({
          target: schema.validationSettings.id,
          set: { document, updatedAt: now },
        })
        .run();
    },
  };
}
