import type Database from 'better-sqlite3';
import type { StylePreference } from '../../../shared/types.js';

interface PreferenceRow {
  id: number;
  category: string;
  value: string;
  source: StylePreference['source'];
  created_at: string;
}

export class PreferenceRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => string,
  ) {}

  list(): StylePreference[] {
    return this.db
      .prepare<[], PreferenceRow>('SELECT * FROM style_preferences ORDER BY id')
      .all()
      .map(row => ({
        id: row.id,
        category: row.category,
        value: row.value,
        source: row.source,
        createdAt: row.created_at,
      }));
  }

  /** Saving the same category/value twice returns the existing record */
  save(input: { category: string; value: string; source: StylePreference['source'] }): StylePreference {
    const existing = this.list().find(
      p => p.category.toLowerCase() === input.category.toLowerCase() && p.value.toLowerCase() === input.value.toLowerCase(),
    );
    if (existing) return existing;

    const createdAt = this.now();
    const result = this.db
      .prepare('INSERT INTO style_preferences (category, value, source, created_at) VALUES (?, ?, ?, ?)')
      .run(input.category, input.value, input.source, createdAt);
    return { id: Number(result.lastInsertRowid), ...input, createdAt };
  }
}
