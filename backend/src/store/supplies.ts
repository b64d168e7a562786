/**
 * Supply repository
 *
 * Pure data access for the supplies and supply_usage tables. Quantity level
 * is stored alongside the optional amount and always re-derived from the
 * amount when one is written.
 */

import type Database from 'better-sqlite3';
import type { QuantityLevel, Supply, SupplySummary } from '../../../shared/types.js';
import { optional } from './database.js';

interface SupplyRow {
  id: number;
  name: string;
  category: string;
  brand: string | null;
  color: string | null;
  size: string | null;
  unit: string | null;
  notes: string | null;
  quantity_level: QuantityLevel;
  amount: number | null;
  created_at: string;
  updated_at: string;
  superseded_by: number | null;
}

export interface NewSupply {
  name: string;
  category: string;
  brand?: string;
  color?: string;
  size?: string;
  unit?: string;
  notes?: string;
  quantityLevel: QuantityLevel;
  amount?: number;
}

export type SupplyPatch = Partial<NewSupply>;

export interface UsageResult {
  supply: Supply;
  previousLevel: QuantityLevel;
  amountUsed: number;
}

/**
 * Level for a known amount: nothing left is empty, half a unit or less is
 * low, anything above is plenty.
 */
export function levelForAmount(amount: number): QuantityLevel {
  if (amount <= 0) return 'empty';
  if (amount <= 0.5) return 'low';
  return 'plenty';
}

/** Assumed amount when only the level is known */
export function nominalAmount(level: QuantityLevel): number {
  switch (level) {
    case 'plenty':
      return 1;
    case 'low':
      return 0.5;
    case 'empty':
      return 0;
  }
}

function clampAmount(amount: number): number {
  return Math.max(0, Math.min(1, amount));
}

function toSupply(row: SupplyRow): Supply {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    brand: optional(row.brand),
    color: optional(row.color),
    size: optional(row.size),
    unit: optional(row.unit),
    notes: optional(row.notes),
    quantityLevel: row.quantity_level,
    amount: optional(row.amount),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    supersededBy: optional(row.superseded_by),
  };
}

export class SupplyRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => string,
  ) {}

  list(options: { category?: string; includeSuperseded?: boolean } = {}): Supply[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (!options.includeSuperseded) clauses.push('superseded_by IS NULL');
    if (options.category) {
      clauses.push('LOWER(category) = LOWER(?)');
      params.push(options.category);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.db
      .prepare<string[], SupplyRow>(`SELECT * FROM supplies ${where} ORDER BY category, name, id`)
      .all(...params)
      .map(toSupply);
  }

  get(id: number): Supply | undefined {
    const row = this.db.prepare<[number], SupplyRow>('SELECT * FROM supplies WHERE id = ?').get(id);
    return row ? toSupply(row) : undefined;
  }

  search(query: string): Supply[] {
    const term = `%${query.toLowerCase()}%`;
    return this.db
      .prepare<string[], SupplyRow>(
        `SELECT * FROM supplies
         WHERE superseded_by IS NULL
           AND (LOWER(name) LIKE ? OR LOWER(COALESCE(brand, '')) LIKE ?
                OR LOWER(category) LIKE ? OR LOWER(COALESCE(color, '')) LIKE ?)
         ORDER BY category, name, id`,
      )
      .all(term, term, term, term)
      .map(toSupply);
  }

  /** Current supplies that are low or empty, emptiest first */
  lowStock(): Supply[] {
    return this.db
      .prepare<[], SupplyRow>(
        `SELECT * FROM supplies
         WHERE superseded_by IS NULL AND quantity_level IN ('low', 'empty')
         ORDER BY CASE quantity_level WHEN 'empty' THEN 0 ELSE 1 END, category, name, id`,
      )
      .all()
      .map(toSupply);
  }

  summary(): SupplySummary {
    const rows = this.db
      .prepare<[], { quantity_level: QuantityLevel; count: number }>(
        `SELECT quantity_level, COUNT(*) AS count FROM supplies
         WHERE superseded_by IS NULL GROUP BY quantity_level`,
      )
      .all();
    const summary: SupplySummary = { total: 0, plenty: 0, low: 0, empty: 0 };
    for (const row of rows) {
      summary[row.quantity_level] = row.count;
      summary.total += row.count;
    }
    return summary;
  }

  create(input: NewSupply): Supply {
    const timestamp = this.now();
    const amount = input.amount === undefined ? null : clampAmount(input.amount);
    const level = amount === null ? input.quantityLevel : levelForAmount(amount);
    const result = this.db
      .prepare(
        `INSERT INTO supplies
           (name, category, brand, color, size, unit, notes, quantity_level, amount, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.name,
        input.category,
        input.brand ?? null,
        input.color ?? null,
        input.size ?? null,
        input.unit ?? null,
        input.notes ?? null,
        level,
        amount,
        timestamp,
        timestamp,
      );
    return this.require(Number(result.lastInsertRowid));
  }

  /** Returns undefined when the supply does not exist */
  update(id: number, patch: SupplyPatch): Supply | undefined {
    return this.db.transaction((): Supply | undefined => {
      const current = this.get(id);
      if (!current) return undefined;

      const merged: NewSupply = {
        name: patch.name ?? current.name,
        category: patch.category ?? current.category,
        brand: patch.brand ?? current.brand,
        color: patch.color ?? current.color,
        size: patch.size ?? current.size,
        unit: patch.unit ?? current.unit,
        notes: patch.notes ?? current.notes,
        quantityLevel: patch.quantityLevel ?? current.quantityLevel,
        amount: patch.amount ?? current.amount,
      };
      let amount = merged.amount === undefined ? null : clampAmount(merged.amount);
      let level = merged.quantityLevel;
      if (patch.amount !== undefined && amount !== null) {
        level = levelForAmount(amount);
      } else if (patch.quantityLevel !== undefined) {
        // A new level without an amount invalidates the old amount
        amount = null;
      }

      this.db
        .prepare(
          `UPDATE supplies SET name = ?, category = ?, brand = ?, color = ?, size = ?, unit = ?,
             notes = ?, quantity_level = ?, amount = ?, updated_at = ? WHERE id = ?`,
        )
        .run(
          merged.name,
          merged.category,
          merged.brand ?? null,
          merged.color ?? null,
          merged.size ?? null,
          merged.unit ?? null,
          merged.notes ?? null,
          level,
          amount,
          this.now(),
          id,
        );
      return this.get(id);
    })();
  }

  /** Record that part of a supply was used, lowering its amount */
  recordUsage(id: number, amountUsed: number, projectId?: number): UsageResult | undefined {
    return this.db.transaction((): UsageResult | undefined => {
      const current = this.get(id);
      if (!current) return undefined;

      const before = current.amount ?? nominalAmount(current.quantityLevel);
      const after = clampAmount(before - amountUsed);
      const timestamp = this.now();

      this.db
        .prepare('UPDATE supplies SET amount = ?, quantity_level = ?, updated_at = ? WHERE id = ?')
        .run(after, levelForAmount(after), timestamp, id);
      this.db
        .prepare('INSERT INTO supply_usage (supply_id, project_id, amount_used, used_at) VALUES (?, ?, ?, ?)')
        .run(id, projectId ?? null, amountUsed, timestamp);

      return { supply: this.require(id), previousLevel: current.quantityLevel, amountUsed };
    })();
  }

  usageFor(id: number): Array<{ projectId?: number; amountUsed: number; usedAt: string }> {
    return this.db
      .prepare<[number], { project_id: number | null; amount_used: number; used_at: string }>(
        'SELECT project_id, amount_used, used_at FROM supply_usage WHERE supply_id = ? ORDER BY id',
      )
      .all(id)
      .map(row => ({ projectId: optional(row.project_id), amountUsed: row.amount_used, usedAt: row.used_at }));
  }

  /**
   * Replace a supply with a new record. The old one stays, pointing at its
   * successor. Returns undefined when the old supply does not exist.
   */
  supersede(id: number, replacement: NewSupply): { previous: Supply; supply: Supply } | undefined {
    return this.db.transaction(() => {
      const previous = this.get(id);
      if (!previous) return undefined;

      const supply = this.create(replacement);
      this.db
        .prepare('UPDATE supplies SET superseded_by = ?, updated_at = ? WHERE id = ?')
        .run(supply.id, this.now(), id);
      return { previous: this.require(id), supply };
    })();
  }

  private require(id: number): Supply {
    const supply = this.get(id);
    if (!supply) {
      throw new Error(`Supply ${id} vanished during write`);
    }
    return supply;
  }
}

