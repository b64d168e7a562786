/**
 * Project repository
 *
 * Projects plus their advisory links to supplies (project_supplies).
 * Status rules live in the project tools; this layer stores what it is given.
 */

import type Database from 'better-sqlite3';
import type { Project, ProjectStats, ProjectStatus } from '../../../shared/types.js';
import { optional, parseList } from './database.js';

interface ProjectRow {
  id: number;
  title: string;
  description: string | null;
  status: ProjectStatus;
  medium: string | null;
  style: string | null;
  materials: string;
  steps: string;
  notes: string | null;
  estimated_budget: number | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export interface NewProject {
  title: string;
  description?: string;
  status: ProjectStatus;
  medium?: string;
  style?: string;
  materials?: string[];
  steps?: string[];
  notes?: string;
  estimatedBudget?: number;
}

export type ProjectPatch = Partial<NewProject>;

export class ProjectRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => string,
  ) {}

  list(options: { status?: ProjectStatus } = {}): Project[] {
    const rows = options.status
      ? this.db
          .prepare<[string], ProjectRow>('SELECT * FROM projects WHERE status = ? ORDER BY updated_at DESC, id DESC')
          .all(options.status)
      : this.db.prepare<[], ProjectRow>('SELECT * FROM projects ORDER BY updated_at DESC, id DESC').all();
    return rows.map(row => this.toProject(row));
  }

  get(id: number): Project | undefined {
    const row = this.db.prepare<[number], ProjectRow>('SELECT * FROM projects WHERE id = ?').get(id);
    return row ? this.toProject(row) : undefined;
  }

  stats(): ProjectStats {
    const rows = this.db
      .prepare<[], { status: ProjectStatus; count: number }>(
        'SELECT status, COUNT(*) AS count FROM projects GROUP BY status',
      )
      .all();
    const byStatus: Record<ProjectStatus, number> = { idea: 0, 'in-progress': 0, completed: 0 };
    let total = 0;
    for (const row of rows) {
      byStatus[row.status] = row.count;
      total += row.count;
    }
    return { total, byStatus };
  }

  create(input: NewProject): Project {
    const timestamp = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO projects
           (title, description, status, medium, style, materials, steps, notes, estimated_budget,
            created_at, updated_at, completed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.title,
        input.description ?? null,
        input.status,
        input.medium ?? null,
        input.style ?? null,
        JSON.stringify(input.materials ?? []),
        JSON.stringify(input.steps ?? []),
        input.notes ?? null,
        input.estimatedBudget ?? null,
        timestamp,
        timestamp,
        input.status === 'completed' ? timestamp : null,
      );
    return this.require(Number(result.lastInsertRowid));
  }

  /** Returns undefined when the project does not exist */
  update(id: number, patch: ProjectPatch): Project | undefined {
    return this.db.transaction((): Project | undefined => {
      const current = this.get(id);
      if (!current) return undefined;

      const timestamp = this.now();
      const status = patch.status ?? current.status;
      let completedAt = current.completedAt ?? null;
      if (status === 'completed' && current.status !== 'completed') completedAt = timestamp;
      if (status !== 'completed') completedAt = null;

      this.db
        .prepare(
          `UPDATE projects SET title = ?, description = ?, status = ?, medium = ?, style = ?,
             materials = ?, steps = ?, notes = ?, estimated_budget = ?, updated_at = ?, completed_at = ?
           WHERE id = ?`,
        )
        .run(
          patch.title ?? current.title,
          patch.description ?? current.description ?? null,
          status,
          patch.medium ?? current.medium ?? null,
          patch.style ?? current.style ?? null,
          JSON.stringify(patch.materials ?? current.materials),
          JSON.stringify(patch.steps ?? current.steps),
          patch.notes ?? current.notes ?? null,
          patch.estimatedBudget ?? current.estimatedBudget ?? null,
          timestamp,
          completedAt,
          id,
        );
      return this.get(id);
    })();
  }

  /** Append a dated block to the project's notes */
  appendNotes(id: number, notes: string): Project | undefined {
    return this.db.transaction((): Project | undefined => {
      const current = this.get(id);
      if (!current) return undefined;

      const timestamp = this.now();
      const entry = `[${timestamp.slice(0, 10)}] ${notes}`;
      const combined = current.notes ? `${current.notes}\n${entry}` : entry;
      this.db
        .prepare('UPDATE projects SET notes = ?, updated_at = ? WHERE id = ?')
        .run(combined, timestamp, id);
      return this.get(id);
    })();
  }

  /** Link supplies to a project. Already-linked ids are ignored. */
  linkSupplies(id: number, supplyIds: number[]): Project | undefined {
    return this.db.transaction((): Project | undefined => {
      if (!this.get(id)) return undefined;

      const insert = this.db.prepare(
        'INSERT OR IGNORE INTO project_supplies (project_id, supply_id) VALUES (?, ?)',
      );
      for (const supplyId of supplyIds) {
        insert.run(id, supplyId);
      }
      this.db.prepare('UPDATE projects SET updated_at = ? WHERE id = ?').run(this.now(), id);
      return this.get(id);
    })();
  }

  private supplyIdsFor(id: number): number[] {
    return this.db
      .prepare<[number], { supply_id: number }>(
        'SELECT supply_id FROM project_supplies WHERE project_id = ? ORDER BY supply_id',
      )
      .all(id)
      .map(row => row.supply_id);
  }

  private toProject(row: ProjectRow): Project {
    return {
      id: row.id,
      title: row.title,
      description: optional(row.description),
      status: row.status,
      medium: optional(row.medium),
      style: optional(row.style),
      materials: parseList(row.materials),
      steps: parseList(row.steps),
      notes: optional(row.notes),
      estimatedBudget: optional(row.estimated_budget),
      supplyIds: this.supplyIdsFor(row.id),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      completedAt: optional(row.completed_at),
    };
  }

  private require(id: number): Project {
    const project = this.get(id);
    if (!project) {
      throw new Error(`Project ${id} vanished during write`);
    }
    return project;
  }
}
