/**
 * State store
 *
 * Groups the repositories over one database connection. Holds data only;
 * business rules (status transitions, immutability) live in the tools.
 */

import type Database from 'better-sqlite3';
import { guardRepository, openDatabase, toStoreError } from './database.js';
import { SupplyRepository } from './supplies.js';
import { ProjectRepository } from './projects.js';
import { PortfolioRepository } from './portfolio.js';
import { PreferenceRepository } from './preferences.js';

export interface StudioStore {
  supplies: SupplyRepository;
  projects: ProjectRepository;
  portfolio: PortfolioRepository;
  preferences: PreferenceRepository;
  /** Run several writes atomically; any throw rolls all of them back */
  transaction<T>(fn: () => T): T;
  close(): void;
}

export function createStudioStore(
  filename: string,
  now: () => string = () => new Date().toISOString(),
): StudioStore {
  const db: Database.Database = openDatabase(filename);
  return {
    supplies: guardRepository(new SupplyRepository(db, now), 'supplies'),
    projects: guardRepository(new ProjectRepository(db, now), 'projects'),
    portfolio: guardRepository(new PortfolioRepository(db, now), 'portfolio'),
    preferences: guardRepository(new PreferenceRepository(db, now), 'preferences'),
    transaction<T>(fn: () => T): T {
      try {
        return db.transaction(fn)();
      } catch (error) {
        throw toStoreError(error);
      }
    },
    close() {
      if (db.open) db.close();
    },
  };
}

export type { NewSupply, SupplyPatch } from './supplies.js';
export type { NewProject, ProjectPatch } from './projects.js';
export type { NewPiece, PiecePatch } from './portfolio.js';
export { levelForAmount, nominalAmount } from './supplies.js';
