/**
 * Domain types for the studio companion
 *
 * These types describe studio records as they travel over HTTP, WebSocket
 * and tool results. Store rows are mapped into these shapes.
 */

// ─── Enumerations ───

export const QUANTITY_LEVELS = ['plenty', 'low', 'empty'] as const;
export type QuantityLevel = (typeof QUANTITY_LEVELS)[number];

export const PROJECT_STATUSES = ['idea', 'in-progress', 'completed'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const PIECE_STATUSES = ['sketch', 'wip', 'completed'] as const;
export type PieceStatus = (typeof PIECE_STATUSES)[number];

/**
 * Data domains a tool call can touch. Used for dashboard invalidation.
 */
export const DOMAINS = ['supplies', 'projects', 'portfolio'] as const;
export type Domain = (typeof DOMAINS)[number];

export const PANELS = [
  'supply-summary',
  'low-stock-list',
  'projects-list',
  'portfolio-grid',
  'portfolio-stats',
] as const;
export type PanelId = (typeof PANELS)[number];

// ─── Records ───

export interface Supply {
  id: number;
  name: string;
  category: string;
  brand?: string;
  color?: string;
  size?: string;
  unit?: string;
  notes?: string;
  quantityLevel: QuantityLevel;
  /** Fraction of a full unit (1 = full tube), when known */
  amount?: number;
  createdAt: string;
  updatedAt: string;
  supersededBy?: number;
}

export interface Project {
  id: number;
  title: string;
  description?: string;
  status: ProjectStatus;
  medium?: string;
  style?: string;
  materials: string[];
  steps: string[];
  notes?: string;
  estimatedBudget?: number;
  supplyIds: number[];
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}

export interface PortfolioPiece {
  id: number;
  title: string;
  description?: string;
  projectId?: number;
  status: PieceStatus;
  medium?: string;
  dimensions?: string;
  imageRef?: string;
  progressImages: string[];
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}

export interface StylePreference {
  id: number;
  category: string;
  value: string;
  source: 'chat' | 'explicit' | 'inspiration';
  createdAt: string;
}

// ─── Aggregates ───

export interface SupplySummary {
  total: number;
  plenty: number;
  low: number;
  empty: number;
}

export interface ProjectStats {
  total: number;
  byStatus: Record<ProjectStatus, number>;
}

export interface PortfolioStats {
  total: number;
  byStatus: Record<PieceStatus, number>;
  byMedium: Record<string, number>;
  recentCompleted: Array<{ id: number; title: string; completedAt: string }>;
  activeWips: Array<{ id: number; title: string; updatedAt: string }>;
}

/**
 * Draft supply produced by photo analysis. Not persisted until the user
 * confirms it through add_supply.
 */
export interface SupplyDraft {
  name: string;
  category: string;
  brand?: string;
  quantityLevel: QuantityLevel;
}
