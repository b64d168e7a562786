/**
 * Dashboard sync contract
 *
 * Maps the domains touched during a turn to the dashboard panels that must
 * refresh. Shared by the backend (which reports panels per turn) and the
 * dashboard client (which re-fetches them).
 */

import { PANELS, type Domain, type PanelId } from './types.js';

export const DOMAIN_PANELS: Readonly<Record<Domain, readonly PanelId[]>> = {
  supplies: ['supply-summary', 'low-stock-list'],
  projects: ['projects-list'],
  portfolio: ['portfolio-grid', 'portfolio-stats'],
};

/**
 * Read endpoint feeding each panel.
 */
export const PANEL_SOURCES: Readonly<Record<PanelId, string>> = {
  'supply-summary': '/api/supplies',
  'low-stock-list': '/api/supplies/low-stock',
  'projects-list': '/api/projects',
  'portfolio-grid': '/api/portfolio',
  'portfolio-stats': '/api/portfolio/stats',
};

/**
 * Panels to refresh for a set of touched domains, in dashboard order.
 * No domains → no panels.
 */
export function panelsForDomains(domains: Iterable<Domain>): PanelId[] {
  const wanted = new Set<PanelId>();
  for (const domain of domains) {
    for (const panel of DOMAIN_PANELS[domain]) {
      wanted.add(panel);
    }
  }
  return PANELS.filter(panel => wanted.has(panel));
}
