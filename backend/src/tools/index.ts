/**
 * Tool catalog
 * Every studio tool, keyed by name, plus the registry factory
 */

import type { StudioStore } from '../store/index.js';
import { CuratedInspirationProvider, type InspirationProvider } from './inspiration.js';
import { ToolRegistry, type ToolCatalog } from './registry.js';
import {
  addSupplyTool,
  checkSuppliesForMediumTool,
  getLowStockSuppliesTool,
  getSupplyTool,
  listSuppliesTool,
  replaceSupplyTool,
  searchSuppliesTool,
  updateSupplyTool,
  useSupplyTool,
} from './supplies.js';
import {
  addSessionNotesTool,
  completeProjectTool,
  createProjectFromQueryTool,
  createProjectTool,
  generateShoppingListTool,
  getProjectTool,
  linkProjectSuppliesTool,
  listProjectsTool,
  updateProjectTool,
} from './projects.js';
import {
  addPortfolioPieceTool,
  addProgressImageTool,
  getPortfolioPieceTool,
  getPortfolioStatsTool,
  listPortfolioTool,
  updatePortfolioPieceTool,
} from './portfolio.js';
import { getStylePreferencesTool, saveStylePreferenceTool, searchInspirationTool } from './inspiration.js';

export const studioCatalog: ToolCatalog = {
  list_supplies: listSuppliesTool,
  get_supply: getSupplyTool,
  search_supplies: searchSuppliesTool,
  get_low_stock_supplies: getLowStockSuppliesTool,
  check_supplies_for_medium: checkSuppliesForMediumTool,
  add_supply: addSupplyTool,
  update_supply: updateSupplyTool,
  use_supply: useSupplyTool,
  replace_supply: replaceSupplyTool,
  list_projects: listProjectsTool,
  get_project: getProjectTool,
  create_project: createProjectTool,
  update_project: updateProjectTool,
  create_project_from_query: createProjectFromQueryTool,
  link_project_supplies: linkProjectSuppliesTool,
  add_session_notes: addSessionNotesTool,
  generate_shopping_list: generateShoppingListTool,
  complete_project: completeProjectTool,
  list_portfolio: listPortfolioTool,
  get_portfolio_piece: getPortfolioPieceTool,
  add_portfolio_piece: addPortfolioPieceTool,
  update_portfolio_piece: updatePortfolioPieceTool,
  add_progress_image: addProgressImageTool,
  get_portfolio_stats: getPortfolioStatsTool,
  search_inspiration: searchInspirationTool,
  save_style_preference: saveStylePreferenceTool,
  get_style_preferences: getStylePreferencesTool,
};

export function createToolRegistry(options: {
  store: StudioStore;
  inspiration?: InspirationProvider;
  inspirationDataPath?: string;
}): ToolRegistry {
  const inspiration = options.inspiration ?? new CuratedInspirationProvider(options.inspirationDataPath);
  return new ToolRegistry(studioCatalog, { store: options.store, inspiration });
}

export { ToolRegistry, TOOL_NAMES, isToolName, validateToolCatalog } from './registry.js';
export type { ToolCatalog, ToolDescriptor, ToolName, ToolResult } from './registry.js';
export type { InspirationProvider, InspirationResult } from './inspiration.js';
