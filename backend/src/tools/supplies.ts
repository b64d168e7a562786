/**
 * Supply tools
 *
 * Read and write the supply inventory. Quantity is tracked as a level
 * (plenty / low / empty) and, when the user gives one, a fraction of a full
 * unit; the store derives the level from the fraction.
 */

import { z } from 'zod/v4';
import { QUANTITY_LEVELS, type Supply } from '../../../shared/types.js';
import { ValidationError } from '../errors.js';
import type { StudioStore } from '../store/index.js';
import { defineTool } from './registry.js';

const supplyId = z.number().int().positive();
const amount = z.number().min(0).max(1);

/** Essentials a medium needs, by category, matched against name + color */
const MEDIUM_ESSENTIALS: Record<string, Record<string, string[]>> = {
  watercolor: {
    paint: ['yellow', 'red', 'blue'],
    brush: ['round'],
    paper: ['watercolor paper'],
  },
  oil: {
    paint: ['white', 'yellow', 'red', 'blue'],
    brush: ['flat', 'filbert'],
    canvas: ['canvas'],
    medium: ['linseed oil', 'solvent'],
  },
  acrylic: {
    paint: ['white', 'yellow', 'red', 'blue'],
    brush: ['flat', 'round'],
    canvas: ['canvas'],
  },
};

export function requireSupply(store: StudioStore, id: number, field = 'supplyId'): Supply {
  const supply = store.supplies.get(id);
  if (!supply) {
    throw new ValidationError(field, `Supply ${id} not found`);
  }
  return supply;
}

function supplyLabel(supply: Supply): string {
  return supply.brand ? `${supply.brand} ${supply.name}` : supply.name;
}

// ─── Reads ───

export const listSuppliesTool = defineTool({
  name: 'list_supplies',
  description: 'List current supplies, optionally filtered by category (paint, brush, paper, canvas, medium...). Includes counts by quantity level.',
  domains: [],
  schema: z.object({
    category: z.string().trim().min(1).optional().describe('Only this category'),
  }),
  handler: (input, { store }) => {
    const supplies = store.supplies.list({ category: input.category });
    return { supplies, summary: store.supplies.summary(), count: supplies.length };
  },
});

export const getSupplyTool = defineTool({
  name: 'get_supply',
  description: 'Get one supply by id, including its usage history.',
  domains: [],
  schema: z.object({ supplyId: supplyId.describe('Supply id') }),
  handler: (input, { store }) => {
    const supply = requireSupply(store, input.supplyId);
    return { supply, usage: store.supplies.usageFor(supply.id) };
  },
});

export const searchSuppliesTool = defineTool({
  name: 'search_supplies',
  description: 'Search current supplies by name, brand, category or color.',
  domains: [],
  schema: z.object({ query: z.string().trim().min(1).describe('Text to look for') }),
  handler: (input, { store }) => {
    const supplies = store.supplies.search(input.query);
    return { query: input.query, supplies, count: supplies.length };
  },
});

export const getLowStockSuppliesTool = defineTool({
  name: 'get_low_stock_supplies',
  description: 'List supplies that are low or empty, grouped by category, with a shopping list ordered by urgency.',
  domains: [],
  schema: z.object({}),
  handler: (_input, { store }) => {
    const supplies = store.supplies.lowStock();
    const byCategory = new Map<string, Supply[]>();
    for (const supply of supplies) {
      byCategory.set(supply.category, [...(byCategory.get(supply.category) ?? []), supply]);
    }
    const shoppingList = supplies.map(supply => ({
      supplyId: supply.id,
      name: supply.name,
      brand: supply.brand,
      category: supply.category,
      quantityLevel: supply.quantityLevel,
      urgency: supply.quantityLevel === 'empty' ? 'critical' : 'low',
    }));
    return { totalLowStock: supplies.length, supplies, byCategory: Object.fromEntries(byCategory), shoppingList };
  },
});

export const checkSuppliesForMediumTool = defineTool({
  name: 'check_supplies_for_medium',
  description: 'Check whether the inventory covers the essentials for a medium (watercolor, oil, acrylic). Lists what is missing.',
  domains: [],
  schema: z.object({
    medium: z.string().trim().min(1).describe('Art medium, e.g. watercolor'),
  }),
  handler: (input, { store }) => {
    const medium = input.medium.toLowerCase();
    const essentials = MEDIUM_ESSENTIALS[medium];
    if (!essentials) {
      throw new ValidationError(
        'medium',
        `No essentials known for ${input.medium}. Known mediums: ${Object.keys(MEDIUM_ESSENTIALS).join(', ')}`,
      );
    }

    const usable = store.supplies.list().filter(supply => supply.quantityLevel !== 'empty');
    const missing: Array<{ category: string; item: string }> = [];
    for (const [category, items] of Object.entries(essentials)) {
      const inCategory = usable.filter(supply => supply.category.toLowerCase() === category);
      for (const item of items) {
        const found = inCategory.some(supply =>
          `${supply.name} ${supply.color ?? ''}`.toLowerCase().includes(item),
        );
        if (!found) missing.push({ category, item });
      }
    }

    return { medium, availableSupplies: usable, missingEssentials: missing, readyToStart: missing.length === 0 };
  },
});

// ─── Writes ───

const supplyFields = {
  name: z.string().trim().min(1).describe('Supply name, e.g. "Winsor Yellow"'),
  category: z.string().trim().min(1).describe('paint, brush, paper, canvas, medium, tool...'),
  brand: z.string().trim().min(1).optional().describe('Brand, e.g. "Winsor & Newton"'),
  color: z.string().trim().min(1).optional().describe('Color name for paints and inks'),
  size: z.string().trim().min(1).optional().describe('Size, e.g. "14ml" or "#8"'),
  unit: z.string().trim().min(1).optional().describe('Packaging unit: tube, pan, sheet, bottle...'),
  notes: z.string().optional().describe('Free-form notes'),
  quantityLevel: z.enum(QUANTITY_LEVELS).optional().describe('plenty, low or empty. "Half a tube" is low.'),
  amount: amount.optional().describe('Fraction of a full unit left (1 = full, 0.5 = half). Overrides quantityLevel.'),
};

export const addSupplySchema = z.object({
  ...supplyFields,
  category: supplyFields.category.default('paint'),
});

export const addSupplyTool = defineTool({
  name: 'add_supply',
  description: `Add a supply to the inventory. Give either a quantity level or an amount; without either the supply is recorded as plenty.

Examples:
- "Add Winsor Yellow, half tube": { name: "Winsor Yellow", category: "paint", unit: "tube", quantityLevel: "low" }
- "New pad of Arches 300gsm": { name: "Arches 300gsm", category: "paper", quantityLevel: "plenty" }`,
  domains: ['supplies'],
  schema: addSupplySchema,
  handler: (input, { store }) => {
    const supply = store.supplies.create({ ...input, quantityLevel: input.quantityLevel ?? 'plenty' });
    return { supply, message: `Added ${supplyLabel(supply)} (${supply.quantityLevel})` };
  },
});

export const updateSupplyTool = defineTool({
  name: 'update_supply',
  description: 'Change fields of an existing supply. Setting amount re-derives the quantity level.',
  domains: ['supplies'],
  schema: z.object({
    supplyId: supplyId.describe('Supply to change'),
    ...z.object(supplyFields).partial().shape,
  }),
  handler: (input, { store }) => {
    const { supplyId: id, ...patch } = input;
    requireSupply(store, id);
    const supply = store.supplies.update(id, patch);
    if (!supply) throw new ValidationError('supplyId', `Supply ${id} not found`);
    return { supply, message: `Updated ${supplyLabel(supply)}` };
  },
});

export const useSupplyTool = defineTool({
  name: 'use_supply',
  description: 'Record that some of a supply was used, optionally for a project (which links the supply to it).',
  domains: ['supplies', 'projects'],
  schema: z.object({
    supplyId: supplyId.describe('Supply used'),
    amountUsed: z.number().positive().max(1).describe('Fraction of a full unit used'),
    projectId: z.number().int().positive().optional().describe('Project it was used for'),
  }),
  handler: (input, { store }) => {
    const supply = requireSupply(store, input.supplyId);
    if (supply.supersededBy !== undefined) {
      throw new ValidationError('supplyId', `Supply ${supply.id} was replaced by supply ${supply.supersededBy}`);
    }
    if (input.projectId !== undefined && !store.projects.get(input.projectId)) {
      throw new ValidationError('projectId', `Project ${input.projectId} not found`);
    }

    const usage = store.transaction(() => {
      const recorded = store.supplies.recordUsage(input.supplyId, input.amountUsed, input.projectId);
      if (!recorded) throw new ValidationError('supplyId', `Supply ${input.supplyId} not found`);
      if (input.projectId !== undefined) {
        store.projects.linkSupplies(input.projectId, [input.supplyId]);
      }
      return recorded;
    });

    const levelChanged = usage.previousLevel !== usage.supply.quantityLevel;
    return {
      supply: usage.supply,
      previousLevel: usage.previousLevel,
      amountUsed: usage.amountUsed,
      message: levelChanged
        ? `${supplyLabel(usage.supply)} is now ${usage.supply.quantityLevel}`
        : `Recorded use of ${supplyLabel(usage.supply)}`,
    };
  },
  touched: input => (input.projectId !== undefined ? ['supplies', 'projects'] : ['supplies']),
});

export const replaceSupplySchema = z.object({
  supplyId: supplyId.describe('Supply being replaced'),
  ...z.object(supplyFields).partial().shape,
});

export const replaceSupplyTool = defineTool({
  name: 'replace_supply',
  description: 'Replace a used-up supply with a new one (e.g. a fresh tube). Unspecified fields are copied from the old record; the new one starts at plenty.',
  domains: ['supplies'],
  schema: replaceSupplySchema,
  handler: (input, { store }) => {
    const { supplyId: id, ...fields } = input;
    const old = requireSupply(store, id);
    if (old.supersededBy !== undefined) {
      throw new ValidationError('supplyId', `Supply ${old.id} was already replaced by supply ${old.supersededBy}`);
    }

    const result = store.supplies.supersede(id, {
      name: fields.name ?? old.name,
      category: fields.category ?? old.category,
      brand: fields.brand ?? old.brand,
      color: fields.color ?? old.color,
      size: fields.size ?? old.size,
      unit: fields.unit ?? old.unit,
      notes: fields.notes,
      quantityLevel: fields.quantityLevel ?? 'plenty',
      amount: fields.amount,
    });
    if (!result) throw new ValidationError('supplyId', `Supply ${id} not found`);
    return {
      previous: result.previous,
      supply: result.supply,
      message: `Replaced ${supplyLabel(result.previous)} with a new record (#${result.supply.id})`,
    };
  },
});
