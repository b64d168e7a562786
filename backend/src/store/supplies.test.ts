import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { testClock } from '../test-utils.js';
import { createStudioStore, levelForAmount, nominalAmount, type StudioStore } from './index.js';

describe('levelForAmount', () => {
  it('maps amounts onto levels', () => {
    expect(levelForAmount(0)).toBe('empty');
    expect(levelForAmount(0.5)).toBe('low');
    expect(levelForAmount(0.51)).toBe('plenty');
  });

  it('assumes nominal amounts for levels', () => {
    expect(nominalAmount('plenty')).toBe(1);
    expect(nominalAmount('low')).toBe(0.5);
    expect(nominalAmount('empty')).toBe(0);
  });
});

describe('SupplyRepository', () => {
  let store: StudioStore;

  beforeEach(() => {
    store = createStudioStore(':memory:', testClock());
  });

  afterEach(() => {
    store.close();
  });

  it('creates a supply from a level alone', () => {
    const supply = store.supplies.create({ name: 'Winsor Yellow', category: 'paint', unit: 'tube', quantityLevel: 'low' });
    expect(supply).toMatchObject({ id: 1, name: 'Winsor Yellow', category: 'paint', unit: 'tube', quantityLevel: 'low' });
    expect(supply.amount).toBeUndefined();
    expect(supply.brand).toBeUndefined();
    expect(supply.createdAt).toBe('2025-01-01T00:00:00.000Z');
  });

  it('derives the level from an amount and clamps it', () => {
    expect(store.supplies.create({ name: 'A', category: 'paint', quantityLevel: 'plenty', amount: 0.3 })).toMatchObject({
      quantityLevel: 'low',
      amount: 0.3,
    });
    expect(store.supplies.create({ name: 'B', category: 'paint', quantityLevel: 'empty', amount: 2 })).toMatchObject({
      quantityLevel: 'plenty',
      amount: 1,
    });
  });

  it('lists current supplies by category, case-insensitively', () => {
    store.supplies.create({ name: 'Round #8', category: 'brush', quantityLevel: 'plenty' });
    store.supplies.create({ name: 'Cerulean', category: 'paint', quantityLevel: 'plenty' });
    store.supplies.create({ name: 'Alizarin', category: 'paint', quantityLevel: 'low' });

    expect(store.supplies.list().map(s => s.name)).toEqual(['Round #8', 'Alizarin', 'Cerulean']);
    expect(store.supplies.list({ category: 'PAINT' }).map(s => s.name)).toEqual(['Alizarin', 'Cerulean']);
  });

  it('searches name, brand and color', () => {
    store.supplies.create({ name: 'Cerulean', category: 'paint', brand: 'Daniel Smith', quantityLevel: 'plenty' });
    store.supplies.create({ name: 'Mop', category: 'brush', color: 'black', quantityLevel: 'plenty' });

    expect(store.supplies.search('daniel').map(s => s.name)).toEqual(['Cerulean']);
    expect(store.supplies.search('BLACK').map(s => s.name)).toEqual(['Mop']);
    expect(store.supplies.search('viridian')).toEqual([]);
  });

  it('lists low stock emptiest first and summarizes levels', () => {
    store.supplies.create({ name: 'Low one', category: 'paint', quantityLevel: 'low' });
    store.supplies.create({ name: 'Empty one', category: 'paint', quantityLevel: 'empty' });
    store.supplies.create({ name: 'Full one', category: 'paint', quantityLevel: 'plenty' });

    expect(store.supplies.lowStock().map(s => s.name)).toEqual(['Empty one', 'Low one']);
    expect(store.supplies.summary()).toEqual({ total: 3, plenty: 1, low: 1, empty: 1 });
  });

  it('drops a stale amount when only the level changes', () => {
    const supply = store.supplies.create({ name: 'Gesso', category: 'medium', quantityLevel: 'plenty', amount: 0.8 });
    const updated = store.supplies.update(supply.id, { quantityLevel: 'low' });
    expect(updated).toMatchObject({ quantityLevel: 'low', name: 'Gesso' });
    expect(updated?.amount).toBeUndefined();
  });

  it('returns undefined when updating a missing supply', () => {
    expect(store.supplies.update(99, { name: 'Nope' })).toBeUndefined();
  });

  it('records usage against the nominal amount', () => {
    const supply = store.supplies.create({ name: 'Payne’s Grey', category: 'paint', quantityLevel: 'plenty' });
    const project = store.projects.create({ title: 'Night sky', status: 'in-progress' });

    const usage = store.supplies.recordUsage(supply.id, 0.6, project.id);
    expect(usage?.previousLevel).toBe('plenty');
    expect(usage?.supply).toMatchObject({ quantityLevel: 'low', amount: 0.4 });
    expect(store.supplies.usageFor(supply.id)).toEqual([
      { projectId: project.id, amountUsed: 0.6, usedAt: usage?.supply.updatedAt },
    ]);
  });

  it('supersedes a supply with a new record', () => {
    const old = store.supplies.create({ name: 'Ultramarine', category: 'paint', quantityLevel: 'empty' });
    const result = store.supplies.supersede(old.id, { name: 'Ultramarine', category: 'paint', quantityLevel: 'plenty' });

    expect(result?.previous.supersededBy).toBe(result?.supply.id);
    expect(store.supplies.list().map(s => s.id)).toEqual([result?.supply.id]);
    expect(store.supplies.list({ includeSuperseded: true })).toHaveLength(2);
    expect(store.supplies.summary()).toEqual({ total: 1, plenty: 1, low: 0, empty: 0 });
  });
});
