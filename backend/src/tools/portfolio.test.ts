import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestStudio, errorOf, outputOf, type TestStudio } from '../test-utils.js';

describe('portfolio tools', () => {
  let studio: TestStudio;

  beforeEach(() => {
    studio = createTestStudio();
  });

  afterEach(() => {
    studio.store.close();
  });

  const invoke = (name: string, input: unknown) => studio.registry.invoke(name, input);

  it('adds pieces as works in progress by default', async () => {
    const result = await invoke('add_portfolio_piece', { title: 'Harbour at dusk', medium: 'watercolor' });
    expect(result.affectedDomains).toEqual(['portfolio']);
    expect(outputOf(result)).toMatchObject({
      piece: { id: 1, title: 'Harbour at dusk', status: 'wip', progressImages: [] },
      message: 'Added "Harbour at dusk" to the portfolio (wip)',
    });
  });

  it('rejects a piece for an unknown project', async () => {
    expect(errorOf(await invoke('add_portfolio_piece', { title: 'Orphan', projectId: 5 }))).toEqual({
      kind: 'validation',
      message: 'Project 5 not found',
      field: 'projectId',
    });
    expect(studio.store.portfolio.stats().total).toBe(0);
  });

  it('moves status forward only', async () => {
    await invoke('add_portfolio_piece', { title: 'Fog', status: 'wip' });

    expect(errorOf(await invoke('update_portfolio_piece', { pieceId: 1, status: 'sketch' }))).toEqual({
      kind: 'validation',
      message: 'Cannot move "Fog" from wip back to sketch',
      field: 'status',
    });
    expect(outputOf(await invoke('update_portfolio_piece', { pieceId: 1, status: 'completed' }))).toMatchObject({
      piece: { status: 'completed' },
      message: 'Updated "Fog"',
    });
  });

  it('freezes completed pieces apart from metadata', async () => {
    await invoke('add_portfolio_piece', { title: 'Birches', status: 'completed', imageRef: 'img/birches.jpg' });

    expect(outputOf(await invoke('update_portfolio_piece', { pieceId: 1, title: 'Silver Birches' }))).toMatchObject({
      piece: { title: 'Silver Birches', imageRef: 'img/birches.jpg' },
    });
    expect(errorOf(await invoke('update_portfolio_piece', { pieceId: 1, imageRef: 'img/other.jpg' }))).toEqual({
      kind: 'validation',
      message: '"Silver Birches" is completed; only its metadata can change',
      field: 'imageRef',
    });
    expect(errorOf(await invoke('update_portfolio_piece', { pieceId: 1, status: 'wip' }))).toMatchObject({ field: 'status' });
  });

  it('collects progress images until completion', async () => {
    await invoke('add_portfolio_piece', { title: 'Dunes' });

    const first = await invoke('add_progress_image', { pieceId: 1, imageRef: 'img/dunes-1.jpg' });
    expect(outputOf(first)).toMatchObject({ progressCount: 1, message: 'Added progress image to "Dunes"' });

    await invoke('update_portfolio_piece', { pieceId: 1, status: 'completed' });
    expect(errorOf(await invoke('add_progress_image', { pieceId: 1, imageRef: 'img/dunes-2.jpg' }))).toEqual({
      kind: 'validation',
      message: '"Dunes" is completed; progress images are closed',
      field: 'pieceId',
    });
  });

  it('lists, fetches and summarizes pieces', async () => {
    await invoke('create_project', { title: 'Dunes project' });
    await invoke('add_portfolio_piece', { title: 'Dunes', projectId: 1, medium: 'oil' });
    await invoke('add_portfolio_piece', { title: 'Sketchbook page', status: 'sketch' });

    expect(outputOf(await invoke('list_portfolio', {}))).toMatchObject({
      count: 2,
      summary: { sketch: 1, wip: 1, completed: 0 },
      pieces: [{ title: 'Sketchbook page' }, { title: 'Dunes' }],
    });
    expect(outputOf(await invoke('get_portfolio_piece', { pieceId: 1 }))).toMatchObject({
      piece: { title: 'Dunes' },
      project: { title: 'Dunes project' },
    });
    expect(outputOf(await invoke('get_portfolio_stats', {}))).toMatchObject({
      stats: { total: 2, byMedium: { oil: 1, unspecified: 1 }, activeWips: [{ title: 'Dunes' }] },
    });
    expect(errorOf(await invoke('get_portfolio_piece', { pieceId: 9 }))).toMatchObject({ field: 'pieceId' });
  });

  it('summarizes the whole portfolio when the list is filtered or capped', async () => {
    await invoke('add_portfolio_piece', { title: 'Fog', status: 'sketch' });
    await invoke('add_portfolio_piece', { title: 'Dunes', status: 'wip' });
    await invoke('add_portfolio_piece', { title: 'Birches', status: 'completed' });

    expect(outputOf(await invoke('list_portfolio', { status: 'sketch' }))).toMatchObject({
      count: 1,
      summary: { sketch: 1, wip: 1, completed: 1 },
    });
    expect(outputOf(await invoke('list_portfolio', { limit: 1 }))).toMatchObject({
      count: 1,
      summary: { sketch: 1, wip: 1, completed: 1 },
    });
  });
});
