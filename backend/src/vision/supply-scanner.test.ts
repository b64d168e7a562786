import type Anthropic from '@anthropic-ai/sdk';
import sharp from 'sharp';
import { beforeAll, describe, expect, it } from 'vitest';
import { ReasoningUnavailable, ValidationError } from '../errors.js';
import type { ReasoningClient } from '../reasoning/anthropic-policy.js';
import { SupplyScanner, normalizePhoto, parseDrafts } from './supply-scanner.js';

function fakeClient(reply: string | Error) {
  const bodies: Anthropic.MessageCreateParamsNonStreaming[] = [];
  const client: ReasoningClient = {
    messages: {
      create: async body => {
        bodies.push(body);
        if (reply instanceof Error) throw reply;
        return { content: [{ type: 'text', text: reply }] };
      },
    },
  };
  return { client, bodies };
}

let photo: Buffer;

beforeAll(async () => {
  photo = await sharp({ create: { width: 2000, height: 1000, channels: 3, background: { r: 200, g: 180, b: 40 } } })
    .png()
    .toBuffer();
});

describe('normalizePhoto', () => {
  it('shrinks to the longest allowed edge as JPEG', async () => {
    const normalized = await normalizePhoto(photo);
    expect(normalized.width).toBe(1568);
    expect(normalized.height).toBe(784);
    expect((await sharp(normalized.data).metadata()).format).toBe('jpeg');
  });

  it('rejects bytes that are not an image', async () => {
    await expect(normalizePhoto(Buffer.from('not an image'))).rejects.toThrow(ValidationError);
  });
});

describe('parseDrafts', () => {
  it('keeps valid items and fills defaults', () => {
    expect(
      parseDrafts(
        'Here is what I see: [{"name":"Winsor Yellow","category":"paint","brand":"Winsor & Newton","quantityLevel":"low"},{"name":"Round brush"},{"category":"paper"}]',
      ),
    ).toEqual([
      { name: 'Winsor Yellow', category: 'paint', brand: 'Winsor & Newton', quantityLevel: 'low' },
      { name: 'Round brush', category: 'paint', quantityLevel: 'plenty' },
    ]);
  });

  it('returns nothing for replies without a JSON array', () => {
    expect(parseDrafts('No supplies visible.')).toEqual([]);
    expect(parseDrafts('[not json]')).toEqual([]);
  });
});

describe('SupplyScanner', () => {
  it('sends the normalized photo and returns drafts', async () => {
    const { client, bodies } = fakeClient('[{"name":"Cerulean","quantityLevel":"empty"}]');
    const scanner = new SupplyScanner(client, { model: 'test-model' });

    expect(await scanner.scan(photo, 'image/png')).toEqual({
      message: 'I found 1 supply. Confirm the ones you want added to your inventory.',
      drafts: [{ name: 'Cerulean', category: 'paint', quantityLevel: 'empty' }],
    });
    expect(bodies[0]).toMatchObject({
      model: 'test-model',
      messages: [{ role: 'user', content: [{ type: 'image', source: { type: 'base64', media_type: 'image/jpeg' } }, { type: 'text' }] }],
    });
  });

  it('says so when nothing was found', async () => {
    const scanner = new SupplyScanner(fakeClient('[]').client, { model: 'test-model' });
    expect(await scanner.scan(photo, 'image/png')).toEqual({
      message: "I couldn't spot any art supplies in that photo.",
      drafts: [],
    });
  });

  it('guides the user when no vision model is configured', async () => {
    const scanner = new SupplyScanner(null, { model: 'test-model' });
    expect(scanner.available).toBe(false);
    expect((await scanner.scan(photo, 'image/png')).drafts).toEqual([]);
  });

  it('validates the upload before calling the model', async () => {
    const { client, bodies } = fakeClient('[]');
    const scanner = new SupplyScanner(client, { model: 'test-model' });

    await expect(scanner.scan(photo, 'image/tiff')).rejects.toMatchObject({ field: 'mimeType' });
    await expect(scanner.scan(Buffer.alloc(0), 'image/png')).rejects.toMatchObject({ field: 'image' });
    expect(bodies).toEqual([]);
  });

  it('reports model failures as unavailable', async () => {
    const scanner = new SupplyScanner(fakeClient(new Error('overloaded')).client, { model: 'test-model' });
    await expect(scanner.scan(photo, 'image/png')).rejects.toThrow(ReasoningUnavailable);
  });
});
