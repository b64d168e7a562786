import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArtworkImageStore } from './artwork-images.js';

describe('ArtworkImageStore', () => {
  let dir: string;
  let images: ArtworkImageStore;

  beforeEach(() => {
    dir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'studio-artwork-')), 'portfolio');
    images = new ArtworkImageStore(dir, () => 'harbour');
  });

  afterEach(() => {
    fs.rmSync(path.dirname(dir), { recursive: true, force: true });
  });

  it('writes a capped JPEG and returns its reference', async () => {
    const png = await sharp({ create: { width: 3000, height: 1500, channels: 3, background: { r: 10, g: 20, b: 30 } } })
      .png()
      .toBuffer();

    expect(await images.save(png, 'image/png')).toBe('portfolio/harbour.jpg');
    const metadata = await sharp(fs.readFileSync(path.join(dir, 'harbour.jpg'))).metadata();
    expect(metadata).toMatchObject({ format: 'jpeg', width: 2400, height: 1200 });
  });

  it('rejects unsupported uploads before writing', async () => {
    await expect(images.save(Buffer.from('x'), 'image/tiff')).rejects.toMatchObject({ field: 'mimeType' });
    await expect(images.save(Buffer.from('not an image'), 'image/png')).rejects.toMatchObject({ field: 'image' });
    expect(fs.existsSync(dir)).toBe(false);
  });

  it('only removes its own references', async () => {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'keep.jpg'), 'x');

    await images.remove('elsewhere/keep.jpg');
    expect(fs.existsSync(path.join(dir, 'keep.jpg'))).toBe(true);

    await images.remove('portfolio/keep.jpg');
    expect(fs.existsSync(path.join(dir, 'keep.jpg'))).toBe(false);
  });
});
