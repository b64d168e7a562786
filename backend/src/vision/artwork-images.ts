/**
 * Portfolio image files
 *
 * Uploaded artwork photos are auto-oriented, capped at ARTWORK_EDGE and
 * written as JPEG into the portfolio directory. Pieces keep the returned
 * reference ("portfolio/<file>.jpg") in imageRef.
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { assertImageUpload, normalizePhoto } from './supply-scanner.js';

const ARTWORK_EDGE = 2400;
const REF_PREFIX = 'portfolio/';

export class ArtworkImageStore {
  constructor(
    private readonly dir: string,
    private readonly newFileId: () => string = uuidv4,
  ) {}

  async save(image: Buffer, mimeType: string): Promise<string> {
    assertImageUpload(image, mimeType);
    const photo = await normalizePhoto(image, ARTWORK_EDGE);

    const fileName = `${this.newFileId()}.jpg`;
    await fs.promises.mkdir(this.dir, { recursive: true });
    await fs.promises.writeFile(path.join(this.dir, fileName), photo.data);

    console.log(`[Portfolio] Saved ${photo.width}x${photo.height} image as ${fileName}`);
    return `${REF_PREFIX}${fileName}`;
  }

  /** Undo a save whose piece could not be created */
  async remove(ref: string): Promise<void> {
    if (!ref.startsWith(REF_PREFIX)) return;
    await fs.promises.rm(path.join(this.dir, path.basename(ref)), { force: true });
  }
}
