/**
 * Supply photo scanner
 *
 * Normalizes an uploaded photo with sharp and asks the vision model which
 * supplies it shows. The result is a list of drafts; nothing is written to
 * the store until the user confirms an item through add_supply.
 */

import sharp from 'sharp';
import { z } from 'zod/v4';
import { QUANTITY_LEVELS, type SupplyDraft } from '../../../shared/types.js';
import { ReasoningUnavailable, ValidationError, errorMessage } from '../errors.js';
import { supplyScanPrompt } from '../prompts/supply-scan.js';
import type { ReasoningClient } from '../reasoning/anthropic-policy.js';

export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/gif'] as const;

/** Longest edge sent to the model */
const MAX_EDGE = 1568;

export interface ScanResult {
  message: string;
  drafts: SupplyDraft[];
}

export interface NormalizedPhoto {
  data: Buffer;
  width: number;
  height: number;
}

const draftSchema = z.object({
  name: z.string().trim().min(1),
  category: z.string().trim().min(1).default('paint'),
  brand: z.string().trim().nullish(),
  quantityLevel: z.enum(QUANTITY_LEVELS).default('plenty'),
});

/** Reject uploads with an unsupported type or no bytes */
export function assertImageUpload(image: Buffer, mimeType: string): void {
  if (!IMAGE_MIME_TYPES.some(type => type === mimeType)) {
    throw new ValidationError('mimeType', `mimeType must be one of ${IMAGE_MIME_TYPES.join(', ')}`);
  }
  if (image.length === 0) {
    throw new ValidationError('image', 'image must not be empty');
  }
}

/**
 * Auto-orient, shrink to maxEdge and re-encode as JPEG.
 */
export async function normalizePhoto(image: Buffer, maxEdge = MAX_EDGE): Promise<NormalizedPhoto> {
  try {
    const { data, info } = await sharp(image)
      .rotate()
      .resize({ width: maxEdge, height: maxEdge, fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: 85 })
      .toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height };
  } catch (error) {
    throw new ValidationError('image', `Could not read the image: ${errorMessage(error)}`);
  }
}

/**
 * Pull supply drafts out of the model's reply. Items that don't match the
 * draft shape are skipped.
 */
export function parseDrafts(text: string): SupplyDraft[] {
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start === -1 || end < start) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    console.warn(`[Scanner] Unparseable reply: ${errorMessage(error)}`);
    return [];
  }
  if (!Array.isArray(raw)) return [];

  const drafts: SupplyDraft[] = [];
  for (const item of raw) {
    const parsed = draftSchema.safeParse(item);
    if (!parsed.success) continue;
    const { name, category, brand, quantityLevel } = parsed.data;
    drafts.push(brand ? { name, category, brand, quantityLevel } : { name, category, quantityLevel });
  }
  return drafts;
}

export class SupplyScanner {
  constructor(
    private readonly client: ReasoningClient | null,
    private readonly options: { model: string },
  ) {}

  get available(): boolean {
    return this.client !== null;
  }

  async scan(image: Buffer, mimeType: string): Promise<ScanResult> {
    assertImageUpload(image, mimeType);

    if (!this.client) {
      return {
        message: 'Photo scanning is not configured. Tell me what you bought in chat and I will add it.',
        drafts: [],
      };
    }

    const photo = await normalizePhoto(image);
    console.log(`[Scanner] Analysing ${photo.width}x${photo.height} photo`);

    let text: string;
    try {
      const response = await this.client.messages.create({
        model: this.options.model,
        max_tokens: 1024,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'image', source: { type: 'base64', media_type: 'image/jpeg', data: photo.data.toString('base64') } },
              { type: 'text', text: supplyScanPrompt },
            ],
          },
        ],
      });
      text = response.content
        .map(block => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
        .join('');
    } catch (error) {
      throw new ReasoningUnavailable(`Photo analysis failed: ${errorMessage(error)}`, { cause: error });
    }

    const drafts = parseDrafts(text);
    console.log(`[Scanner] Found ${drafts.length} supplies`);
    return {
      message:
        drafts.length === 0
          ? "I couldn't spot any art supplies in that photo."
          : `I found ${drafts.length} ${drafts.length === 1 ? 'supply' : 'supplies'}. Confirm the ones you want added to your inventory.`,
      drafts,
    };
  }
}
