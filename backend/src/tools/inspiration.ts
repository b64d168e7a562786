/**
 * Inspiration tools
 *
 * search_inspiration goes through an InspirationProvider so a social-media
 * backed source can replace the curated file without touching the tool.
 * save_style_preference stores what the user says they like; preferences
 * feed the agent prompt, not the dashboard.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod/v4';
import type { StylePreference } from '../../../shared/types.js';
import { defineTool } from './registry.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const DEFAULT_DATA_PATH = path.resolve(__dirname, '..', '..', 'data', 'inspiration.json');

export interface InspirationItem {
  id: string;
  title: string;
  description: string;
  medium?: string;
  styleTags: string[];
}

export interface InspirationResult {
  source: string;
  query: string;
  results: InspirationItem[];
  styleAnalysis: {
    commonTags: string[];
    mediums: string[];
  };
}

export interface InspirationProvider {
  search(query: string, limit: number): Promise<InspirationResult>;
}

const curatedEntrySchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  medium: z.string().optional(),
  styleTags: z.array(z.string()),
  keywords: z.array(z.string()),
});

type CuratedEntry = z.infer<typeof curatedEntrySchema>;

/**
 * Offline provider backed by a JSON file of curated references.
 * Entries are ranked by how many query words hit their keywords, tags,
 * medium or title.
 */
export class CuratedInspirationProvider implements InspirationProvider {
  private entries: CuratedEntry[] | null = null;

  constructor(private readonly dataPath: string = DEFAULT_DATA_PATH) {}

  async search(query: string, limit: number): Promise<InspirationResult> {
    const entries = await this.load();
    const words = query
      .toLowerCase()
      .split(/[^a-z0-9']+/)
      .filter(word => word.length > 2);

    const ranked = entries
      .map(entry => ({ entry, score: scoreEntry(entry, words) }))
      .filter(candidate => candidate.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ entry }) => ({
        id: entry.id,
        title: entry.title,
        description: entry.description,
        medium: entry.medium,
        styleTags: entry.styleTags,
      }));

    return { source: 'curated', query, results: ranked, styleAnalysis: analyzeStyle(ranked) };
  }

  private async load(): Promise<CuratedEntry[]> {
    if (this.entries) return this.entries;
    const raw = await fs.promises.readFile(this.dataPath, 'utf-8');
    this.entries = z.array(curatedEntrySchema).parse(JSON.parse(raw));
    console.log(`[Tools] Loaded ${this.entries.length} inspiration references from ${this.dataPath}`);
    return this.entries;
  }
}

function scoreEntry(entry: CuratedEntry, words: string[]): number {
  const haystack = [entry.title, entry.medium ?? '', ...entry.keywords, ...entry.styleTags]
    .join(' ')
    .toLowerCase();
  return words.filter(word => haystack.includes(word)).length;
}

function analyzeStyle(items: InspirationItem[]): InspirationResult['styleAnalysis'] {
  const tagCounts = new Map<string, number>();
  for (const item of items) {
    for (const tag of item.styleTags) tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
  }
  const commonTags = [...tagCounts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 5)
    .map(([tag]) => tag);
  const mediums = [...new Set(items.flatMap(item => (item.medium ? [item.medium] : [])))];
  return { commonTags, mediums };
}

// ─── Tools ───

export const searchInspirationSchema = z.object({
  query: z.string().trim().min(1).describe('Theme to look for, e.g. "watercolor sunflower landscape"'),
  limit: z.number().int().min(1).max(20).default(6).describe('Maximum number of references (default 6)'),
});

export const searchInspirationTool = defineTool({
  name: 'search_inspiration',
  description:
    'Find reference artworks for a theme. Returns titles, descriptions and style tags plus the most common tags across the results.',
  domains: [],
  schema: searchInspirationSchema,
  handler: async (input, { inspiration }) => {
    const result = await inspiration.search(input.query, input.limit);
    return {
      ...result,
      message:
        result.results.length === 0
          ? `No references found for "${input.query}".`
          : `Found ${result.results.length} references for "${input.query}".`,
    };
  },
});

export const saveStylePreferenceSchema = z.object({
  category: z.string().trim().min(1).describe('What the preference is about: medium, palette, subject, technique...'),
  value: z.string().trim().min(1).describe('The preference itself, e.g. "muted earth tones"'),
  source: z.enum(['chat', 'explicit', 'inspiration']).default('chat').describe('Where the preference came from'),
});

export const saveStylePreferenceTool = defineTool({
  name: 'save_style_preference',
  description: 'Remember a style preference the user stated so later suggestions can follow it.',
  domains: [],
  schema: saveStylePreferenceSchema,
  handler: (input, { store }) => {
    const preference = store.preferences.save(input);
    return { preference, message: `Noted: ${preference.category} → ${preference.value}` };
  },
});

export const getStylePreferencesTool = defineTool({
  name: 'get_style_preferences',
  description:
    'Read the style preferences saved so far, grouped by category, newest first. Check them before suggesting projects or references.',
  domains: [],
  schema: z.object({
    category: z.string().trim().min(1).optional().describe('Only this category, e.g. "palette"'),
  }),
  handler: (input, { store }) => {
    const wanted = input.category?.toLowerCase();
    const saved = store.preferences
      .list()
      .filter(preference => wanted === undefined || preference.category.toLowerCase() === wanted)
      .reverse();

    const byCategory = new Map<string, Array<Pick<StylePreference, 'value' | 'source' | 'createdAt'>>>();
    for (const { category, value, source, createdAt } of saved) {
      const entries = byCategory.get(category) ?? [];
      entries.push({ value, source, createdAt });
      byCategory.set(category, entries);
    }

    return {
      preferences: Object.fromEntries(byCategory),
      total: saved.length,
      message:
        saved.length === 0
          ? 'No style preferences saved yet'
          : `Saved preferences: ${[...byCategory].map(([category, entries]) => `${category} (${entries.map(e => e.value).join(', ')})`).join('; ')}`,
    };
  },
});
