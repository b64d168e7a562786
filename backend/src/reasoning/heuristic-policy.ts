/**
 * Heuristic decision policy — local keyword routing
 *
 * Used when no API key is configured. Classifies the user's message into at
 * most one tool call, then answers from that tool's result. Anything it does
 * not recognise is answered without tools.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod/v4';
import type { QuantityLevel } from '../../../shared/types.js';
import type { ToolErrorInfo } from '../errors.js';
import type { ToolName } from '../tools/registry.js';
import { currentTurn, type Decision, type DecisionPolicy, type DecisionRequest } from './types.js';

export interface ClassifiedIntent {
  tool: ToolName;
  input: Record<string, unknown>;
}

const HELP_TEXT =
  "I can keep track of your supplies, projects and portfolio. Try \"Add to my inventory: Winsor Yellow, half tube\", \"What am I running low on?\" or \"Show my projects\".";

const UNITS: Record<string, string> = {
  tube: 'paint',
  pan: 'paint',
  bottle: 'paint',
  jar: 'paint',
  stick: 'paint',
  sheet: 'paper',
  pad: 'paper',
  block: 'paper',
  brush: 'brush',
  canvas: 'canvas',
  pencil: 'drawing',
  pen: 'drawing',
};

function quantityFrom(text: string): QuantityLevel {
  if (/\b(half|low|running low|almost (?:empty|out|gone)|nearly (?:empty|out|gone)|little left|quarter)\b/.test(text)) {
    return 'low';
  }
  if (/\b(empty|used up|out of|finished|none left)\b/.test(text)) return 'empty';
  return 'plenty';
}

/** "Winsor Yellow, half tube" → add_supply input */
export function parseSupplyPhrase(phrase: string): Record<string, unknown> {
  const [rawName = '', ...rest] = phrase.split(',');
  const name = rawName.trim().replace(/[.!]+$/, '');
  const qualifier = rest.join(',').toLowerCase();

  const input: Record<string, unknown> = { quantityLevel: quantityFrom(qualifier) };
  if (name) input.name = name;

  const unit = Object.keys(UNITS).find(candidate => new RegExp(`\\b${candidate}s?\\b`).test(qualifier));
  const namedUnit = Object.keys(UNITS).find(candidate => new RegExp(`\\b${candidate}\\b`, 'i').test(name));
  if (unit) input.unit = unit;
  input.category = UNITS[unit ?? namedUnit ?? 'tube'];
  return input;
}

const MEDIUMS = /\b(watercolou?r|oils?|acrylics?)\b/;

function normalizeMedium(match: string): string {
  if (match.startsWith('watercolo')) return 'watercolor';
  if (match.startsWith('oil')) return 'oil';
  return 'acrylic';
}

export function classifyIntent(text: string): ClassifiedIntent | null {
  const t = text.toLowerCase().trim();

  // Add to inventory — "add to my inventory: X, half tube", "I bought X"
  const addMatch =
    text.match(/\b(?:add|put)\b[^:]*?\b(?:inventory|supplies|stash)\b\s*[:\-]?\s*(.*)$/i) ??
    text.match(/^\s*(?:add)\s+(.+?)\s+to\s+(?:my\s+)?(?:inventory|supplies|stash)\b/i) ??
    text.match(/^\s*i\s+(?:just\s+)?(?:bought|got|picked up)\s+(?:a\s+|some\s+)?(.+)$/i);
  if (addMatch) {
    return { tool: 'add_supply', input: parseSupplyPhrase(addMatch[1] ?? '') };
  }

  // Essentials check — "do I have everything for watercolor?"
  const mediumMatch = t.match(MEDIUMS);
  if (mediumMatch && /\b(everything|enough|what i need|ready|essentials)\b/.test(t)) {
    return { tool: 'check_supplies_for_medium', input: { medium: normalizeMedium(mediumMatch[1]) } };
  }

  // Low stock
  if (/\b(running low|run(?:ning)? out|low on|low stock|restock|shopping list|need to buy)\b/.test(t) && !/\bproject\b/.test(t)) {
    return { tool: 'get_low_stock_supplies', input: {} };
  }

  // New project
  if (/\b(start|create|new)\b.*\bproject\b/.test(t)) {
    const title = text.match(/(?:called|named|titled)\s+["']?([^"'.!?]+)["']?/i)?.[1] ?? text.match(/:\s*(.+)$/)?.[1];
    if (title && title.trim()) {
      const input: Record<string, unknown> = { title: title.trim() };
      if (mediumMatch) input.medium = normalizeMedium(mediumMatch[1]);
      return { tool: 'create_project', input };
    }
  }

  // Project plans: "plan a watercolor landscape", "project idea: ..."
  const plan = text.match(/\b(?:plan|suggest)\s+(?:a|an|me a)\s+(.+?)[.?!]*$/i) ?? text.match(/\bproject idea:\s*(.+?)[.?!]*$/i);
  if (plan) {
    return { tool: 'create_project_from_query', input: { query: plan[1].trim() } };
  }

  // Style preferences
  if (/\bpreferences\b|\bwhat styles? do i like\b/.test(t)) {
    return { tool: 'get_style_preferences', input: {} };
  }

  // Projects
  if (/\bprojects?\b/.test(t)) {
    if (/\b(active|in progress|in-progress|current|ongoing)\b/.test(t)) {
      return { tool: 'list_projects', input: { status: 'in-progress' } };
    }
    if (/\b(ideas?)\b/.test(t)) return { tool: 'list_projects', input: { status: 'idea' } };
    return { tool: 'list_projects', input: {} };
  }

  // Portfolio
  if (/\b(portfolio|artworks?|pieces)\b/.test(t)) {
    if (/\b(stats|statistics|how many|summary)\b/.test(t)) return { tool: 'get_portfolio_stats', input: {} };
    return { tool: 'list_portfolio', input: {} };
  }

  // Inspiration
  const inspiration = text.match(/\b(?:inspiration|ideas|references?)\s+(?:for|on|about)\s+(.+?)[.?!]*$/i);
  if (inspiration) {
    return { tool: 'search_inspiration', input: { query: inspiration[1].trim() } };
  }

  // Supply lookup — "do I have any cerulean?"
  const lookup = text.match(/\bdo i (?:still )?have (?:any )?(.+?)\s*\??$/i);
  if (lookup) {
    return { tool: 'search_supplies', input: { query: lookup[1].trim() } };
  }

  // Supply listing
  if (/\b(supplies|inventory|my paints|what do i have)\b/.test(t)) {
    return { tool: 'list_supplies', input: /\bpaints\b/.test(t) ? { category: 'paint' } : {} };
  }

  return null;
}

// ─── Answers ───

const messageShape = z.object({ message: z.string() });
const named = z.object({ name: z.string(), quantityLevel: z.string() });
const lowStockShape = z.object({ totalLowStock: z.number(), supplies: z.array(named) });
const supplyListShape = z.object({
  count: z.number(),
  summary: z.object({ plenty: z.number(), low: z.number(), empty: z.number() }).optional(),
  supplies: z.array(named),
});
const projectListShape = z.object({ projects: z.array(z.object({ title: z.string(), status: z.string() })) });
const pieceListShape = z.object({ pieces: z.array(z.object({ title: z.string(), status: z.string() })) });
const statsShape = z.object({
  stats: z.object({
    total: z.number(),
    byStatus: z.object({ sketch: z.number(), wip: z.number(), completed: z.number() }),
  }),
});
const mediumShape = z.object({
  medium: z.string(),
  readyToStart: z.boolean(),
  missingEssentials: z.array(z.object({ category: z.string(), item: z.string() })),
});

function listOf(items: string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

/** Plain-language answer for one tool result */
export function answerFromResult(tool: string, success: boolean, output: unknown, error?: ToolErrorInfo): string {
  if (!success) {
    // Only input problems are worth repeating; store and internal messages are driver text
    if (error?.kind === 'validation' || error?.kind === 'unknown_tool') {
      return sentence(`I couldn't do that: ${error.message}`);
    }
    return "I couldn't do that because something went wrong on my side. Please try again in a moment.";
  }

  switch (tool) {
    case 'get_low_stock_supplies': {
      const parsed = lowStockShape.safeParse(output);
      if (!parsed.success) break;
      if (parsed.data.totalLowStock === 0) return 'Nothing is running low right now.';
      return `You're running low on ${listOf(parsed.data.supplies.map(s => `${s.name} (${s.quantityLevel})`))}.`;
    }
    case 'list_supplies':
    case 'search_supplies': {
      const parsed = supplyListShape.safeParse(output);
      if (!parsed.success) break;
      if (parsed.data.count === 0) return "I couldn't find any matching supplies.";
      return `You have ${parsed.data.count} matching supplies: ${listOf(parsed.data.supplies.map(s => s.name))}.`;
    }
    case 'list_projects': {
      const parsed = projectListShape.safeParse(output);
      if (!parsed.success) break;
      if (parsed.data.projects.length === 0) return 'You have no projects yet.';
      return `Your projects: ${listOf(parsed.data.projects.map(p => `${p.title} (${p.status})`))}.`;
    }
    case 'list_portfolio': {
      const parsed = pieceListShape.safeParse(output);
      if (!parsed.success) break;
      if (parsed.data.pieces.length === 0) return 'Your portfolio is empty so far.';
      return `Your portfolio: ${listOf(parsed.data.pieces.map(p => `${p.title} (${p.status})`))}.`;
    }
    case 'get_portfolio_stats': {
      const parsed = statsShape.safeParse(output);
      if (!parsed.success) break;
      const { total, byStatus } = parsed.data.stats;
      return `Your portfolio has ${total} pieces: ${byStatus.completed} completed, ${byStatus.wip} in progress and ${byStatus.sketch} sketches.`;
    }
    case 'check_supplies_for_medium': {
      const parsed = mediumShape.safeParse(output);
      if (!parsed.success) break;
      if (parsed.data.readyToStart) return `You have everything you need for ${parsed.data.medium}.`;
      return `For ${parsed.data.medium} you're missing: ${listOf(parsed.data.missingEssentials.map(m => m.item))}.`;
    }
  }

  const message = messageShape.safeParse(output);
  return message.success ? sentence(message.data.message) : 'Done.';
}

/** Close with a full stop unless the text already ends a sentence */
export function sentence(text: string): string {
  return /[.!?]$/.test(text) ? text : `${text}.`;
}

export class HeuristicDecisionPolicy implements DecisionPolicy {
  readonly name = 'heuristic';

  async decide(request: DecisionRequest): Promise<Decision> {
    const { userText, toolEntries } = currentTurn(request.entries);
    const last = toolEntries[toolEntries.length - 1];

    if (last) {
      const { call } = last;
      return { kind: 'answer', text: answerFromResult(call.name, call.success, call.output, call.error) };
    }
    if (request.mode === 'finalize') {
      return { kind: 'answer', text: HELP_TEXT };
    }

    const intent = classifyIntent(userText);
    if (!intent) {
      return { kind: 'answer', text: HELP_TEXT };
    }
    return { kind: 'tool_call', callId: `local_${randomUUID()}`, tool: intent.tool, input: intent.input };
  }
}
