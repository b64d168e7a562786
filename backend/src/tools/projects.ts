/**
 * Project tools
 *
 * Status only moves forward (idea → in-progress → completed, skipping
 * allowed). Going back needs an explicit reset.
 */

import { z } from 'zod/v4';
import { PROJECT_STATUSES, type PortfolioPiece, type Project, type ProjectStatus, type Supply } from '../../../shared/types.js';
import { ValidationError } from '../errors.js';
import type { StudioStore } from '../store/index.js';
import { defineTool } from './registry.js';
import { requireSupply } from './supplies.js';

const projectId = z.number().int().positive();

export function requireProject(store: StudioStore, id: number, field = 'projectId'): Project {
  const project = store.projects.get(id);
  if (!project) {
    throw new ValidationError(field, `Project ${id} not found`);
  }
  return project;
}

export function isForwardTransition(from: ProjectStatus, to: ProjectStatus): boolean {
  return PROJECT_STATUSES.indexOf(to) >= PROJECT_STATUSES.indexOf(from);
}

/** Inventory match for a material name: either name contains the other */
function findMaterial(material: string, supplies: Supply[]): Supply | undefined {
  const wanted = material.toLowerCase();
  return supplies.find(supply => {
    const names = [supply.name.toLowerCase()];
    if (supply.brand) names.push(`${supply.brand} ${supply.name}`.toLowerCase());
    return names.some(name => wanted.includes(name) || name.includes(wanted));
  });
}

// ─── Reads ───

export const listProjectsTool = defineTool({
  name: 'list_projects',
  description: 'List projects, newest activity first, optionally filtered by status. Includes counts by status.',
  domains: [],
  schema: z.object({
    status: z.enum(PROJECT_STATUSES).optional().describe('idea, in-progress or completed'),
  }),
  handler: (input, { store }) => {
    const projects = store.projects.list({ status: input.status });
    return { projects, stats: store.projects.stats(), count: projects.length };
  },
});

export const getProjectTool = defineTool({
  name: 'get_project',
  description: 'Get one project with its linked supplies and portfolio piece.',
  domains: [],
  schema: z.object({ projectId: projectId.describe('Project id') }),
  handler: (input, { store }) => {
    const project = requireProject(store, input.projectId);
    const supplies = project.supplyIds.flatMap(id => {
      const supply = store.supplies.get(id);
      return supply ? [supply] : [];
    });
    return { project, supplies, portfolioPiece: store.portfolio.findByProject(project.id) ?? null };
  },
});

export const generateShoppingListTool = defineTool({
  name: 'generate_shopping_list',
  description: "Compare a project's materials with the inventory: what to buy (missing or running low) and what is already on hand.",
  domains: [],
  schema: z.object({ projectId: projectId.describe('Project id') }),
  handler: (input, { store }) => {
    const project = requireProject(store, input.projectId);
    if (project.materials.length === 0) {
      return {
        project: project.title,
        shoppingList: [],
        alreadyHave: [],
        message: 'No materials list defined for this project',
      };
    }

    const supplies = store.supplies.list();
    const shoppingList: Array<{ item: string; reason: 'not in inventory' | 'low stock'; supplyId?: number }> = [];
    const alreadyHave: Array<{ item: string; supplyId: number; quantityLevel: string }> = [];

    for (const material of project.materials) {
      const found = findMaterial(material, supplies);
      if (!found) {
        shoppingList.push({ item: material, reason: 'not in inventory' });
      } else if (found.quantityLevel === 'plenty') {
        alreadyHave.push({ item: material, supplyId: found.id, quantityLevel: found.quantityLevel });
      } else {
        shoppingList.push({ item: material, reason: 'low stock', supplyId: found.id });
      }
    }

    return {
      project: project.title,
      shoppingList,
      alreadyHave,
      itemsToBuy: shoppingList.length,
      itemsAvailable: alreadyHave.length,
      estimatedBudget: project.estimatedBudget ?? null,
    };
  },
});

// ─── Plans ───

const PLAN_MEDIUMS = ['watercolor', 'oil', 'acrylic', 'pencil', 'ink', 'pastel', 'charcoal', 'mixed media'];
const PLAN_STYLES = ['landscape', 'portrait', 'still life', 'abstract', 'botanical', 'seascape', 'cityscape'];
const PLAN_SUBJECTS = ['sunflower', 'flower', 'mountain', 'ocean', 'tree', 'bird', 'sunset', 'forest'];

const PLAN_MATERIALS: Record<string, string[]> = {
  watercolor: ['Watercolor paper', 'Round brush #6', 'Flat brush 1 inch', 'Primary colors set'],
  oil: ['Stretched canvas', 'Oil paint set', 'Linseed oil', 'Filbert brush set'],
  acrylic: ['Canvas board', 'Acrylic paint set', 'Flat brush set'],
};

const PLAN_STEPS = [
  'Gather reference images and plan composition',
  'Sketch initial composition',
  'Block in main shapes and values',
  'Add details and refine',
  'Final touches and evaluation',
];

export interface ProjectPlan {
  title: string;
  description: string;
  medium?: string;
  style?: string;
  subject?: string;
  materials: string[];
  steps: string[];
  estimatedBudget?: number;
}

const titleCase = (text: string) => text.replace(/\b\w/g, letter => letter.toUpperCase());

/** Draft a project from a free-text idea: first known medium, style and subject win */
export function planProject(query: string, budget?: number): ProjectPlan {
  const lower = query.toLowerCase();
  const medium = PLAN_MEDIUMS.find(candidate => lower.includes(candidate));
  const style = PLAN_STYLES.find(candidate => lower.includes(candidate));
  const subject = PLAN_SUBJECTS.find(candidate => lower.includes(candidate));

  const titleParts = [subject, style].flatMap(part => (part ? [titleCase(part)] : []));
  if (medium) titleParts.push(`in ${titleCase(medium)}`);

  return {
    title: titleParts.length > 0 ? titleParts.join(' ') : 'New Art Project',
    description: query,
    medium,
    style,
    subject,
    materials: [...((medium && PLAN_MATERIALS[medium]) || [])],
    steps: [...PLAN_STEPS],
    estimatedBudget: budget,
  };
}

export const createProjectFromQueryTool = defineTool({
  name: 'create_project_from_query',
  description: `Draft a project plan (title, medium, style, materials, steps) from a free-text idea and check the materials against the inventory. Nothing is saved: call create_project with the plan once the user agrees.

Example: { query: "a watercolor landscape with sunflowers", budget: 40 }`,
  domains: [],
  schema: z.object({
    query: z.string().trim().min(1).describe('The idea in the user\'s words'),
    budget: z.number().min(0).optional().describe('Maximum materials budget'),
  }),
  handler: (input, { store }) => {
    const plan = planProject(input.query, input.budget);
    const supplies = store.supplies.list();
    const onHand: string[] = [];
    const toBuy: string[] = [];
    for (const material of plan.materials) {
      const found = findMaterial(material, supplies);
      if (found && found.quantityLevel === 'plenty') onHand.push(material);
      else toBuy.push(material);
    }
    return {
      suggestedProject: plan,
      onHand,
      toBuy,
      message: `Here's a project plan for: ${input.query}`,
    };
  },
});

// ─── Writes ───

const projectFields = {
  title: z.string().trim().min(1).describe('Project title'),
  description: z.string().optional().describe('What the project is about'),
  medium: z.string().trim().min(1).optional().describe('watercolor, oil, acrylic...'),
  style: z.string().trim().min(1).optional().describe('Style or subject, e.g. "loose landscape"'),
  materials: z.array(z.string().trim().min(1)).optional().describe('Materials the project needs'),
  steps: z.array(z.string().trim().min(1)).optional().describe('Planned steps, in order'),
  notes: z.string().optional().describe('Free-form notes'),
  estimatedBudget: z.number().min(0).optional().describe('Budget estimate for materials'),
};

export const createProjectTool = defineTool({
  name: 'create_project',
  description: `Create a project record. Status defaults to idea.

Example: { title: "Sunflower study", medium: "watercolor", materials: ["Winsor Yellow", "Cold press paper"] }`,
  domains: ['projects'],
  schema: z.object({
    ...projectFields,
    status: z.enum(PROJECT_STATUSES).default('idea').describe('idea, in-progress or completed'),
  }),
  handler: (input, { store }) => {
    const project = store.projects.create(input);
    return { project, message: `Created project "${project.title}" (${project.status})` };
  },
});

export const updateProjectTool = defineTool({
  name: 'update_project',
  description:
    'Change fields of a project. Status moves forward only (idea → in-progress → completed); pass reset: true to move it back.',
  domains: ['projects'],
  schema: z.object({
    projectId: projectId.describe('Project to change'),
    ...z.object(projectFields).partial().shape,
    status: z.enum(PROJECT_STATUSES).optional().describe('New status'),
    reset: z.boolean().default(false).describe('Allow moving status backwards'),
  }),
  handler: (input, { store }) => {
    const { projectId: id, reset, ...patch } = input;
    const current = requireProject(store, id);
    if (patch.status && !reset && !isForwardTransition(current.status, patch.status)) {
      throw new ValidationError(
        'status',
        `Cannot move project from ${current.status} back to ${patch.status} without reset`,
      );
    }

    const project = store.projects.update(id, patch);
    if (!project) throw new ValidationError('projectId', `Project ${id} not found`);
    return { project, message: `Updated project "${project.title}"` };
  },
});

export const linkProjectSuppliesTool = defineTool({
  name: 'link_project_supplies',
  description: 'Link inventory supplies to a project.',
  domains: ['projects'],
  schema: z.object({
    projectId: projectId.describe('Project id'),
    supplyIds: z.array(z.number().int().positive()).min(1).describe('Supplies to link'),
  }),
  handler: (input, { store }) => {
    requireProject(store, input.projectId);
    for (const id of input.supplyIds) requireSupply(store, id, 'supplyIds');

    const project = store.projects.linkSupplies(input.projectId, input.supplyIds);
    if (!project) throw new ValidationError('projectId', `Project ${input.projectId} not found`);
    return { project, message: `Linked ${input.supplyIds.length} supplies to "${project.title}"` };
  },
});

export const addSessionNotesTool = defineTool({
  name: 'add_session_notes',
  description: "Append dated notes from a painting session to a project's notes.",
  domains: ['projects'],
  schema: z.object({
    projectId: projectId.describe('Project id'),
    notes: z.string().trim().min(1).describe('What happened in the session'),
  }),
  handler: (input, { store }) => {
    const project = store.projects.appendNotes(input.projectId, input.notes);
    if (!project) throw new ValidationError('projectId', `Project ${input.projectId} not found`);
    return { project, message: `Added notes to "${project.title}"` };
  },
});

export const completeProjectTool = defineTool({
  name: 'complete_project',
  description:
    'Mark a project completed and record it in the portfolio: completes its linked piece, or creates a completed piece when there is none.',
  domains: ['projects', 'portfolio'],
  schema: z.object({
    projectId: projectId.describe('Project to complete'),
    imageRef: z.string().trim().min(1).optional().describe('Reference to a photo of the finished piece'),
    dimensions: z.string().trim().min(1).optional().describe('Finished size, e.g. "30x40cm"'),
  }),
  handler: (input, { store }) =>
    store.transaction(() => {
      const current = requireProject(store, input.projectId);
      if (current.status === 'completed') {
        throw new ValidationError('projectId', `Project "${current.title}" is already completed`);
      }

      const project = store.projects.update(current.id, { status: 'completed' });
      if (!project) throw new ValidationError('projectId', `Project ${input.projectId} not found`);

      const linked = store.portfolio.findByProject(project.id);
      let piece: PortfolioPiece | undefined;
      if (!linked) {
        piece = store.portfolio.create({
          title: project.title,
          description: project.description,
          projectId: project.id,
          status: 'completed',
          medium: project.medium,
          dimensions: input.dimensions,
          imageRef: input.imageRef,
        });
      } else if (linked.status !== 'completed') {
        piece = store.portfolio.update(linked.id, {
          status: 'completed',
          dimensions: input.dimensions,
          imageRef: input.imageRef,
        });
      } else {
        piece = linked;
      }

      return {
        project,
        portfolioPiece: piece ?? null,
        message: `Completed "${project.title}" and added it to the portfolio`,
      };
    }),
});
