import type {
  CustomFieldValue,
  HarvestAssociation,
  TimingApi,
  TimingProject,
  TimingProjectRecord,
  TimingTimeEntry,
  TimingTimeEntryRecord,
} from '../types/timing.js';
import { AuthError, CatalogFetchError } from '../errors.js';
import { bareProjectId } from './timing.js';
import { parseISO } from 'date-fns';

export const HARVEST_PROJECT_ID_FIELD = 'harvest_project_id';
export const HARVEST_TASK_ID_FIELD = 'harvest_task_id';

function fieldValue(value: CustomFieldValue | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function toTimingProject(record: TimingProjectRecord): TimingProject {
  const fields = record.custom_fields ?? {};
  return {
    id: record.self,
    title: record.title,
    children: (record.children ?? []).map(toTimingProject),
    harvestProjectId: fieldValue(fields[HARVEST_PROJECT_ID_FIELD]),
    harvestTaskId: fieldValue(fields[HARVEST_TASK_ID_FIELD]),
  };
}

export function toTimingTimeEntry(record: TimingTimeEntryRecord): TimingTimeEntry {
  return {
    id: record.self,
    projectId: record.project?.self ?? null,
    start: parseISO(record.start_date),
    end: parseISO(record.end_date),
    title: record.title?.trim() ?? '',
    notes: record.notes?.trim() ?? '',
    isRunning: record.is_running ?? false,
  };
}

export async function loadProjectTree(timing: TimingApi): Promise<TimingProject[]> {
  try {
    const records = await timing.getProjectHierarchy();
    return records.map(toTimingProject);
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    throw new CatalogFetchError('timing-projects', error);
  }
}

/**
 * Depth-first pre-order walk yielding `[depth, project]`, roots at depth 0.
 * Uses an explicit stack so deep trees don't grow the call stack.
 */
export function* listProjectsHierarchically(tree: TimingProject[]): Generator<[number, TimingProject]> {
  const stack: Array<[number, TimingProject]> = [];
  for (let i = tree.length - 1; i >= 0; i--) {
    stack.push([0, tree[i]]);
  }

  let next = stack.pop();
  while (next) {
    const [depth, project] = next;
    yield [depth, project];
    for (let i = project.children.length - 1; i >= 0; i--) {
      stack.push([depth + 1, project.children[i]]);
    }
    next = stack.pop();
  }
}

export function findProjectById(tree: TimingProject[], projectId: string): TimingProject | undefined {
  const wanted = bareProjectId(projectId);
  for (const [, project] of listProjectsHierarchically(tree)) {
    if (bareProjectId(project.id) === wanted) {
      return project;
    }
  }
  return undefined;
}

/**
 * Path from a root down to the project (inclusive), or undefined when the
 * project isn't in the tree.
 */
function pathTo(tree: TimingProject[], projectId: string): TimingProject[] | undefined {
  const wanted = bareProjectId(projectId);
  const path: TimingProject[] = [];
  for (const [depth, project] of listProjectsHierarchically(tree)) {
    path.length = depth;
    path.push(project);
    if (bareProjectId(project.id) === wanted) {
      return path;
    }
  }
  return undefined;
}

export interface ResolvedAssociation {
  project: TimingProject;
  association: HarvestAssociation;
}

/**
 * The Harvest ids that apply to a project. Each id is taken from the project
 * itself or, failing that, from its nearest ancestor that sets it.
 */
export function resolveAssociation(tree: TimingProject[], projectId: string): ResolvedAssociation | undefined {
  const path = pathTo(tree, projectId);
  if (!path) {
    return undefined;
  }

  const association: HarvestAssociation = {};
  for (let i = path.length - 1; i >= 0; i--) {
    if (!association.harvestProjectId) {
      association.harvestProjectId = path[i].harvestProjectId;
    }
    if (!association.harvestTaskId) {
      association.harvestTaskId = path[i].harvestTaskId;
    }
  }

  return { project: path[path.length - 1], association };
}

export function formatProjectLine(depth: number, project: TimingProject): string {
  const parts: string[] = [];
  if (project.harvestProjectId) {
    parts.push(`project ${project.harvestProjectId}`);
  }
  if (project.harvestTaskId) {
    parts.push(`task ${project.harvestTaskId}`);
  }
  const suffix = parts.length > 0 ? ` (Harvest ${parts.join('; ')})` : '';
  return `${'\t'.repeat(depth)}${project.title} (${project.id})${suffix}`;
}
