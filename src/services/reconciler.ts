import type {
  HarvestApi,
  HarvestCatalog,
  HarvestTimeEntry,
  HarvestTimeEntryInput,
} from '../types/harvest.js';
import type { HarvestAssociation, TimingTimeEntry } from '../types/timing.js';
import type { ReconcileOptions, SyncAction } from '../types/sync.js';
import type { ResolvedAssociation } from './timingCatalog.js';
import { isValid } from 'date-fns';
import { AssociationError, AuthError, describeError } from '../errors.js';
import { findProject, findTask } from './harvestCatalog.js';
import { calendarDate, durationSeconds, secondsToHours } from '../utils/time.js';

// Harvest keeps hours to two decimal places.
const HOURS_PRECISION = 100;

export const EXTERNAL_REFERENCE_GROUP = 'timing';

export interface HarvestTarget {
  projectId: number;
  taskId: number;
}

/** Hours as Harvest stores them, so a value read back compares equal. */
export function toHarvestHours(hours: number): number {
  return Math.round(hours * HOURS_PRECISION) / HOURS_PRECISION;
}

function sameHours(a: number, b: number): boolean {
  return Math.round(a * HOURS_PRECISION) === Math.round(b * HOURS_PRECISION);
}

function parseHarvestId(value: string): number | undefined {
  return /^\d+$/.test(value) ? Number(value) : undefined;
}

/**
 * Checks a Timing project's association against the live catalog and returns
 * the Harvest project/task pair to book time against.
 */
export function resolveHarvestTarget(
  association: HarvestAssociation,
  catalog: HarvestCatalog,
  projectTitle: string
): HarvestTarget {
  const { harvestProjectId, harvestTaskId } = association;

  if (!harvestProjectId && !harvestTaskId) {
    throw new AssociationError('NoAssociation', `No Harvest project or task set for Timing project "${projectTitle}"`);
  }
  if (!harvestTaskId) {
    throw new AssociationError('IncompleteAssociation', `Harvest task ID not set for Timing project "${projectTitle}"`);
  }
  if (!harvestProjectId) {
    throw new AssociationError('IncompleteAssociation', `Harvest project ID not set for Timing project "${projectTitle}"`);
  }

  const projectId = parseHarvestId(harvestProjectId);
  const project = projectId === undefined ? undefined : findProject(catalog, projectId);
  if (!project) {
    throw new AssociationError(
      'StaleAssociation',
      `Harvest project ${harvestProjectId} set on Timing project "${projectTitle}" does not exist`
    );
  }

  const taskId = parseHarvestId(harvestTaskId);
  const task = taskId === undefined ? undefined : findTask(project, taskId);
  if (!task) {
    throw new AssociationError(
      'StaleAssociation',
      `Harvest task ${harvestTaskId} is not assigned to Harvest project "${project.name}" (${project.id})`
    );
  }

  return { projectId: project.id, taskId: task.id };
}

export function entryNotes(entry: TimingTimeEntry): string {
  return [entry.title, entry.notes].filter((part) => part.length > 0).join('\n');
}

export function buildHarvestEntry(
  entry: TimingTimeEntry,
  target: HarvestTarget,
  options: ReconcileOptions
): HarvestTimeEntryInput {
  const seconds = durationSeconds(entry.start, entry.end);
  return {
    project_id: target.projectId,
    task_id: target.taskId,
    spent_date: calendarDate(entry.start, options.timeZone),
    hours: toHarvestHours(secondsToHours(seconds, options.roundingMinutes)),
    notes: entryNotes(entry),
    external_reference: {
      id: entry.id,
      group_id: EXTERNAL_REFERENCE_GROUP,
    },
  };
}

/** The Harvest entry carrying the token; the lowest id wins if there are several. */
export function findExistingEntry(entries: HarvestTimeEntry[], token: string): HarvestTimeEntry | undefined {
  let found: HarvestTimeEntry | undefined;
  for (const entry of entries) {
    if (entry.external_reference?.id === token && (!found || entry.id < found.id)) {
      found = entry;
    }
  }
  return found;
}

export function diffTimeEntry(existing: HarvestTimeEntry, desired: HarvestTimeEntryInput): string[] {
  const changes: string[] = [];
  if (!sameHours(existing.hours, desired.hours)) {
    changes.push('hours');
  }
  if (existing.spent_date !== desired.spent_date) {
    changes.push('spent_date');
  }
  if ((existing.notes ?? '') !== desired.notes) {
    changes.push('notes');
  }
  if (existing.project.id !== desired.project_id) {
    changes.push('project');
  }
  if (existing.task.id !== desired.task_id) {
    changes.push('task');
  }
  return changes;
}

/**
 * Decides what to do in Harvest for one Timing entry. Only the day lookup
 * touches the network; an AuthError from it is rethrown, anything else
 * becomes a `failed` action, as does an entry whose dates did not parse.
 */
export async function reconcileEntry(
  entry: TimingTimeEntry,
  resolved: ResolvedAssociation | undefined,
  catalog: HarvestCatalog,
  harvest: Pick<HarvestApi, 'getTimeEntries'>,
  options: ReconcileOptions
): Promise<SyncAction> {
  if (!isValid(entry.start) || !isValid(entry.end)) {
    return { kind: 'failed', message: 'Time entry has an unreadable start or end date', cause: undefined };
  }

  if (!resolved) {
    const message = entry.projectId
      ? `Timing project ${entry.projectId} not found`
      : 'Time entry is not assigned to a Timing project';
    return { kind: 'skip', reason: 'NoAssociation', message };
  }

  let target: HarvestTarget;
  try {
    target = resolveHarvestTarget(resolved.association, catalog, resolved.project.title);
  } catch (error) {
    if (error instanceof AssociationError) {
      return { kind: 'skip', reason: error.reason, message: error.message };
    }
    throw error;
  }

  const desired = buildHarvestEntry(entry, target, options);

  let existing: HarvestTimeEntry | undefined;
  try {
    existing = findExistingEntry(await harvest.getTimeEntries(desired.spent_date), entry.id);
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    return {
      kind: 'failed',
      message: `Failed to look up Harvest entries for ${desired.spent_date}: ${describeError(error)}`,
      cause: error,
    };
  }

  if (!existing) {
    return { kind: 'create', entry: desired };
  }

  const changes = diffTimeEntry(existing, desired);
  if (changes.length === 0) {
    return { kind: 'unchanged', harvestEntryId: existing.id };
  }
  return { kind: 'update', harvestEntryId: existing.id, entry: desired, changes };
}
