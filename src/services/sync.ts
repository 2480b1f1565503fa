import { isValid, subHours } from 'date-fns';
import type { HarvestApi, HarvestCatalog } from '../types/harvest.js';
import type { TimingApi, TimingProject, TimingTimeEntry, TimingTimeEntryRecord } from '../types/timing.js';
import type { Logger, SyncAction, SyncOptions, SyncOutcome, SyncReport } from '../types/sync.js';
import { AuthError, CatalogFetchError, RemoteWriteError } from '../errors.js';
import { loadCatalog } from './harvestCatalog.js';
import { loadProjectTree, resolveAssociation, toTimingTimeEntry } from './timingCatalog.js';
import { reconcileEntry } from './reconciler.js';
import { overlaps } from '../utils/time.js';

export const DEFAULT_LOOKBACK_HOURS = 24;

function hasValidDates(entry: TimingTimeEntry): boolean {
  return isValid(entry.start) && isValid(entry.end);
}

function describeEntry(entry: TimingTimeEntry): string {
  const label = entry.title || entry.notes || entry.id;
  return isValid(entry.start) ? `${entry.start.toISOString()} ${label}` : label;
}

export class SyncService {
  constructor(
    private timing: TimingApi,
    private harvest: HarvestApi,
    private options: SyncOptions,
    private logger: Logger = console
  ) {}

  /**
   * Timing entries overlapping `[start, end)`, earliest first. Timing filters
   * by start date only, so the query reaches back `lookbackHours` to catch
   * entries that began before the window; running timers are left out.
   * Entries whose dates did not parse are kept, last, so they get reported.
   */
  async listEntries(start: Date, end: Date): Promise<TimingTimeEntry[]> {
    const lookback = this.options.lookbackHours ?? DEFAULT_LOOKBACK_HOURS;
    let records: TimingTimeEntryRecord[];
    try {
      records = await this.timing.getTimeEntries({ start: subHours(start, lookback), end });
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      throw new CatalogFetchError('timing-time-entries', error);
    }

    const all = records.map(toTimingTimeEntry);
    const unreadable = all.filter((entry) => !entry.isRunning && !hasValidDates(entry));
    const entries = all.filter((entry) => hasValidDates(entry) && overlaps(entry.start, entry.end, start, end));

    const running = entries.filter((entry) => entry.isRunning);
    if (running.length > 0) {
      this.logger.warn(`⚠️ Ignoring ${running.length} running timer(s)`);
    }

    return entries
      .filter((entry) => !entry.isRunning)
      .sort((a, b) => a.start.getTime() - b.start.getTime())
      .concat(unreadable);
  }

  async sendToHarvest(start: Date, end: Date): Promise<SyncReport> {
    this.logger.log('Fetching Timing projects...');
    const tree = await loadProjectTree(this.timing);
    this.logger.log('Fetching Harvest clients, projects and tasks...');
    const catalog = await loadCatalog(this.harvest);
    this.logger.log('Fetching Timing time entries...');
    const entries = await this.listEntries(start, end);

    const report: SyncReport = {
      start,
      end,
      dryRun: this.options.dryRun,
      created: 0,
      updated: 0,
      unchanged: 0,
      skipped: 0,
      failed: 0,
      outcomes: [],
    };

    this.logger.log(`\nProcessing ${entries.length} time entries${this.options.dryRun ? ' (dry run)' : ''}...`);
    for (const entry of entries) {
      const outcome = await this.processEntry(entry, tree, catalog);
      report[outcome.status] += 1;
      report.outcomes.push(outcome);
      this.logOutcome(outcome);
    }

    return report;
  }

  private async processEntry(
    entry: TimingTimeEntry,
    tree: TimingProject[],
    catalog: HarvestCatalog
  ): Promise<SyncOutcome> {
    const resolved = entry.projectId ? resolveAssociation(tree, entry.projectId) : undefined;
    const action = await reconcileEntry(entry, resolved, catalog, this.harvest, this.options);
    return this.apply(entry, action);
  }

  private async apply(entry: TimingTimeEntry, action: SyncAction): Promise<SyncOutcome> {
    const base = { entryId: entry.id, description: describeEntry(entry) };

    switch (action.kind) {
      case 'skip':
        return { ...base, status: 'skipped', reason: action.reason, message: action.message };
      case 'failed':
        return { ...base, status: 'failed', message: action.message };
      case 'unchanged':
        return { ...base, status: 'unchanged', harvestEntryId: action.harvestEntryId };
      case 'create': {
        if (this.options.dryRun) {
          return { ...base, status: 'created' };
        }
        try {
          const created = await this.harvest.createTimeEntry(action.entry);
          return { ...base, status: 'created', harvestEntryId: created.id };
        } catch (error) {
          return this.writeFailure(base, new RemoteWriteError('create', error));
        }
      }
      case 'update': {
        const updated: SyncOutcome = {
          ...base,
          status: 'updated',
          harvestEntryId: action.harvestEntryId,
          message: action.changes.join(', '),
        };
        if (this.options.dryRun) {
          return updated;
        }
        try {
          await this.harvest.updateTimeEntry(action.harvestEntryId, action.entry);
          return updated;
        } catch (error) {
          return this.writeFailure(base, new RemoteWriteError('update', error));
        }
      }
    }
  }

  private writeFailure(base: Pick<SyncOutcome, 'entryId' | 'description'>, error: RemoteWriteError): SyncOutcome {
    if (error.cause instanceof AuthError) {
      throw error.cause;
    }
    return { ...base, status: 'failed', message: error.message };
  }

  private logOutcome(outcome: SyncOutcome): void {
    switch (outcome.status) {
      case 'created':
      case 'updated':
        this.logger.log(`✓ ${outcome.status === 'created' ? 'Created' : 'Updated'}: ${outcome.description}`);
        break;
      case 'unchanged':
        this.logger.log(`= Unchanged: ${outcome.description}`);
        break;
      case 'skipped':
        this.logger.warn(`⚠️ Skipped: ${outcome.description} (${outcome.message ?? outcome.reason})`);
        break;
      case 'failed':
        this.logger.error(`✗ Failed: ${outcome.description} (${outcome.message})`);
        break;
    }
  }
}
