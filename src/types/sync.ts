import type { HarvestTimeEntryInput } from './harvest.js';

export type SkipReason = 'NoAssociation' | 'IncompleteAssociation' | 'StaleAssociation';

export type SyncAction =
  | { kind: 'skip'; reason: SkipReason; message: string }
  | { kind: 'create'; entry: HarvestTimeEntryInput }
  | { kind: 'update'; harvestEntryId: number; entry: HarvestTimeEntryInput; changes: string[] }
  | { kind: 'unchanged'; harvestEntryId: number }
  | { kind: 'failed'; message: string; cause: unknown };

export interface ReconcileOptions {
  /** IANA zone used to pick the Harvest date; process local time when unset. */
  timeZone?: string;
  /** Round durations to the nearest N minutes; 0 keeps exact seconds. */
  roundingMinutes: number;
}

export interface SyncOptions extends ReconcileOptions {
  dryRun: boolean;
  /** How far before the window the Timing query starts; 24 when unset. */
  lookbackHours?: number;
}

export type SyncStatus = 'created' | 'updated' | 'unchanged' | 'skipped' | 'failed';

export interface SyncOutcome {
  entryId: string;
  description: string;
  status: SyncStatus;
  harvestEntryId?: number;
  reason?: SkipReason;
  message?: string;
}

export interface SyncReport {
  start: Date;
  end: Date;
  dryRun: boolean;
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  failed: number;
  outcomes: SyncOutcome[];
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
