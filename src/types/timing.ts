export type CustomFieldValue = string | null;

export interface TimingProjectRecord {
  self: string;
  title: string;
  title_chain?: string[];
  color?: string;
  is_archived?: boolean;
  custom_fields?: Record<string, CustomFieldValue | undefined> | null;
  children?: TimingProjectRecord[];
}

export interface TimingTimeEntryRecord {
  self: string;
  start_date: string;
  end_date: string;
  duration?: number;
  title: string | null;
  notes: string | null;
  is_running?: boolean;
  project: { self: string } | null;
  custom_fields?: Record<string, CustomFieldValue | undefined> | null;
}

export interface TimingPage<T> {
  data: T[];
  links?: { next: string | null };
}

export interface TimingConfig {
  accessToken: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface TimeRange {
  start: Date;
  end: Date;
}

export interface TimingApi {
  getProjectHierarchy(): Promise<TimingProjectRecord[]>;
  /** Entries whose start date lies within the range. */
  getTimeEntries(range: TimeRange): Promise<TimingTimeEntryRecord[]>;
  updateProjectCustomFields(projectId: string, fields: Record<string, CustomFieldValue>): Promise<void>;
}

export interface TimingProject {
  id: string;
  title: string;
  children: TimingProject[];
  harvestProjectId?: string;
  harvestTaskId?: string;
}

export interface TimingTimeEntry {
  id: string;
  projectId: string | null;
  start: Date;
  end: Date;
  title: string;
  notes: string;
  isRunning: boolean;
}

export interface HarvestAssociation {
  harvestProjectId?: string;
  harvestTaskId?: string;
}
