export interface HarvestReference {
  id: number;
  name: string;
}

export interface HarvestExternalReference {
  id: string;
  group_id?: string | null;
  permalink?: string | null;
}

export interface HarvestTimeEntry {
  id: number;
  spent_date: string;
  hours: number;
  notes: string | null;
  project: HarvestReference;
  task: HarvestReference;
  external_reference: HarvestExternalReference | null;
}

export interface HarvestTimeEntryInput {
  project_id: number;
  task_id: number;
  spent_date: string;
  hours: number;
  notes: string;
  external_reference: HarvestExternalReference;
}

export interface HarvestClientRecord {
  id: number;
  name: string;
  is_active: boolean;
}

export interface HarvestProjectRecord {
  id: number;
  name: string;
  code: string | null;
  is_active: boolean;
  client: HarvestReference;
}

export interface HarvestTaskAssignment {
  id: number;
  is_active: boolean;
  billable: boolean | null;
  task: HarvestReference;
}

export interface HarvestLinks {
  first?: string;
  next: string | null;
  previous?: string | null;
  last?: string;
}

export type HarvestPage<K extends string, T> = { [P in K]: T[] } & {
  links: HarvestLinks;
};

export interface HarvestConfig {
  accessToken: string;
  accountId: string;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * The subset of the Harvest v2 REST API the sync needs.
 */
export interface HarvestApi {
  getClients(): Promise<HarvestClientRecord[]>;
  getProjects(clientId: number): Promise<HarvestProjectRecord[]>;
  getProjectTasks(projectId: number): Promise<HarvestTaskAssignment[]>;
  /** Entries whose `spent_date` falls on the given `YYYY-MM-DD` day. */
  getTimeEntries(date: string): Promise<HarvestTimeEntry[]>;
  createTimeEntry(entry: HarvestTimeEntryInput): Promise<HarvestTimeEntry>;
  updateTimeEntry(id: number, entry: HarvestTimeEntryInput): Promise<HarvestTimeEntry>;
}

// Catalog tree. Back-references point at the owning node.

export interface CatalogClient {
  id: number;
  name: string;
  projects: CatalogProject[];
}

export interface CatalogProject {
  id: number;
  name: string;
  client: CatalogClient;
  tasks: CatalogTask[];
}

export interface CatalogTask {
  id: number;
  name: string;
  project: CatalogProject;
}

export interface HarvestCatalog {
  clients: CatalogClient[];
}

export interface TaskListing {
  clientName: string;
  projectName: string;
  taskName: string;
  projectId: number;
  taskId: number;
}
