import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import type {
  HarvestApi,
  HarvestClientRecord,
  HarvestConfig,
  HarvestPage,
  HarvestProjectRecord,
  HarvestTaskAssignment,
  HarvestTimeEntry,
  HarvestTimeEntryInput,
} from '../types/harvest.js';
import { toApiError } from '../errors.js';

export const HARVEST_API_BASE = 'https://api.harvestapp.com/v2';
export const USER_AGENT = 'Timing to Harvest Sync';

type QueryParams = Record<string, string | number | boolean>;

export class HarvestService implements HarvestApi {
  private client: AxiosInstance;

  constructor(config: HarvestConfig, adapter?: AxiosAdapter) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      adapter,
      headers: {
        'User-Agent': USER_AGENT,
        'Content-Type': 'application/json',
      },
    });

    this.client.interceptors.request.use((request) => {
      request.headers['Authorization'] = `Bearer ${config.accessToken}`;
      request.headers['Harvest-Account-ID'] = config.accountId;
      return request;
    });
  }

  /**
   * Collects every page of a list endpoint. Harvest's `links.next` already
   * carries the original query, so params are only sent with the first page.
   */
  private async paginate<K extends string, T>(path: string, key: K, params?: QueryParams): Promise<T[]> {
    const results: T[] = [];
    let url: string | null = path;
    let query: QueryParams | undefined = params;

    while (url) {
      const response: AxiosResponse<HarvestPage<K, T>> = await this.client.get<HarvestPage<K, T>>(url, { params: query });
      const items: Record<K, T[]> = response.data;
      results.push(...items[key]);
      url = response.data.links?.next ?? null;
      query = undefined;
    }

    return results;
  }

  async getClients(): Promise<HarvestClientRecord[]> {
    try {
      return await this.paginate<'clients', HarvestClientRecord>('/clients', 'clients', { is_active: true });
    } catch (error) {
      throw toApiError('harvest', 'fetch clients', error);
    }
  }

  async getProjects(clientId: number): Promise<HarvestProjectRecord[]> {
    try {
      return await this.paginate<'projects', HarvestProjectRecord>('/projects', 'projects', {
        client_id: clientId,
        is_active: true,
      });
    } catch (error) {
      throw toApiError('harvest', `fetch projects for client ${clientId}`, error);
    }
  }

  async getProjectTasks(projectId: number): Promise<HarvestTaskAssignment[]> {
    try {
      return await this.paginate<'task_assignments', HarvestTaskAssignment>(
        `/projects/${projectId}/task_assignments`,
        'task_assignments',
        { is_active: true }
      );
    } catch (error) {
      throw toApiError('harvest', `fetch tasks for project ${projectId}`, error);
    }
  }

  async getTimeEntries(date: string): Promise<HarvestTimeEntry[]> {
    try {
      return await this.paginate<'time_entries', HarvestTimeEntry>('/time_entries', 'time_entries', {
        from: date,
        to: date,
      });
    } catch (error) {
      throw toApiError('harvest', `fetch time entries for ${date}`, error);
    }
  }

  async createTimeEntry(entry: HarvestTimeEntryInput): Promise<HarvestTimeEntry> {
    try {
      const response = await this.client.post<HarvestTimeEntry>('/time_entries', entry);
      return response.data;
    } catch (error) {
      throw toApiError('harvest', 'create time entry', error);
    }
  }

  async updateTimeEntry(id: number, entry: HarvestTimeEntryInput): Promise<HarvestTimeEntry> {
    try {
      const response = await this.client.patch<HarvestTimeEntry>(`/time_entries/${id}`, entry);
      return response.data;
    } catch (error) {
      throw toApiError('harvest', `update time entry ${id}`, error);
    }
  }
}
