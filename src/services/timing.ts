import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import type {
  CustomFieldValue,
  TimeRange,
  TimingApi,
  TimingConfig,
  TimingPage,
  TimingProjectRecord,
  TimingTimeEntryRecord,
} from '../types/timing.js';
import { toApiError } from '../errors.js';
import { USER_AGENT } from './harvest.js';

export const TIMING_API_BASE = 'https://web.timingapp.com/api/v1';

/**
 * Accepts `12`, `/projects/12` or `projects/12` and returns the bare id.
 */
export function bareProjectId(projectId: string): string {
  return projectId.replace(/^\/?projects\//, '');
}

export class TimingService implements TimingApi {
  private client: AxiosInstance;

  constructor(config: TimingConfig, adapter?: AxiosAdapter) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      adapter,
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'application/json',
      },
    });

    this.client.interceptors.request.use((request) => {
      request.headers['Authorization'] = `Bearer ${config.accessToken}`;
      return request;
    });
  }

  async getProjectHierarchy(): Promise<TimingProjectRecord[]> {
    try {
      const response = await this.client.get<TimingPage<TimingProjectRecord>>('/projects/hierarchy');
      return response.data.data;
    } catch (error) {
      throw toApiError('timing', 'fetch project hierarchy', error);
    }
  }

  async getTimeEntries(range: TimeRange): Promise<TimingTimeEntryRecord[]> {
    const entries: TimingTimeEntryRecord[] = [];
    let url: string | null = '/time-entries';
    let params: Record<string, string> | undefined = {
      start_date_min: range.start.toISOString(),
      start_date_max: range.end.toISOString(),
    };

    try {
      while (url) {
        const response: AxiosResponse<TimingPage<TimingTimeEntryRecord>> = await this.client.get<TimingPage<TimingTimeEntryRecord>>(url, { params });
        entries.push(...response.data.data);
        url = response.data.links?.next ?? null;
        params = undefined;
      }
    } catch (error) {
      throw toApiError('timing', 'fetch time entries', error);
    }

    return entries;
  }

  async updateProjectCustomFields(projectId: string, fields: Record<string, CustomFieldValue>): Promise<void> {
    const id = bareProjectId(projectId);
    try {
      await this.client.patch(`/projects/${id}`, { custom_fields: fields });
    } catch (error) {
      throw toApiError('timing', `update project ${id}`, error);
    }
  }
}
