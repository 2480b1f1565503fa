import { describe, it, expect } from 'vitest';
import type { InternalAxiosRequestConfig } from 'axios';
import { HarvestService } from '../../src/services/harvest.js';
import { ApiRequestError, AuthError } from '../../src/errors.js';
import type { HarvestConfig, HarvestTimeEntryInput } from '../../src/types/harvest.js';
import { fakeAdapter, jsonBody } from '../helpers/http.js';

const config: HarvestConfig = {
  accessToken: 'test-token',
  accountId: '12345',
  baseUrl: 'https://harvest.test/v2',
  timeoutMs: 1000,
};

const input: HarvestTimeEntryInput = {
  project_id: 10,
  task_id: 100,
  spent_date: '2024-03-04',
  hours: 0.5,
  notes: 'Homepage mockups',
  external_reference: { id: '/time-entries/1', group_id: 'timing' },
};

describe('HarvestService', () => {
  it('should send the token and account id with every request', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const harvest = new HarvestService(
      config,
      fakeAdapter(() => ({ status: 200, data: { clients: [], links: { next: null } } }), requests)
    );

    await harvest.getClients();

    expect(requests[0].headers.get('Authorization')).toBe('Bearer test-token');
    expect(requests[0].headers.get('Harvest-Account-ID')).toBe('12345');
    expect(requests[0].url).toBe('/clients');
    expect(requests[0].params).toEqual({ is_active: true });
  });

  it('should follow next links until the last page', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const harvest = new HarvestService(
      config,
      fakeAdapter((request) => {
        if (request.url === '/projects') {
          return {
            status: 200,
            data: {
              projects: [{ id: 10, name: 'Website Redesign' }],
              links: { next: 'https://harvest.test/v2/projects?client_id=1&is_active=true&page=2' },
            },
          };
        }
        return { status: 200, data: { projects: [{ id: 11, name: 'Support' }], links: { next: null } } };
      }, requests)
    );

    const projects = await harvest.getProjects(1);

    expect(projects.map((p) => p.id)).toEqual([10, 11]);
    expect(requests.map((r) => r.url)).toEqual([
      '/projects',
      'https://harvest.test/v2/projects?client_id=1&is_active=true&page=2',
    ]);
    expect(requests[0].params).toEqual({ client_id: 1, is_active: true });
    expect(requests[1].params).toBeUndefined();
  });

  it('should query time entries for a single day', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const harvest = new HarvestService(
      config,
      fakeAdapter(() => ({ status: 200, data: { time_entries: [], links: { next: null } } }), requests)
    );

    await harvest.getTimeEntries('2024-03-04');

    expect(requests[0].url).toBe('/time_entries');
    expect(requests[0].params).toEqual({ from: '2024-03-04', to: '2024-03-04' });
  });

  it('should read task assignments of a project', async () => {
    const harvest = new HarvestService(
      config,
      fakeAdapter((request) => ({
        status: 200,
        data: {
          task_assignments: request.url === '/projects/10/task_assignments'
            ? [{ id: 1, is_active: true, billable: true, task: { id: 100, name: 'Design' } }]
            : [],
          links: { next: null },
        },
      }))
    );

    const assignments = await harvest.getProjectTasks(10);

    expect(assignments.map((a) => a.task.name)).toEqual(['Design']);
  });

  it('should post new entries and patch existing ones', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const harvest = new HarvestService(
      config,
      fakeAdapter((request) => ({ status: request.method === 'post' ? 201 : 200, data: { id: 77 } }), requests)
    );

    const created = await harvest.createTimeEntry(input);
    await harvest.updateTimeEntry(77, { ...input, hours: 0.75 });

    expect(created.id).toBe(77);
    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual(['post /time_entries', 'patch /time_entries/77']);
    expect(jsonBody(requests[0])).toEqual(input);
    expect(jsonBody(requests[1])).toEqual({ ...input, hours: 0.75 });
  });

  it('should turn 401 into an AuthError', async () => {
    const harvest = new HarvestService(
      config,
      fakeAdapter(() => ({ status: 401, data: { error: 'invalid_token' } }))
    );

    await expect(harvest.getClients()).rejects.toBeInstanceOf(AuthError);
  });

  it('should include the API message in other failures', async () => {
    const harvest = new HarvestService(
      config,
      fakeAdapter(() => ({ status: 422, data: { message: 'Spent date is not a valid date' } }))
    );

    const result = harvest.createTimeEntry(input);

    await expect(result).rejects.toBeInstanceOf(ApiRequestError);
    await expect(result).rejects.toHaveProperty('status', 422);
    await expect(result).rejects.toThrow('Failed to create time entry: Spent date is not a valid date');
  });
});
