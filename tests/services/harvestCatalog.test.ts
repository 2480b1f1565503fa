import { describe, it, expect } from 'vitest';
import {
  findProject,
  findTask,
  formatCatalog,
  listTasks,
  loadCatalog,
} from '../../src/services/harvestCatalog.js';
import { ApiRequestError, AuthError, CatalogFetchError } from '../../src/errors.js';
import { FakeHarvest } from '../helpers/fakes.js';

describe('loadCatalog', () => {
  it('should assemble clients, projects and tasks in source order', async () => {
    const catalog = await loadCatalog(new FakeHarvest());

    expect(catalog.clients.map((c) => c.name)).toEqual(['Acme Corp', 'Globex']);
    expect(catalog.clients[0].projects.map((p) => p.id)).toEqual([10, 11]);
    expect(catalog.clients[0].projects[1].tasks.map((t) => t.name)).toEqual(['Development', 'Maintenance']);
  });

  it('should link children back to their parents', async () => {
    const catalog = await loadCatalog(new FakeHarvest());
    const project = catalog.clients[1].projects[0];

    expect(project.client).toBe(catalog.clients[1]);
    expect(project.tasks[0].project).toBe(project);
  });

  it('should name the stage that failed and return nothing', async () => {
    const harvest = new FakeHarvest();
    harvest.failTasksFor = { projectId: 11, error: new ApiRequestError('harvest', 'Failed to fetch tasks for project 11: timeout', 504) };

    const result = loadCatalog(harvest);

    await expect(result).rejects.toBeInstanceOf(CatalogFetchError);
    await expect(result).rejects.toHaveProperty('stage', 'tasks');
    await expect(result).rejects.toThrow('Failed to load catalog (tasks): Failed to fetch tasks for project 11: timeout');
  });

  it('should report client failures as the clients stage', async () => {
    const harvest = new FakeHarvest();
    harvest.failClients = new Error('ECONNRESET');

    await expect(loadCatalog(harvest)).rejects.toHaveProperty('stage', 'clients');
  });

  it('should pass auth errors through unchanged', async () => {
    const harvest = new FakeHarvest();
    harvest.failClients = new AuthError('harvest', 'HTTP 401 while trying to fetch clients');

    await expect(loadCatalog(harvest)).rejects.toBeInstanceOf(AuthError);
  });
});

describe('listTasks', () => {
  it('should flatten the catalog client by client, project by project', async () => {
    const rows = listTasks(await loadCatalog(new FakeHarvest()));

    expect(rows).toEqual([
      { clientName: 'Acme Corp', projectName: 'Website Redesign', taskName: 'Design', projectId: 10, taskId: 100 },
      { clientName: 'Acme Corp', projectName: 'Website Redesign', taskName: 'Development', projectId: 10, taskId: 101 },
      { clientName: 'Acme Corp', projectName: 'Support', taskName: 'Development', projectId: 11, taskId: 101 },
      { clientName: 'Acme Corp', projectName: 'Support', taskName: 'Maintenance', projectId: 11, taskId: 102 },
      { clientName: 'Globex', projectName: 'Data Pipeline', taskName: 'Engineering', projectId: 20, taskId: 200 },
    ]);
  });

  it('should not re-sort what the API returned', async () => {
    const harvest = new FakeHarvest([
      { id: 3, name: 'Zeta', projects: [{ id: 30, name: 'Zulu', tasks: [{ id: 2, name: 'b' }, { id: 1, name: 'a' }] }] },
      { id: 4, name: 'Alpha', projects: [{ id: 40, name: 'Able', tasks: [{ id: 3, name: 'c' }] }] },
    ]);

    const rows = listTasks(await loadCatalog(harvest));

    expect(rows.map((r) => `${r.clientName}/${r.taskName}`)).toEqual(['Zeta/b', 'Zeta/a', 'Alpha/c']);
  });
});

describe('findProject / findTask', () => {
  it('should find projects across clients and tasks within a project', async () => {
    const catalog = await loadCatalog(new FakeHarvest());
    const project = findProject(catalog, 20);

    expect(project?.name).toBe('Data Pipeline');
    expect(project && findTask(project, 200)?.name).toBe('Engineering');
    expect(project && findTask(project, 100)).toBeUndefined();
    expect(findProject(catalog, 99)).toBeUndefined();
  });
});

describe('formatCatalog', () => {
  it('should print an indented listing with ids', async () => {
    const harvest = new FakeHarvest([
      { id: 2, name: 'Globex', projects: [{ id: 20, name: 'Data Pipeline', tasks: [{ id: 200, name: 'Engineering' }] }] },
    ]);

    expect(formatCatalog(await loadCatalog(harvest))).toEqual([
      'Globex',
      '\tData Pipeline (project 20)',
      '\t\tEngineering (task 200)',
    ]);
  });
});
