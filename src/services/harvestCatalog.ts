import type {
  CatalogClient,
  CatalogProject,
  CatalogTask,
  HarvestApi,
  HarvestCatalog,
  TaskListing,
} from '../types/harvest.js';
import { AuthError, CatalogFetchError, type CatalogStage } from '../errors.js';

async function stage<T>(name: CatalogStage, fetch: () => Promise<T>): Promise<T> {
  try {
    return await fetch();
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    throw new CatalogFetchError(name, error);
  }
}

/**
 * Fetches clients, then each client's projects, then each project's tasks.
 * Requests run one after another and the tree is only returned once complete.
 */
export async function loadCatalog(harvest: HarvestApi): Promise<HarvestCatalog> {
  const clients: CatalogClient[] = [];

  for (const clientRecord of await stage('clients', () => harvest.getClients())) {
    const client: CatalogClient = { id: clientRecord.id, name: clientRecord.name, projects: [] };

    for (const projectRecord of await stage('projects', () => harvest.getProjects(client.id))) {
      const project: CatalogProject = { id: projectRecord.id, name: projectRecord.name, client, tasks: [] };

      for (const assignment of await stage('tasks', () => harvest.getProjectTasks(project.id))) {
        project.tasks.push({ id: assignment.task.id, name: assignment.task.name, project });
      }
      client.projects.push(project);
    }
    clients.push(client);
  }

  return { clients };
}

export function listTasks(catalog: HarvestCatalog): TaskListing[] {
  const rows: TaskListing[] = [];
  for (const client of catalog.clients) {
    for (const project of client.projects) {
      for (const task of project.tasks) {
        rows.push({
          clientName: client.name,
          projectName: project.name,
          taskName: task.name,
          projectId: project.id,
          taskId: task.id,
        });
      }
    }
  }
  return rows;
}

export function findProject(catalog: HarvestCatalog, projectId: number): CatalogProject | undefined {
  for (const client of catalog.clients) {
    const project = client.projects.find((p) => p.id === projectId);
    if (project) {
      return project;
    }
  }
  return undefined;
}

export function findTask(project: CatalogProject, taskId: number): CatalogTask | undefined {
  return project.tasks.find((t) => t.id === taskId);
}

export function formatCatalog(catalog: HarvestCatalog): string[] {
  const lines: string[] = [];
  for (const client of catalog.clients) {
    lines.push(client.name);
    for (const project of client.projects) {
      lines.push(`\t${project.name} (project ${project.id})`);
      for (const task of project.tasks) {
        lines.push(`\t\t${task.name} (task ${task.id})`);
      }
    }
  }
  return lines;
}
