import inquirer from 'inquirer';
import type { CatalogTask, HarvestCatalog } from '../types/harvest.js';
import type { TimingProject } from '../types/timing.js';
import type { Choice, Chooser } from '../types/mapping.js';
import type { AssociationStore } from './association.js';

export const promptChoice: Chooser = async <T>(message: string, choices: Choice<T>[]): Promise<T> => {
  const answers = await inquirer.prompt<{ selected: T }>([
    {
      type: 'list',
      name: 'selected',
      message,
      choices,
    },
  ]);
  return answers.selected;
};

/**
 * Walks the user through client → project → task and stores the chosen pair
 * on a Timing project.
 */
export class MappingService {
  constructor(
    private catalog: HarvestCatalog,
    private associations: AssociationStore,
    private choose: Chooser = promptChoice
  ) {}

  async selectTask(timingProject: TimingProject): Promise<CatalogTask> {
    const clients = this.catalog.clients.filter((client) =>
      client.projects.some((project) => project.tasks.length > 0)
    );
    if (clients.length === 0) {
      throw new Error('No active Harvest projects with tasks are available. Check the account id.');
    }

    const client = await this.choose(
      `Select Harvest client for Timing project "${timingProject.title}":`,
      clients.map((c) => ({ name: c.name, value: c }))
    );

    const project = await this.choose(
      `Select ${client.name} project:`,
      client.projects
        .filter((p) => p.tasks.length > 0)
        .map((p) => ({ name: `${p.name} (project ${p.id})`, value: p }))
    );

    return this.choose(
      `Select task in "${project.name}":`,
      project.tasks.map((t) => ({ name: `${t.name} (task ${t.id})`, value: t }))
    );
  }

  async mapProject(timingProject: TimingProject): Promise<CatalogTask> {
    const task = await this.selectTask(timingProject);
    await this.associations.setAssociation(timingProject.id, task.project.id, task.id);
    return task;
  }
}
