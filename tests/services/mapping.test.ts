import { describe, it, expect } from 'vitest';
import { MappingService } from '../../src/services/mapping.js';
import { AssociationStore } from '../../src/services/association.js';
import { loadCatalog } from '../../src/services/harvestCatalog.js';
import type { Choice, Chooser } from '../../src/types/mapping.js';
import type { TimingProject } from '../../src/types/timing.js';
import { FakeHarvest, FakeTiming } from '../helpers/fakes.js';

const website: TimingProject = { id: '/projects/2', title: 'Website', children: [] };

/** Picks choices by display name and records each prompt. */
function scripted(answers: string[], prompts: Array<{ message: string; names: string[] }>): Chooser {
  return async <T>(message: string, choices: Choice<T>[]): Promise<T> => {
    prompts.push({ message, names: choices.map((c) => c.name) });
    const wanted = answers.shift();
    const choice = choices.find((c) => c.name === wanted);
    if (!choice) {
      throw new Error(`No choice named ${wanted}`);
    }
    return choice.value;
  };
}

describe('MappingService', () => {
  it('should walk client, project and task and store the pair', async () => {
    const timing = new FakeTiming();
    const prompts: Array<{ message: string; names: string[] }> = [];
    const mapping = new MappingService(
      await loadCatalog(new FakeHarvest()),
      new AssociationStore(timing),
      scripted(['Acme Corp', 'Support (project 11)', 'Maintenance (task 102)'], prompts)
    );

    const task = await mapping.mapProject(website);

    expect(task.id).toBe(102);
    expect(task.project.id).toBe(11);
    expect(prompts).toEqual([
      { message: 'Select Harvest client for Timing project "Website":', names: ['Acme Corp', 'Globex'] },
      { message: 'Select Acme Corp project:', names: ['Website Redesign (project 10)', 'Support (project 11)'] },
      { message: 'Select task in "Support":', names: ['Development (task 101)', 'Maintenance (task 102)'] },
    ]);
    expect(timing.patches).toEqual([
      { projectId: '/projects/2', fields: { harvest_project_id: '11' } },
      { projectId: '/projects/2', fields: { harvest_task_id: '102' } },
    ]);
  });

  it('should hide clients and projects without tasks', async () => {
    const harvest = new FakeHarvest([
      { id: 1, name: 'Empty Co', projects: [{ id: 10, name: 'Nothing here', tasks: [] }] },
      {
        id: 2,
        name: 'Globex',
        projects: [
          { id: 20, name: 'Data Pipeline', tasks: [{ id: 200, name: 'Engineering' }] },
          { id: 21, name: 'Archived', tasks: [] },
        ],
      },
    ]);
    const prompts: Array<{ message: string; names: string[] }> = [];
    const mapping = new MappingService(
      await loadCatalog(harvest),
      new AssociationStore(new FakeTiming()),
      scripted(['Globex', 'Data Pipeline (project 20)', 'Engineering (task 200)'], prompts)
    );

    await mapping.selectTask(website);

    expect(prompts.map((p) => p.names)).toEqual([
      ['Globex'],
      ['Data Pipeline (project 20)'],
      ['Engineering (task 200)'],
    ]);
  });

  it('should refuse when there is nothing to pick', async () => {
    const mapping = new MappingService(
      await loadCatalog(new FakeHarvest([])),
      new AssociationStore(new FakeTiming()),
      scripted([], [])
    );

    await expect(mapping.selectTask(website)).rejects.toThrow(
      'No active Harvest projects with tasks are available. Check the account id.'
    );
  });
});
