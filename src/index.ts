#!/usr/bin/env node
import { Command } from 'commander';
import { config } from 'dotenv';
import { HarvestService } from './services/harvest.js';
import { TimingService } from './services/timing.js';
import { AssociationStore } from './services/association.js';
import { MappingService } from './services/mapping.js';
import { SyncService } from './services/sync.js';
import { formatCatalog, loadCatalog } from './services/harvestCatalog.js';
import {
  findProjectById,
  formatProjectLine,
  listProjectsHierarchically,
  loadProjectTree,
} from './services/timingCatalog.js';
import { formatReport } from './utils/report.js';
import { describeError } from './errors.js';
import {
  loadHarvestConfig,
  loadSyncOptions,
  loadTimingConfig,
  parseWindow,
  type HarvestOverrides,
  type TimingOverrides,
} from './config.js';

config();

type SendOptions = TimingOverrides & {
  harvestPersonalAccessToken?: string;
  harvestAccountId?: string;
  from?: string;
  to?: string;
  roundTo?: string;
  lookbackHours?: string;
  timeZone?: string;
  dryRun?: boolean;
};

function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      console.error('Error:', describeError(error));
      process.exit(1);
    }
  };
}

function timingFrom(command: Command): TimingService {
  return new TimingService(loadTimingConfig(command.optsWithGlobals<TimingOverrides>()));
}

const program = new Command();

program
  .name('timesheets')
  .description('Send Timing time entries to Harvest')
  .version('1.0.0');

const harvest = program
  .command('harvest')
  .description('Harvest commands')
  .option(
    '--personal-access-token <token>',
    'Personal access token for accessing Harvest. Visit https://id.getharvest.com/developers to get a token.'
  )
  .option('--account-id <id>', 'Harvest account ID');

harvest
  .command('list-tasks')
  .description('List clients, projects, and tasks')
  .action(run(async (_options: object, command: Command) => {
    const harvestApi = new HarvestService(loadHarvestConfig(command.optsWithGlobals<HarvestOverrides>()));
    const catalog = await loadCatalog(harvestApi);
    for (const line of formatCatalog(catalog)) {
      console.log(line);
    }
  }));

const timing = program
  .command('timing')
  .description('Timing commands')
  .option(
    '--personal-access-token <token>',
    'Personal access token for accessing Timing. Visit https://web.timingapp.com/integrations/tokens to get a token.'
  );

timing
  .command('list-projects')
  .description('List projects hierarchically')
  .action(run(async (_options: object, command: Command) => {
    const tree = await loadProjectTree(timingFrom(command));
    for (const [depth, project] of listProjectsHierarchically(tree)) {
      console.log(formatProjectLine(depth, project));
    }
  }));

timing
  .command('set-harvest-project-id')
  .description('Set Harvest project ID in Timing project')
  .argument('<timingProjectId>', 'Timing project, e.g. /projects/12 or 12')
  .argument('<harvestProjectId>', 'Harvest project ID (see "harvest list-tasks")')
  .action(run(async (timingProjectId: string, harvestProjectId: string, _options: object, command: Command) => {
    await new AssociationStore(timingFrom(command)).setHarvestProjectId(timingProjectId, harvestProjectId);
    console.log(`✓ Harvest project ${harvestProjectId} set on Timing project ${timingProjectId}`);
  }));

timing
  .command('set-harvest-task-id')
  .description('Set Harvest task ID in Timing project')
  .argument('<timingProjectId>', 'Timing project, e.g. /projects/12 or 12')
  .argument('<harvestTaskId>', 'Harvest task ID (see "harvest list-tasks")')
  .action(run(async (timingProjectId: string, harvestTaskId: string, _options: object, command: Command) => {
    await new AssociationStore(timingFrom(command)).setHarvestTaskId(timingProjectId, harvestTaskId);
    console.log(`✓ Harvest task ${harvestTaskId} set on Timing project ${timingProjectId}`);
  }));

timing
  .command('clear-harvest-association')
  .description('Remove the Harvest project and task IDs from a Timing project')
  .argument('<timingProjectId>', 'Timing project, e.g. /projects/12 or 12')
  .action(run(async (timingProjectId: string, _options: object, command: Command) => {
    await new AssociationStore(timingFrom(command)).clearAssociation(timingProjectId);
    console.log(`✓ Harvest association cleared on Timing project ${timingProjectId}`);
  }));

timing
  .command('map-project')
  .description('Interactively pick the Harvest project and task for a Timing project')
  .argument('<timingProjectId>', 'Timing project, e.g. /projects/12 or 12')
  .option('--harvest-personal-access-token <token>', 'Personal access token for accessing Harvest')
  .option('--harvest-account-id <id>', 'Harvest account ID')
  .action(run(async (timingProjectId: string, _options: object, command: Command) => {
    const options = command.optsWithGlobals<SendOptions>();
    const timingApi = timingFrom(command);
    const harvestApi = new HarvestService(loadHarvestConfig({
      personalAccessToken: options.harvestPersonalAccessToken,
      accountId: options.harvestAccountId,
    }));

    const project = findProjectById(await loadProjectTree(timingApi), timingProjectId);
    if (!project) {
      throw new Error(`Timing project ${timingProjectId} not found`);
    }

    console.log('Fetching Harvest clients, projects and tasks...');
    const mapping = new MappingService(await loadCatalog(harvestApi), new AssociationStore(timingApi));
    const task = await mapping.mapProject(project);
    console.log(
      `✓ Mapped "${project.title}" to ${task.project.client.name} / ${task.project.name} / ${task.name}` +
      ` (project ${task.project.id}, task ${task.id})`
    );
  }));

timing
  .command('send-to-harvest')
  .description('Send Timing time entries to Harvest, creating or updating one Harvest entry per Timing entry')
  .option('--from <date>', 'First day to send (YYYY-MM-DD, default: 7 days ago)')
  .option('--to <date>', 'Last day to send, inclusive (YYYY-MM-DD, default: today)')
  .option('--round-to <minutes>', 'Round durations to the nearest number of minutes (default: no rounding)')
  .option('--time-zone <zone>', 'IANA time zone for the --from/--to days and Harvest dates (default: local time)')
  .option('--lookback-hours <hours>', 'How far before --from to look for entries still running into it (default: 24)')
  .option('--dry-run', 'Show what would change without writing to Harvest', false)
  .option('--harvest-personal-access-token <token>', 'Personal access token for accessing Harvest')
  .option('--harvest-account-id <id>', 'Harvest account ID')
  .action(run(async (_options: object, command: Command) => {
    const options = command.optsWithGlobals<SendOptions>();
    const syncOptions = loadSyncOptions({
      timeZone: options.timeZone,
      roundTo: options.roundTo,
      lookbackHours: options.lookbackHours,
      dryRun: options.dryRun,
    });
    const { start, end } = parseWindow(options.from, options.to, new Date(), syncOptions.timeZone);

    const sync = new SyncService(
      timingFrom(command),
      new HarvestService(loadHarvestConfig({
        personalAccessToken: options.harvestPersonalAccessToken,
        accountId: options.harvestAccountId,
      })),
      syncOptions
    );

    const report = await sync.sendToHarvest(start, end);
    console.log('');
    for (const line of formatReport(report)) {
      console.log(line);
    }
  }));

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', describeError(error));
  process.exit(1);
});
