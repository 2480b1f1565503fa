import type { TimingApi } from '../types/timing.js';
import { HARVEST_PROJECT_ID_FIELD, HARVEST_TASK_ID_FIELD } from './timingCatalog.js';

/**
 * Writes Harvest ids into a Timing project's custom fields. Each call is a
 * single overwrite; whether the pair makes sense is checked at sync time.
 */
export class AssociationStore {
  constructor(private timing: TimingApi) {}

  async setHarvestProjectId(timingProjectId: string, harvestProjectId: string | number): Promise<void> {
    await this.timing.updateProjectCustomFields(timingProjectId, {
      [HARVEST_PROJECT_ID_FIELD]: String(harvestProjectId),
    });
  }

  async setHarvestTaskId(timingProjectId: string, harvestTaskId: string | number): Promise<void> {
    await this.timing.updateProjectCustomFields(timingProjectId, {
      [HARVEST_TASK_ID_FIELD]: String(harvestTaskId),
    });
  }

  async setAssociation(timingProjectId: string, harvestProjectId: number, harvestTaskId: number): Promise<void> {
    await this.setHarvestProjectId(timingProjectId, harvestProjectId);
    await this.setHarvestTaskId(timingProjectId, harvestTaskId);
  }

  async clearAssociation(timingProjectId: string): Promise<void> {
    await this.timing.updateProjectCustomFields(timingProjectId, {
      [HARVEST_PROJECT_ID_FIELD]: null,
      [HARVEST_TASK_ID_FIELD]: null,
    });
  }
}
