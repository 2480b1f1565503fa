import { format } from 'date-fns';
import type { SyncReport } from '../types/sync.js';

export function formatReport(report: SyncReport): string[] {
  const window = `${format(report.start, 'yyyy-MM-dd HH:mm')} – ${format(report.end, 'yyyy-MM-dd HH:mm')}`;
  const lines = [
    `Sync report for ${window}${report.dryRun ? ' (dry run, nothing was written)' : ''}`,
    `  Created:   ${report.created}`,
    `  Updated:   ${report.updated}`,
    `  Unchanged: ${report.unchanged}`,
    `  Skipped:   ${report.skipped}`,
    `  Failed:    ${report.failed}`,
  ];

  for (const outcome of report.outcomes) {
    if (outcome.status === 'skipped') {
      lines.push(`  skipped ${outcome.entryId}: [${outcome.reason}] ${outcome.message}`);
    } else if (outcome.status === 'failed') {
      lines.push(`  failed ${outcome.entryId}: ${outcome.message}`);
    }
  }

  return lines;
}
