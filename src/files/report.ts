/**
 * Generation report — disjoint created/modified/skipped lists plus warnings.
 */
import type { FileStatus, GenerationReport, ReportBuilder, ReportWarning } from './types.js';

export function createReportBuilder(): ReportBuilder {
  const statuses = new Map<string, FileStatus>();
  const warnings: ReportWarning[] = [];

  return {
    record(path, status) {
      statuses.set(path, status);
    },

    warn(warning) {
      warnings.push(warning);
    },

    snapshot() {
      const report: GenerationReport = { created: [], modified: [], skipped: [], warnings: [...warnings] };
      for (const [path, status] of statuses) {
        report[status].push(path);
      }
      report.created.sort();
      report.modified.sort();
      report.skipped.sort();
      return report;
    },
  };
}
