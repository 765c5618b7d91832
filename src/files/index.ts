export type {
  FileStatus,
  GenerationReport,
  ProjectWriter,
  ReportBuilder,
  ReportWarning,
  WriteOptions,
} from './types.js';
export { createReportBuilder } from './report.js';
export { createProjectWriter } from './project-writer.js';
export type { ProjectWriterConfig } from './project-writer.js';
