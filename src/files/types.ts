// ─── File Status ────────────────────────────────────────────────

/** Outcome of writing one file, decided by comparing content with what was there. */
export type FileStatus = 'created' | 'modified' | 'skipped';

// ─── Generation Report ──────────────────────────────────────────

/** Non-fatal condition surfaced to the caller. */
export interface ReportWarning {
  code: string;
  message: string;
  [key: string]: unknown;
}

/** What one generation run did, as relative `/`-separated paths. */
export interface GenerationReport {
  created: string[];
  modified: string[];
  skipped: string[];
  warnings: ReportWarning[];
}

export interface ReportBuilder {
  /** Record a file outcome. A path recorded again moves to its latest status. */
  record(path: string, status: FileStatus): void;
  warn(warning: ReportWarning): void;
  /** Copy of the report so far; lists are sorted. */
  snapshot(): GenerationReport;
}

// ─── Project Writer ─────────────────────────────────────────────

export interface WriteOptions {
  /** File mode applied after writing (e.g. 0o755 for scripts). */
  mode?: number;
  /**
   * Content the path held before the caller cleared it. Status is decided
   * against this instead of the current file.
   */
  previous?: Buffer;
}

/**
 * Writes files below a project root, recording each outcome in a report.
 * In dry-run mode nothing is written or removed but outcomes are still recorded.
 */
export interface ProjectWriter {
  readonly root: string;
  readonly dryRun: boolean;
  /** Current content of a file, or undefined when it does not exist. */
  read(relativePath: string): Promise<Buffer | undefined>;
  write(relativePath: string, content: string | Buffer, options?: WriteOptions): Promise<FileStatus>;
  /** Remove a directory tree. No-op when absent. */
  removeTree(relativePath: string): Promise<void>;
}
