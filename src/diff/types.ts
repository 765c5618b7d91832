// ─── Changes ────────────────────────────────────────────────────

/**
 * - `create`: generation would add the file
 * - `modify`: the file exists with different content
 * - `unchanged`: the file exists with the generated content
 * - `orphan`: the file sits under `.devcontainer/` but generation does not produce it
 */
export type FileChange = 'create' | 'modify' | 'unchanged' | 'orphan';

export interface FileDiff {
  /** `/`-separated path relative to the project root. */
  path: string;
  change: FileChange;
  /** Unified patch; undefined for unchanged and binary files. */
  patch: string | undefined;
  linesAdded: number;
  linesRemoved: number;
}

export interface ProjectDiff {
  create: string[];
  modify: string[];
  unchanged: string[];
  orphan: string[];
  /** Every file except the unchanged ones, sorted by path. */
  files: FileDiff[];
}

export interface DiffProjectParams {
  /** Project root on disk. */
  root: string;
  /** Generated content keyed by project path. */
  generated: ReadonlyMap<string, Buffer>;
  /** Context lines around each hunk. Defaults to 3. */
  context?: number;
}

// ─── Constants ──────────────────────────────────────────────────

/** Directory scanned for files generation no longer produces. */
export const ORPHAN_SCAN_DIR = '.devcontainer';

/** Files written inside the container at start, never by generation. */
export const RUNTIME_PATHS: readonly string[] = ['.devcontainer/.kiln/env'];

export const DEFAULT_DIFF_CONTEXT = 3;
