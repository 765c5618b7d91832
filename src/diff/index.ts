export type { DiffProjectParams, FileChange, FileDiff, ProjectDiff } from './types.js';
export { DEFAULT_DIFF_CONTEXT, ORPHAN_SCAN_DIR, RUNTIME_PATHS } from './types.js';
export { diffProject } from './project-diff.js';
