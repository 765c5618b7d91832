import type { ProjectSpec, SpecOverrides } from '@/config/types.js';
import type { ProvisionedBundle } from '@/features/types.js';
import type { GenerationReport } from '@/files/types.js';
import type { PluginActivationPlan } from '@/plugins/types.js';
import type { RepositoryInitOutcome } from '@/repository/types.js';

// ─── Request ────────────────────────────────────────────────────

export interface GenerateRequest {
  /** Raw specification document as parsed from YAML/JSON. */
  document: unknown;
  preset?: string;
  overrides?: SpecOverrides;
  /** Project root; created when absent. */
  outputDir: string;
  /** Run every step and fill the report without writing anything. */
  dryRun?: boolean;
  /** Also write the document itself as `kiln.yaml` at the project root. */
  writeDocument?: boolean;
  /** Initialize git at the project root. Defaults to true. */
  initRepository?: boolean;
  /** Message of the initial commit. */
  commitMessage?: string;
  /** Receives every file the run writes (or would write), keyed by project path. */
  onWrite?: (relativePath: string, content: Buffer) => void;
}

// ─── Result ─────────────────────────────────────────────────────

export interface GenerationResult {
  spec: ProjectSpec;
  report: GenerationReport;
  plan: PluginActivationPlan;
  features: ProvisionedBundle[];
  /** Undefined when repository initialization was skipped. */
  repository: RepositoryInitOutcome | undefined;
}

// ─── Shared Assets ──────────────────────────────────────────────

/** Shared files under `<assetsRoot>/shared/`, rendered for every template. */
export const SHARED_ASSETS_DIR = 'shared';
export const README_TEMPLATE = 'README.md.tmpl';
export const GITIGNORE_TEMPLATE = 'gitignore.tmpl';

export const DEFAULT_COMMIT_MESSAGE = 'Initial commit';
