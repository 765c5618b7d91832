// ─── Command Runner ─────────────────────────────────────────────

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Null when the process could not be started or was killed. */
  exitCode: number | null;
}

/** Runs one command of a fixed binary. Implementations never throw for a non-zero exit. */
export interface CommandRunner {
  run(cwd: string, args: readonly string[]): Promise<CommandResult>;
}

export type GitResult = CommandResult;
export type GitRunner = CommandRunner;

// ─── Initializer ────────────────────────────────────────────────

export interface CommitAuthor {
  name: string;
  email: string;
}

/**
 * - `initialized`: a new repository with its first commit
 * - `committed`: an existing repository without commits got its first commit
 * - `unchanged`: the repository already had commits
 */
export type RepositoryStatus = 'initialized' | 'committed' | 'unchanged';

export interface RepositoryInitOutcome {
  status: RepositoryStatus;
  dryRun: boolean;
  /** Mutating git commands run (or, in a dry run, that would run). */
  commands: string[][];
}

export interface InitializeOptions {
  message: string;
  dryRun?: boolean;
}
