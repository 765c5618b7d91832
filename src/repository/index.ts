export type {
  CommandResult,
  CommandRunner,
  CommitAuthor,
  GitResult,
  GitRunner,
  InitializeOptions,
  RepositoryInitOutcome,
  RepositoryStatus,
} from './types.js';
export { createCommandRunner, createGitRunner } from './git-runner.js';
export type { CommandRunnerOptions, GitRunnerOptions } from './git-runner.js';
export { createRepositoryInitializer } from './initializer.js';
export type { RepositoryInitializer, RepositoryInitializerOptions } from './initializer.js';
