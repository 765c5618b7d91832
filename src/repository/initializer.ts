/**
 * Repository Initializer — makes the generated project a git repository
 * with a single initial commit. Re-running against a repository that
 * already has commits does nothing.
 */
import { join } from 'node:path';

import { RepositoryOperationError } from '@/core/errors.js';
import { pathExists } from '@/core/fs.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';

import type {
  CommitAuthor,
  GitRunner,
  InitializeOptions,
  RepositoryInitOutcome,
  RepositoryStatus,
} from './types.js';

export interface RepositoryInitializer {
  initialize(
    dir: string,
    options: InitializeOptions,
  ): Promise<Result<RepositoryInitOutcome, RepositoryOperationError>>;
}

export interface RepositoryInitializerOptions {
  git: GitRunner;
  logger: Logger;
  /** Committer identity; git's own configuration is used when absent. */
  author?: CommitAuthor;
}

export function createRepositoryInitializer(
  options: RepositoryInitializerOptions,
): RepositoryInitializer {
  const { git, author } = options;
  const logger = options.logger.child({ component: 'repository-initializer' });

  async function run(
    dir: string,
    args: readonly string[],
  ): Promise<Result<string, RepositoryOperationError>> {
    const result = await git.run(dir, args);
    if (result.exitCode !== 0) {
      return err(new RepositoryOperationError(args, result.exitCode, result.stderr));
    }
    return ok(result.stdout);
  }

  /** Whether HEAD resolves, i.e. the repository has at least one commit. */
  async function hasCommits(dir: string): Promise<boolean> {
    const result = await git.run(dir, ['rev-parse', '--verify', '--quiet', 'HEAD']);
    return result.exitCode === 0;
  }

  function commitArgs(message: string): string[] {
    const identity = author
      ? ['-c', `user.name=${author.name}`, '-c', `user.email=${author.email}`]
      : [];
    return [...identity, 'commit', '-q', '-m', message];
  }

  return {
    async initialize(dir, initOptions) {
      const dryRun = initOptions.dryRun ?? false;
      const hasRepository = await pathExists(join(dir, '.git'));

      if (hasRepository && (await hasCommits(dir))) {
        logger.info('Repository already has commits', { component: 'repository-initializer', dir });
        return ok({ status: 'unchanged', dryRun, commands: [] });
      }

      const status: RepositoryStatus = hasRepository ? 'committed' : 'initialized';
      const commands = [
        ...(hasRepository ? [] : [['init', '-q']]),
        ['add', '-A'],
        commitArgs(initOptions.message),
      ];

      if (dryRun) {
        logger.info('Dry run: repository not touched', {
          component: 'repository-initializer',
          dir,
          status,
        });
        return ok({ status, dryRun, commands });
      }

      for (const args of commands) {
        const result = await run(dir, args);
        if (!result.ok) {
          logger.error('Git command failed', {
            component: 'repository-initializer',
            dir,
            args,
            error: result.error.message,
          });
          return result;
        }
      }

      logger.info('Repository initialized', { component: 'repository-initializer', dir, status });
      return ok({ status, dryRun, commands });
    },
  };
}
