/**
 * Command runners — spawn git (or docker, for `doctor`) and report the exit status.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { CommandResult, CommandRunner, GitRunner } from './types.js';

const execFileAsync = promisify(execFile);

export interface CommandRunnerOptions {
  env?: NodeJS.ProcessEnv;
}

export interface GitRunnerOptions extends CommandRunnerOptions {
  /** Git executable. Defaults to `git` on PATH. */
  binary?: string;
}

function outputOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return '';
}

export function createCommandRunner(binary: string, options?: CommandRunnerOptions): CommandRunner {
  const env = options?.env ?? process.env;

  return {
    async run(cwd, args) {
      try {
        const { stdout, stderr } = await execFileAsync(binary, [...args], { cwd, env });
        return { stdout, stderr, exitCode: 0 };
      } catch (error) {
        if (!(error instanceof Error)) throw error;
        const code = 'code' in error ? error.code : undefined;
        const stderr = 'stderr' in error ? outputOf(error.stderr) : '';
        return {
          stdout: 'stdout' in error ? outputOf(error.stdout) : '',
          // Spawn failures (e.g. ENOENT) carry a string code and no stderr.
          stderr: stderr || error.message,
          exitCode: typeof code === 'number' ? code : null,
        } satisfies CommandResult;
      }
    },
  };
}

export function createGitRunner(options?: GitRunnerOptions): GitRunner {
  return createCommandRunner(options?.binary ?? 'git', {
    env: { ...(options?.env ?? process.env), GIT_TERMINAL_PROMPT: '0' },
  });
}
