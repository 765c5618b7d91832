/**
 * Project Writer — content-aware writes below a generated project's root.
 */
import { chmod, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, sep } from 'node:path';

import { KilnError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

import type { FileStatus, ProjectWriter, ReportBuilder } from './types.js';

// ─── Config ─────────────────────────────────────────────────────

export interface ProjectWriterConfig {
  /** Absolute project root; every path is relative to it. */
  root: string;
  dryRun: boolean;
  report: ReportBuilder;
  logger: Logger;
  /** Called with every file this run writes, or would write in a dry run. */
  onWrite?: (relativePath: string, content: Buffer) => void;
}

// ─── Helpers ────────────────────────────────────────────────────

function statusOf(previous: Buffer | undefined, next: Buffer): FileStatus {
  if (previous === undefined) return 'created';
  return previous.equals(next) ? 'skipped' : 'modified';
}

// ─── Writer Factory ─────────────────────────────────────────────

/**
 * Create a project writer.
 */
export function createProjectWriter(config: ProjectWriterConfig): ProjectWriter {
  const { root, dryRun, report } = config;
  const logger = config.logger.child({ component: 'project-writer' });

  function resolvePath(relativePath: string): string {
    const fullPath = join(root, relativePath);
    const fromRoot = relative(root, fullPath);
    if (fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      throw new KilnError({
        message: `Path escapes the project directory: ${relativePath}`,
        code: 'PATH_OUTSIDE_PROJECT',
        context: { root, relativePath },
      });
    }
    return fullPath;
  }

  async function read(relativePath: string): Promise<Buffer | undefined> {
    try {
      return await readFile(resolvePath(relativePath));
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT' || code === 'EISDIR') return undefined;
      throw error;
    }
  }

  return {
    root,
    dryRun,

    read,

    async write(relativePath, content, options) {
      const next = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
      const current = await read(relativePath);
      const status = statusOf(options?.previous ?? current, next);
      report.record(relativePath, status);
      config.onWrite?.(relativePath, next);

      if (dryRun) {
        logger.debug('Dry run: file not written', { component: 'project-writer', path: relativePath, status });
        return status;
      }

      const fullPath = resolvePath(relativePath);
      if (current === undefined || !current.equals(next)) {
        await mkdir(dirname(fullPath), { recursive: true });
        await writeFile(fullPath, next);
      }
      if (options?.mode !== undefined) {
        await chmod(fullPath, options.mode);
      }
      logger.debug('File written', { component: 'project-writer', path: relativePath, status });
      return status;
    },

    async removeTree(relativePath) {
      if (dryRun) return;
      await rm(resolvePath(relativePath), { recursive: true, force: true });
    },
  };
}
