/**
 * Project Diff — compares generated content with what is on disk.
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { createTwoFilesPatch, structuredPatch } from 'diff';

import { listFilesRecursive, pathExists } from '@/core/fs.js';

import type { DiffProjectParams, FileChange, FileDiff, ProjectDiff } from './types.js';
import { DEFAULT_DIFF_CONTEXT, ORPHAN_SCAN_DIR, RUNTIME_PATHS } from './types.js';

// ─── Helpers ────────────────────────────────────────────────────

async function readOptional(path: string): Promise<Buffer | undefined> {
  try {
    return await readFile(path);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'EISDIR') return undefined;
    throw error;
  }
}

function isBinary(content: Buffer): boolean {
  return content.includes(0);
}

function fileDiff(
  path: string,
  change: FileChange,
  before: Buffer | undefined,
  after: Buffer | undefined,
  context: number,
): FileDiff {
  if ((before && isBinary(before)) || (after && isBinary(after))) {
    return { path, change, patch: undefined, linesAdded: 0, linesRemoved: 0 };
  }

  const oldText = before?.toString('utf-8') ?? '';
  const newText = after?.toString('utf-8') ?? '';
  const oldName = before ? `a/${path}` : '/dev/null';
  const newName = after ? `b/${path}` : '/dev/null';

  let linesAdded = 0;
  let linesRemoved = 0;
  for (const hunk of structuredPatch(oldName, newName, oldText, newText, undefined, undefined, { context }).hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith('+')) linesAdded++;
      if (line.startsWith('-')) linesRemoved++;
    }
  }

  return {
    path,
    change,
    patch: createTwoFilesPatch(oldName, newName, oldText, newText, undefined, undefined, { context }),
    linesAdded,
    linesRemoved,
  };
}

/** Files under `.devcontainer/` on disk, as project paths. */
async function scannedFiles(root: string): Promise<string[]> {
  const dir = join(root, ORPHAN_SCAN_DIR);
  if (!(await pathExists(dir))) return [];
  return (await listFilesRecursive(dir)).map((file) => `${ORPHAN_SCAN_DIR}/${file}`);
}

// ─── Diff ───────────────────────────────────────────────────────

/**
 * Classify every generated file against the project on disk and list the
 * orphans under `.devcontainer/`. Nothing is written.
 */
export async function diffProject(params: DiffProjectParams): Promise<ProjectDiff> {
  const { root, generated } = params;
  const context = params.context ?? DEFAULT_DIFF_CONTEXT;
  const result: ProjectDiff = { create: [], modify: [], unchanged: [], orphan: [], files: [] };

  for (const path of [...generated.keys()].sort()) {
    const after = generated.get(path);
    if (after === undefined) continue;
    const before = await readOptional(join(root, path));

    if (before === undefined) {
      result.create.push(path);
      result.files.push(fileDiff(path, 'create', undefined, after, context));
    } else if (before.equals(after)) {
      result.unchanged.push(path);
    } else {
      result.modify.push(path);
      result.files.push(fileDiff(path, 'modify', before, after, context));
    }
  }

  for (const path of await scannedFiles(root)) {
    if (generated.has(path) || RUNTIME_PATHS.includes(path)) continue;
    result.orphan.push(path);
    result.files.push(fileDiff(path, 'orphan', await readOptional(join(root, path)), undefined, context));
  }

  result.files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return result;
}
