/**
 * Small filesystem helpers shared by the catalog, provisioner and generator.
 */
import { access, readdir } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';

/** Whether a path exists (file, directory or anything else). */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Convert a platform path to `/`-separated form for reports and tokens. */
export function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/**
 * List every regular file below `root`, as sorted `/`-separated paths
 * relative to `root`. Symlinks are not followed.
 */
export async function listFilesRecursive(root: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile()) {
        files.push(toPosix(relative(root, full)));
      }
    }
  }

  await walk(root);
  return files.sort();
}
