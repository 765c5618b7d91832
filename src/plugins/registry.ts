/**
 * Plugin Registry — the read-only list of plugins already installed on the
 * host, loaded from `installed_plugins.json`.
 */
import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { PluginRegistryError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { parsePluginId } from '@/core/types.js';
import type { ReportWarning } from '@/files/types.js';
import type { Logger } from '@/observability/logger.js';

import type { PluginRegistry, PluginRegistryEntry } from './types.js';

// ─── Schema ─────────────────────────────────────────────────────

const installRecordSchema = z
  .object({
    scope: z.string().default('user'),
    installPath: z.string().default(''),
    version: z.string().optional(),
  })
  .passthrough();

const registryFileSchema = z
  .object({
    version: z.number().optional(),
    plugins: z.record(z.array(installRecordSchema)).default({}),
  })
  .passthrough();

// ─── Registry ───────────────────────────────────────────────────

function compareIds(a: PluginRegistryEntry, b: PluginRegistryEntry): number {
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Create a registry over the given entries. Entries are ordered by id
 * (code-unit order) so lookups iterate deterministically.
 */
export function createPluginRegistry(entries: readonly PluginRegistryEntry[]): PluginRegistry {
  const sorted = Object.freeze([...entries].sort(compareIds).map((entry) => Object.freeze({ ...entry })));
  const byId = new Map(sorted.map((entry) => [entry.id, entry]));

  return {
    entries: sorted,
    get: (id) => byId.get(id),
  };
}

/** Parse registry file content. */
export function parsePluginRegistry(
  text: string,
  registryPath: string,
): Result<PluginRegistry, PluginRegistryError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return err(new PluginRegistryError(registryPath, 'not valid JSON', error));
  }

  const parsed = registryFileSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    return err(new PluginRegistryError(registryPath, `unexpected structure at ${fields.join(', ')}`));
  }

  const entries: PluginRegistryEntry[] = [];
  for (const [id, installs] of Object.entries(parsed.data.plugins)) {
    const install = installs[0];
    if (!install) continue;
    const parts = parsePluginId(id);
    entries.push({
      id,
      name: parts?.name ?? id,
      marketplace: parts?.marketplace ?? '',
      scope: install.scope,
      installPath: install.installPath,
      version: install.version,
    });
  }
  return ok(createPluginRegistry(entries));
}

export interface RegistryLoadResult {
  registry: PluginRegistry;
  warnings: ReportWarning[];
}

/**
 * Load the registry from disk. A missing file yields an empty registry and
 * a warning; an unreadable or malformed file is an error.
 */
export async function loadPluginRegistry(params: {
  registryPath: string;
  logger: Logger;
}): Promise<Result<RegistryLoadResult, PluginRegistryError>> {
  const { registryPath, logger } = params;

  let text: string;
  try {
    text = await readFile(registryPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      const message = `Plugin registry not found at ${registryPath}; no plugins can be resolved`;
      logger.warn(message, { component: 'plugin-registry', registryPath });
      return ok({
        registry: createPluginRegistry([]),
        warnings: [{ code: 'PLUGIN_REGISTRY_MISSING', message, registryPath }],
      });
    }
    return err(new PluginRegistryError(registryPath, 'file could not be read', error));
  }

  const registry = parsePluginRegistry(text, registryPath);
  if (!registry.ok) return registry;

  logger.debug('Plugin registry loaded', {
    component: 'plugin-registry',
    registryPath,
    plugins: registry.value.entries.length,
  });
  return ok({ registry: registry.value, warnings: [] });
}
