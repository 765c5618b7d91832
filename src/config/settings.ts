/**
 * Tool-level settings: where assets, the plugin registry and provider
 * credentials live, and who authors the initial commit.
 */
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { LogLevel } from '@/observability/types.js';

import { ConfigError } from './loader.js';

export interface KilnSettings {
  /** Directory holding `templates/`, `presets.yaml`, `features/` and `shared/`. */
  assetsRoot: string;
  /** Installed-plugin registry file. */
  registryPath: string;
  /** Directory with one credentials subdirectory per provider. */
  providersRoot: string;
  gitAuthor?: { name: string; email: string };
  logLevel?: LogLevel;
}

/** Assets shipped beside the package (`<package>/assets`). */
export const BUNDLED_ASSETS_ROOT = fileURLToPath(new URL('../../assets', import.meta.url));

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

/**
 * Read settings from the environment.
 * A committer identity needs both name and email, or neither.
 */
export function loadKilnSettings(env: NodeJS.ProcessEnv = process.env): Result<KilnSettings, ConfigError> {
  const home = env['HOME'] ?? homedir();
  const settings: KilnSettings = {
    assetsRoot: resolve(env['KILN_ASSETS_ROOT'] ?? BUNDLED_ASSETS_ROOT),
    registryPath: resolve(
      env['KILN_PLUGIN_REGISTRY'] ?? join(home, '.claude', 'plugins', 'installed_plugins.json'),
    ),
    providersRoot: resolve(env['KILN_PROVIDERS_ROOT'] ?? join(home, '.claude', 'providers')),
  };

  const rawLevel = env['KILN_LOG_LEVEL'];
  if (rawLevel !== undefined) {
    const level = logLevelSchema.safeParse(rawLevel);
    if (!level.success) {
      return err(
        new ConfigError(`Invalid KILN_LOG_LEVEL "${rawLevel}"`, {
          variableName: 'KILN_LOG_LEVEL',
          allowed: logLevelSchema.options,
        }),
      );
    }
    settings.logLevel = level.data;
  }

  const name = env['KILN_GIT_AUTHOR_NAME'];
  const email = env['KILN_GIT_AUTHOR_EMAIL'];
  if ((name === undefined) !== (email === undefined)) {
    return err(
      new ConfigError('KILN_GIT_AUTHOR_NAME and KILN_GIT_AUTHOR_EMAIL must be set together', {
        variableName: name === undefined ? 'KILN_GIT_AUTHOR_NAME' : 'KILN_GIT_AUTHOR_EMAIL',
      }),
    );
  }
  if (name !== undefined && email !== undefined) {
    settings.gitAuthor = { name, email };
  }

  return ok(settings);
}
