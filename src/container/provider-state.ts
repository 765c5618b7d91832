/**
 * Container provider state.
 *
 * The selected provider is recorded once when the project is generated, in
 * a marker inside the project's own `.devcontainer/` (never a shared home
 * directory), and read once when the container starts to turn the
 * provider's credential files into environment variables.
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { ConfigError } from '@/config/loader.js';
import type { FileStatus, ProjectWriter } from '@/files/types.js';
import type { Logger } from '@/observability/logger.js';

/** Marker location relative to the project root. */
export const PROVIDER_MARKER_PATH = '.devcontainer/.kiln/provider';

export const AUTH_TOKEN_FILE = 'auth';
export const BASE_URL_FILE = 'base_url';

export interface ProviderCredentials {
  /** Undefined when no marker was written. */
  provider: string | undefined;
  env: Record<string, string>;
}

const PROVIDER_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// ─── Write (at generation) ──────────────────────────────────────

export function writeProviderMarker(writer: ProjectWriter, provider: string): Promise<FileStatus> {
  return writer.write(PROVIDER_MARKER_PATH, `${provider}\n`);
}

// ─── Read (at container start) ──────────────────────────────────

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return (await readFile(path, 'utf-8')).trim();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Resolve credentials for the provider named by the marker.
 * `auth` is required once a provider is selected; `base_url` is optional.
 */
export async function loadProviderCredentials(params: {
  markerPath: string;
  providersRoot: string;
  logger: Logger;
}): Promise<Result<ProviderCredentials, ConfigError>> {
  const { markerPath, providersRoot, logger } = params;

  const provider = await readOptional(markerPath);
  if (!provider) {
    logger.debug('No provider marker', { component: 'provider-state', markerPath });
    return ok({ provider: undefined, env: {} });
  }

  if (!PROVIDER_NAME_PATTERN.test(provider)) {
    return err(new ConfigError(`Invalid provider name in marker: ${provider}`, { markerPath }));
  }

  const providerDir = join(providersRoot, provider);
  const authPath = join(providerDir, AUTH_TOKEN_FILE);
  const token = await readOptional(authPath);
  if (!token) {
    return err(
      new ConfigError(`Credentials for provider "${provider}" not found at ${authPath}`, {
        provider,
        authPath,
      }),
    );
  }

  const env: Record<string, string> = { ANTHROPIC_AUTH_TOKEN: token };
  const baseUrl = await readOptional(join(providerDir, BASE_URL_FILE));
  if (baseUrl) env['ANTHROPIC_BASE_URL'] = baseUrl;

  logger.info('Provider credentials loaded', {
    component: 'provider-state',
    provider,
    baseUrl: baseUrl !== undefined && baseUrl !== '',
  });
  return ok({ provider, env });
}

/** Render variables as POSIX shell `export` lines. */
export function formatEnvExports(env: Readonly<Record<string, string>>): string {
  return Object.entries(env)
    .map(([key, value]) => `export ${key}='${value.replaceAll("'", "'\\''")}'`)
    .join('\n');
}

/** Render variables as `KEY=value` lines for `docker run --env-file`. */
export function formatEnvFile(env: Readonly<Record<string, string>>): string {
  return Object.entries(env)
    .map(([key, value]) => `${key}=${value}\n`)
    .join('');
}
