import { basename, resolve } from 'node:path';

import { describe, expect, it } from 'vitest';

import { BUNDLED_ASSETS_ROOT, loadKilnSettings } from './settings.js';

describe('loadKilnSettings', () => {
  it('derives defaults from HOME', () => {
    const result = loadKilnSettings({ HOME: '/home/dev' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      assetsRoot: resolve(BUNDLED_ASSETS_ROOT),
      registryPath: '/home/dev/.claude/plugins/installed_plugins.json',
      providersRoot: '/home/dev/.claude/providers',
    });
  });

  it('reads explicit locations and committer identity', () => {
    const result = loadKilnSettings({
      HOME: '/home/dev',
      KILN_ASSETS_ROOT: '/opt/kiln/assets',
      KILN_PLUGIN_REGISTRY: '/tmp/registry.json',
      KILN_PROVIDERS_ROOT: '/run/providers',
      KILN_GIT_AUTHOR_NAME: 'Kiln Bot',
      KILN_GIT_AUTHOR_EMAIL: 'bot@example.com',
      KILN_LOG_LEVEL: 'debug',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      assetsRoot: '/opt/kiln/assets',
      registryPath: '/tmp/registry.json',
      providersRoot: '/run/providers',
      gitAuthor: { name: 'Kiln Bot', email: 'bot@example.com' },
      logLevel: 'debug',
    });
  });

  it('points the bundled assets at the package assets directory', () => {
    expect(basename(BUNDLED_ASSETS_ROOT)).toBe('assets');
  });

  it('rejects an unknown log level', () => {
    const result = loadKilnSettings({ HOME: '/home/dev', KILN_LOG_LEVEL: 'loud' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Invalid KILN_LOG_LEVEL "loud"');
  });

  it('rejects a committer name without an email', () => {
    const result = loadKilnSettings({ HOME: '/home/dev', KILN_GIT_AUTHOR_NAME: 'Kiln Bot' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'KILN_GIT_AUTHOR_NAME and KILN_GIT_AUTHOR_EMAIL must be set together',
    );
    expect(result.error.context).toEqual({ variableName: 'KILN_GIT_AUTHOR_EMAIL' });
  });
});
