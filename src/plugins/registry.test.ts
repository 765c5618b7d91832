import { readFile } from 'node:fs/promises';

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PluginRegistryError } from '@/core/errors.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

import { createPluginRegistry, loadPluginRegistry, parsePluginRegistry } from './registry.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const mockedReadFile = vi.mocked(readFile);

const registryJson = JSON.stringify({
  version: 2,
  plugins: {
    'zeta@official': [{ scope: 'user', installPath: '/plugins/zeta', version: '1.2.0' }],
    'alpha@community': [{ scope: 'project', installPath: '/plugins/alpha' }],
    'empty@official': [],
  },
});

describe('createPluginRegistry', () => {
  it('orders entries by id', () => {
    const registry = createPluginRegistry([
      { id: 'b@m', name: 'b', marketplace: 'm', scope: 'user', installPath: '' },
      { id: 'B@m', name: 'B', marketplace: 'm', scope: 'user', installPath: '' },
      { id: 'a@m', name: 'a', marketplace: 'm', scope: 'user', installPath: '' },
    ]);

    expect(registry.entries.map((e) => e.id)).toEqual(['B@m', 'a@m', 'b@m']);
    expect(registry.get('a@m')?.name).toBe('a');
    expect(Object.isFrozen(registry.entries)).toBe(true);
  });
});

describe('parsePluginRegistry', () => {
  it('reads the first install record of each plugin', () => {
    const result = parsePluginRegistry(registryJson, '/reg.json');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.entries).toEqual([
      {
        id: 'alpha@community',
        name: 'alpha',
        marketplace: 'community',
        scope: 'project',
        installPath: '/plugins/alpha',
        version: undefined,
      },
      {
        id: 'zeta@official',
        name: 'zeta',
        marketplace: 'official',
        scope: 'user',
        installPath: '/plugins/zeta',
        version: '1.2.0',
      },
    ]);
  });

  it('rejects malformed JSON', () => {
    const result = parsePluginRegistry('{ nope', '/reg.json');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PluginRegistryError);
    expect(result.error.message).toBe('Plugin registry at /reg.json is unreadable: not valid JSON');
  });

  it('rejects an unexpected structure', () => {
    const result = parsePluginRegistry('{"plugins": {"a@m": "yes"}}', '/reg.json');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'Plugin registry at /reg.json is unreadable: unexpected structure at plugins.a@m',
    );
  });
});

describe('loadPluginRegistry', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('loads the registry file', async () => {
    mockedReadFile.mockResolvedValue(registryJson);

    const result = await loadPluginRegistry({ registryPath: '/reg.json', logger: createMockLogger() });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.registry.entries).toHaveLength(2);
    expect(result.value.warnings).toEqual([]);
    expect(mockedReadFile).toHaveBeenCalledWith('/reg.json', 'utf-8');
  });

  it('returns an empty registry and a warning when the file is missing', async () => {
    mockedReadFile.mockRejectedValue(Object.assign(new Error('ENOENT'), { code: 'ENOENT' }));
    const logger = createMockLogger();

    const result = await loadPluginRegistry({ registryPath: '/missing.json', logger });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.registry.entries).toEqual([]);
    expect(result.value.warnings).toEqual([
      {
        code: 'PLUGIN_REGISTRY_MISSING',
        message: 'Plugin registry not found at /missing.json; no plugins can be resolved',
        registryPath: '/missing.json',
      },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('fails on other read errors', async () => {
    mockedReadFile.mockRejectedValue(Object.assign(new Error('EACCES'), { code: 'EACCES' }));

    const result = await loadPluginRegistry({ registryPath: '/locked.json', logger: createMockLogger() });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PLUGIN_REGISTRY_ERROR');
  });
});
