import { chmod } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createConfigResolver } from '@/config/resolver.js';
import { pathExists } from '@/core/fs.js';
import { createFeatureProvisioner } from '@/features/provisioner.js';
import type { Logger } from '@/observability/logger.js';
import { createRepositoryInitializer } from '@/repository/initializer.js';
import { createTestCatalog } from '@/testing/fixtures/catalog.js';
import { createMinimalDocument } from '@/testing/fixtures/documents.js';
import { createTempDir, readFixture, removeTempDir, writeFixture } from '@/testing/fixtures/fs.js';
import type { FakeGitRunner } from '@/testing/fixtures/git.js';
import { createFakeGitRunner } from '@/testing/fixtures/git.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

import { createGenerator } from './generator.js';
import type { Generator } from './generator.js';

// ─── Test Fixtures ──────────────────────────────────────────────

const featureMetadata = (id: string): string =>
  JSON.stringify({ id, version: '1.0.0', name: `${id} feature` });

async function writeAssets(assetsRoot: string): Promise<void> {
  await writeFixture(
    assetsRoot,
    'templates/python/files/.devcontainer/devcontainer.json',
    '{"name": "{{PROJECT_NAME}}", "python": "{{PYTHON_VERSION}}"}\n',
  );
  await writeFixture(assetsRoot, 'shared/README.md.tmpl', '# {{PROJECT_NAME}}\n');
  await writeFixture(assetsRoot, 'shared/gitignore.tmpl', '.venv/\n');
  for (const bundle of ['claude-code', 'plugin-manager', 'proxy']) {
    await writeFixture(assetsRoot, `features/${bundle}/devcontainer-feature.json`, featureMetadata(bundle));
    await writeFixture(assetsRoot, `features/${bundle}/install.sh`, '#!/bin/sh\n');
    await chmod(join(assetsRoot, `features/${bundle}/install.sh`), 0o755);
  }
}

const registryJson = JSON.stringify({
  version: 2,
  plugins: {
    'linter@official': [{ scope: 'user', installPath: '/plugins/linter' }],
  },
});

function projectDocument(overrides?: Record<string, unknown>): Record<string, unknown> {
  return createMinimalDocument({
    name: 'analytics',
    template: 'python',
    marketplaces: { official: { url: 'https://plugins.example.com/official' } },
    plugins: [
      { marketplace: 'official', name: 'linter' },
      { marketplace: 'official', name: 'ghost' },
    ],
    ...overrides,
  });
}

const EXPECTED_FILES = [
  '.devcontainer/.kiln/provider',
  '.devcontainer/devcontainer.json',
  '.devcontainer/features/claude-code/devcontainer-feature.json',
  '.devcontainer/features/claude-code/install.sh',
  '.devcontainer/features/plugin-manager/devcontainer-feature.json',
  '.devcontainer/features/plugin-manager/install.sh',
  '.gitignore',
  'project/.claude/settings.json',
  'project/README.md',
];

// ─── Tests ──────────────────────────────────────────────────────

describe('createGenerator', () => {
  let root: string;
  let assetsRoot: string;
  let outputDir: string;
  let registryPath: string;
  let git: FakeGitRunner;
  let logger: Logger;
  let generator: Generator;

  function buildGenerator(): Generator {
    const catalog = createTestCatalog({ root: assetsRoot });
    return createGenerator({
      catalog,
      resolver: createConfigResolver({ catalog, logger }),
      provisioner: createFeatureProvisioner({ bundlesRoot: join(assetsRoot, 'features'), logger }),
      initializer: createRepositoryInitializer({ git, logger }),
      logger,
      registryPath,
      assetsRoot,
    });
  }

  beforeEach(async () => {
    root = await createTempDir('kiln-generator-');
    assetsRoot = join(root, 'assets');
    outputDir = join(root, 'out');
    registryPath = await writeFixture(root, 'installed_plugins.json', registryJson);
    await writeAssets(assetsRoot);
    git = createFakeGitRunner();
    logger = createMockLogger();
    generator = buildGenerator();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('full run', () => {
    it('writes the project and reports every file as created', async () => {
      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.report.created).toEqual(EXPECTED_FILES);
      expect(result.value.report.modified).toEqual([]);
      expect(result.value.report.skipped).toEqual([]);
      expect(result.value.features.map((f) => f.name)).toEqual(['claude-code', 'plugin-manager']);
    });

    it('renders template and shared files', async () => {
      await generator.generate({ document: projectDocument(), outputDir });

      expect(await readFixture(outputDir, '.devcontainer/devcontainer.json')).toBe(
        '{"name": "analytics", "python": "3.12"}\n',
      );
      expect(await readFixture(outputDir, 'project/README.md')).toBe('# analytics\n');
      expect(await readFixture(outputDir, '.gitignore')).toBe(
        '.venv/\n\n# Provisioned feature bundles\n.devcontainer/features/\n',
      );
      expect(await readFixture(outputDir, '.devcontainer/.kiln/provider')).toBe('anthropic\n');
    });

    it('persists the activation plan and reports unresolved plugins', async () => {
      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.plan).toEqual({ 'linter@official': true });
      expect(result.value.report.warnings).toEqual([
        {
          code: 'PLUGIN_NOT_FOUND',
          name: 'ghost@official',
          list: 'activate',
          message: "Plugin 'ghost@official' not found in registry; dropped from activate list",
        },
      ]);
      expect(await readFixture(outputDir, 'project/.claude/settings.json')).toBe(
        '{\n  "enabledPlugins": {\n    "linter@official": true\n  }\n}\n',
      );
    });

    it('initializes the repository with one commit', async () => {
      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.repository).toEqual({
        status: 'initialized',
        dryRun: false,
        commands: [['init', '-q'], ['add', '-A'], ['commit', '-q', '-m', 'Initial commit']],
      });
    });

    it('is idempotent on a second run', async () => {
      await generator.generate({ document: projectDocument(), outputDir });
      const second = await generator.generate({ document: projectDocument(), outputDir });

      expect(second.ok).toBe(true);
      if (!second.ok) return;
      expect(second.value.report.created).toEqual([]);
      expect(second.value.report.modified).toEqual([]);
      expect(second.value.report.skipped).toEqual(EXPECTED_FILES);
      expect(second.value.repository?.status).toBe('unchanged');
      expect(git.calls.filter((call) => call.args.includes('commit'))).toHaveLength(1);
    });

    it('keeps unrelated settings keys', async () => {
      await writeFixture(
        outputDir,
        'project/.claude/settings.json',
        '{"theme": "dark", "enabledPlugins": {"stale@official": true}}',
      );

      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok && result.value.report.modified).toEqual(['project/.claude/settings.json']);
      const settings = await readFixture(outputDir, 'project/.claude/settings.json');
      expect(settings.startsWith('{"theme": "dark", "enabledPlugins": ')).toBe(true);
      expect(JSON.parse(settings)).toEqual({ theme: 'dark', enabledPlugins: { 'linter@official': true } });
    });

    it('writes the document when asked', async () => {
      await generator.generate({ document: projectDocument(), outputDir, writeDocument: true });

      expect(await readFixture(outputDir, 'kiln.yaml')).toContain('name: analytics\n');
    });

    it('marks bundles as generated for linguist', async () => {
      await generator.generate({
        document: projectDocument({ git: { generated: 'linguist-generated' } }),
        outputDir,
      });

      expect(await readFixture(outputDir, '.gitignore')).toBe('.venv/\n');
      expect(await readFixture(outputDir, '.gitattributes')).toBe(
        '.devcontainer/features/** linguist-generated=true\n',
      );
    });

    it('skips the repository when disabled', async () => {
      const result = await generator.generate({
        document: projectDocument(),
        outputDir,
        initRepository: false,
      });

      expect(result.ok && result.value.repository).toBeUndefined();
      expect(git.calls).toEqual([]);
    });

    it('reports a missing registry as a warning', async () => {
      registryPath = join(root, 'missing.json');
      generator = buildGenerator();

      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.plan).toEqual({});
      expect(result.value.report.warnings.map((w) => w.code)).toEqual([
        'PLUGIN_REGISTRY_MISSING',
        'PLUGIN_NOT_FOUND',
        'PLUGIN_NOT_FOUND',
      ]);
    });
  });

  describe('dry run', () => {
    it('reports what would be written without touching disk or git', async () => {
      const result = await generator.generate({ document: projectDocument(), outputDir, dryRun: true });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.report.created).toEqual(EXPECTED_FILES);
      expect(result.value.repository?.dryRun).toBe(true);
      expect(await pathExists(outputDir)).toBe(false);
      expect(git.calls).toEqual([]);
    });
  });

  describe('failures', () => {
    it('stops before writing anything on an unknown schema version', async () => {
      const result = await generator.generate({
        document: projectDocument({ version: '9.9' }),
        outputDir,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.step).toBe('resolve');
      expect(result.error.reason.code).toBe('SCHEMA_VERSION_UNSUPPORTED');
      expect(result.error.exitCode).toBe(2);
      expect(await pathExists(outputDir)).toBe(false);
      expect(git.calls).toEqual([]);
    });

    it('rejects an escaping workspace directory before writing anything', async () => {
      const result = await generator.generate({
        document: projectDocument({ workspace: { dir: '../escape' } }),
        outputDir,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.step).toBe('resolve');
      expect(result.error.reason.code).toBe('VALIDATION_ERROR');
      expect(await pathExists(outputDir)).toBe(false);
      expect(await pathExists(join(root, 'escape'))).toBe(false);
    });

    it('names the unresolved token', async () => {
      await writeFixture(assetsRoot, 'templates/python/files/Makefile', 'run: {{ENTRYPOINT}}\n');

      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.step).toBe('render');
      expect(result.error.message).toBe('Unresolved template token {{ENTRYPOINT}} in python/Makefile');
    });

    it('aborts on a missing bundle, leaving rendered files in place', async () => {
      const result = await generator.generate({
        document: projectDocument(),
        overrides: { features: ['claude-code', 'nope'] },
        outputDir,
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.step).toBe('provision');
      expect(result.error.reason.code).toBe('FEATURE_BUNDLE_MISSING');
      expect(await pathExists(join(outputDir, '.devcontainer/devcontainer.json'))).toBe(true);
      expect(await pathExists(join(outputDir, '.devcontainer/features/claude-code'))).toBe(false);
      expect(git.calls).toEqual([]);
    });

    it('refuses to overwrite unparseable settings', async () => {
      await writeFixture(outputDir, 'project/.claude/settings.json', 'not json');

      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.step).toBe('settings');
      expect(result.error.reason.code).toBe('SETTINGS_PARSE_ERROR');
      expect(await readFixture(outputDir, 'project/.claude/settings.json')).toBe('not json');
    });

    it('wraps a failing git command', async () => {
      git.failOn('commit', { exitCode: 128, stderr: 'fatal: empty ident' });

      const result = await generator.generate({ document: projectDocument(), outputDir });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.step).toBe('repository');
      expect(result.error.reason.code).toBe('REPOSITORY_OPERATION_ERROR');
      expect(result.error.message).toBe('git commit -q -m Initial commit failed (exit 128): fatal: empty ident');
    });
  });
});
