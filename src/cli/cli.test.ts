/**
 * Tests for the CLI commands, run in-process against the bundled assets.
 */
import { chmod, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { pathExists } from '@/core/fs.js';
import { createTempDir, readFixture, removeTempDir, writeFixture } from '@/testing/fixtures/fs.js';
import type { CommandRunner } from '@/repository/types.js';
import type { FakeGitRunner } from '@/testing/fixtures/git.js';
import { createFakeGitRunner } from '@/testing/fixtures/git.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

import { USAGE } from './args.js';
import type { CliIO } from './cli.js';
import { runCli } from './cli.js';

// ─── Test Fixtures ──────────────────────────────────────────────

const registryJson = JSON.stringify({
  version: 2,
  plugins: {
    'notebook-tools@official': [{ scope: 'user', installPath: '/plugins/notebook-tools' }],
  },
});

describe('runCli', () => {
  let root: string;
  let git: FakeGitRunner;
  let stdout: string[];
  let stderr: string[];

  function io(cwd = root, env: NodeJS.ProcessEnv = {}): CliIO {
    return {
      cwd,
      env: {
        HOME: join(root, 'home'),
        KILN_PLUGIN_REGISTRY: join(root, 'installed_plugins.json'),
        ...env,
      },
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      logger: createMockLogger(),
      git,
    };
  }

  beforeEach(async () => {
    root = await createTempDir('kiln-cli-');
    await writeFixture(root, 'installed_plugins.json', registryJson);
    git = createFakeGitRunner();
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  // ─── Usage ──────────────────────────────────────────────────────

  describe('usage', () => {
    it('prints usage for help', async () => {
      expect(await runCli(['help'], io())).toBe(0);
      expect(stdout).toEqual([USAGE]);
    });

    it('rejects an unknown command', async () => {
      expect(await runCli(['frobnicate'], io())).toBe(2);
      expect(stderr).toEqual(['error: Unknown command "frobnicate"', USAGE]);
    });

    it('rejects an invalid log level', async () => {
      expect(await runCli(['list-templates'], io(root, { KILN_LOG_LEVEL: 'loud' }))).toBe(2);
      expect(stderr).toEqual(['error: Invalid KILN_LOG_LEVEL "loud"']);
    });
  });

  // ─── Listing ────────────────────────────────────────────────────

  describe('list-templates', () => {
    it('lists bundled templates', async () => {
      expect(await runCli(['list-templates'], io())).toBe(0);
      expect(stdout).toEqual([
        'generic  Language-agnostic development container',
        'nodejs   Node.js development container (nodejs 22)',
        'python   Python development container (python 3.12)',
      ]);
    });
  });

  describe('list-presets', () => {
    it('lists bundled presets', async () => {
      expect(await runCli(['list-presets'], io())).toBe(0);
      expect(stdout).toEqual([
        'minimal     Base image with the assistant CLI only (template: generic)',
        'node-web    Node.js web applications (template: nodejs)',
        'python-ml   Python for data science and machine learning (template: python)',
        'python-web  Python web services (template: python)',
      ]);
    });
  });

  // ─── init / generate ────────────────────────────────────────────

  describe('init', () => {
    it('creates a project from a template', async () => {
      const exitCode = await runCli(['init', 'demo', '--template=python', '--lang-version=3.11'], io());

      expect(exitCode).toBe(0);
      expect(stdout[0]).toBe(`Generated demo in ${join(root, 'demo')}`);
      expect(stdout.slice(-2)).toEqual(['14 created, 0 modified, 0 unchanged', 'Repository: initialized']);
      expect(stderr).toEqual([]);

      const devcontainer: unknown = JSON.parse(await readFixture(root, 'demo/.devcontainer/devcontainer.json'));
      expect(devcontainer).toMatchObject({
        name: 'demo',
        overrideFeatureInstallOrder: ['./features/proxy', './features/claude-code', './features/plugin-manager'],
        customizations: { kiln: { template: 'python', language: 'python', languageVersion: '3.11' } },
      });
      expect(await readFixture(root, 'demo/.devcontainer/Dockerfile')).toContain('ENV PYTHON_VERSION=3.11\n');
      expect(await readFixture(root, 'demo/.devcontainer/.kiln/provider')).toBe('anthropic\n');
    });

    it('regenerates identically from the written document', async () => {
      await runCli(['init', 'demo', '--template=python', '--lang-version=3.11'], io());
      stdout = [];

      const exitCode = await runCli(['generate', 'kiln.yaml'], io(join(root, 'demo')));

      expect(exitCode).toBe(0);
      expect(stdout.slice(-2)).toEqual(['0 created, 0 modified, 13 unchanged', 'Repository: unchanged']);
    });

    it('applies preset plugin lists', async () => {
      const exitCode = await runCli(['init', 'lab', '--preset=python-ml'], io());

      expect(exitCode).toBe(0);
      expect(await readFixture(root, 'lab/project/.claude/settings.json')).toBe(
        '{\n  "enabledPlugins": {\n    "notebook-tools@official": true\n  }\n}\n',
      );
      expect(stderr).toEqual([
        "warning: Plugin 'web-tools' not found in registry; dropped from deactivate list",
      ]);
    });

    it('writes nothing on a dry run', async () => {
      const exitCode = await runCli(['init', 'demo', '--dry-run'], io());

      expect(exitCode).toBe(0);
      expect(stdout[0]).toBe(`Dry run for demo in ${join(root, 'demo')}; nothing written`);
      expect(await pathExists(join(root, 'demo'))).toBe(false);
    });

    it('refuses a non-empty directory without --yes', async () => {
      await writeFixture(root, 'demo/notes.txt', 'keep me\n');

      expect(await runCli(['init', 'demo'], io())).toBe(2);
      expect(stderr).toEqual([
        `error: Directory ${join(root, 'demo')} is not empty; pass --yes to generate into it`,
      ]);
      expect(await runCli(['init', 'demo', '--yes'], io())).toBe(0);
    });

    it('reports an unsupported language version', async () => {
      expect(await runCli(['init', 'demo', '--template=python', '--lang-version=2.7'], io())).toBe(2);
      expect(stderr).toEqual([
        "error [resolve] Language version '2.7' is not supported by template 'python'. Supported: 3.10, 3.11, 3.12, 3.13",
      ]);
    });
  });

  describe('generate', () => {
    it('fails before writing on an unknown schema version', async () => {
      await writeFixture(root, 'spec/kiln.yaml', 'version: "9.9"\nname: demo\n');

      expect(await runCli(['generate', 'spec/kiln.yaml'], io())).toBe(2);
      expect(stderr).toEqual([
        "error [resolve] Unsupported schema version: '9.9'. Supported versions: 0.1",
      ]);
      expect(await pathExists(join(root, 'spec/.devcontainer'))).toBe(false);
      expect(git.calls).toEqual([]);
    });

    it('reports an undefined environment placeholder', async () => {
      await writeFixture(
        root,
        'kiln.yaml',
        'version: "0.1"\nname: ${PROJECT_NAME}\ndocker:\n  image: ubuntu:24.04\n',
      );

      expect(await runCli(['generate', 'kiln.yaml'], io())).toBe(2);
      expect(stderr).toEqual(['error: Environment variable "PROJECT_NAME" is not defined']);
    });
  });

  // ─── validate ───────────────────────────────────────────────────

  describe('validate', () => {
    it('accepts a valid document', async () => {
      await writeFixture(
        root,
        'spec.yaml',
        'version: "0.1"\nname: api\ntemplate: nodejs\ndocker:\n  image: node:22\n',
      );

      expect(await runCli(['validate', 'spec.yaml'], io())).toBe(0);
      expect(stdout).toEqual(['spec.yaml: valid (api, template nodejs, schema 0.1)']);
    });

    it('lists every violated field', async () => {
      await writeFixture(root, 'bad.yaml', 'version: "0.1"\nname: ""\ndocker:\n  image: ""\n');

      expect(await runCli(['validate', 'bad.yaml'], io())).toBe(2);
      expect(stderr).toEqual([
        'error [resolve] Specification validation failed: name, docker.image',
        '  name: Project name cannot be empty',
        '  docker.image: Docker image cannot be empty',
      ]);
    });
  });

  // ─── diff ───────────────────────────────────────────────────────

  describe('diff', () => {
    beforeEach(async () => {
      await runCli(['init', 'demo', '--template=python', '--lang-version=3.11'], io());
      const dockerfile = await readFixture(root, 'demo/.devcontainer/Dockerfile');
      await writeFixture(root, 'demo/.devcontainer/Dockerfile', `${dockerfile}RUN echo extra\n`);
      await writeFixture(root, 'demo/.devcontainer/stale.sh', 'echo stale\n');
      stdout = [];
    });

    it('summarizes changes per file', async () => {
      const calls = git.calls.length;

      expect(await runCli(['diff', 'demo/kiln.yaml', '--stat'], io())).toBe(0);

      expect(stdout).toEqual([
        '  modify .devcontainer/Dockerfile (+0 -1)',
        '  orphan .devcontainer/stale.sh (+0 -1)',
        '0 to create, 1 to modify, 1 orphaned, 12 unchanged',
      ]);
      expect(git.calls).toHaveLength(calls);
      expect(await readFixture(root, 'demo/.devcontainer/Dockerfile')).toContain('RUN echo extra\n');
      expect(await pathExists(join(root, 'demo/.devcontainer/stale.sh'))).toBe(true);
    });

    it('prints unified patches', async () => {
      expect(await runCli(['diff', 'kiln.yaml'], io(join(root, 'demo')))).toBe(0);

      expect(stdout).toContain('--- a/.devcontainer/Dockerfile');
      expect(stdout).toContain('+++ b/.devcontainer/Dockerfile');
      expect(stdout).toContain('-RUN echo extra');
      expect(stdout).toContain('+++ /dev/null');
      expect(stdout).toContain('-echo stale');
      expect(stdout.at(-1)).toBe('0 to create, 1 to modify, 1 orphaned, 12 unchanged');
    });
  });

  // ─── doctor ─────────────────────────────────────────────────────

  describe('doctor', () => {
    const missingDocker: CommandRunner = {
      run: async () => ({ stdout: '', stderr: 'spawn docker ENOENT', exitCode: null }),
    };

    it('checks a generated project and fails on a missing tool', async () => {
      await runCli(['init', 'demo', '--template=python', '--lang-version=3.11'], io());
      stdout = [];

      const exitCode = await runCli(['doctor', '--dir', 'demo'], { ...io(), docker: missingDocker });

      expect(exitCode).toBe(1);
      expect(stdout).toContain(`missing ${'docker'.padEnd(13)}  docker not found`);
      expect(stdout).toContain('        hint: Install Docker and put it on PATH');
      expect(stdout).toContain(`ok      ${'features'.padEnd(13)}  proxy, claude-code, plugin-manager`);
      expect(stdout.at(-1)).toBe('1 problem found');
    });
  });

  // ─── provider-env ───────────────────────────────────────────────

  describe('provider-env', () => {
    beforeEach(async () => {
      await writeFixture(root, 'proj/.devcontainer/.kiln/provider', 'bedrock\n');
      await writeFixture(root, 'home/.claude/providers/bedrock/auth', 'test-secret\n');
    });

    it('prints shell exports', async () => {
      expect(await runCli(['provider-env', '--shell'], io(join(root, 'proj')))).toBe(0);
      expect(stdout).toEqual(["export ANTHROPIC_AUTH_TOKEN='test-secret'"]);
    });

    it('writes an env file', async () => {
      const exitCode = await runCli(
        ['provider-env', '--output', '.devcontainer/.kiln/env'],
        io(join(root, 'proj')),
      );

      expect(exitCode).toBe(0);
      expect(await readFixture(root, 'proj/.devcontainer/.kiln/env')).toBe('ANTHROPIC_AUTH_TOKEN=test-secret\n');
    });

    it('restricts an existing env file to its owner', async () => {
      const envPath = await writeFixture(root, 'proj/.devcontainer/.kiln/env', 'STALE=1\n');
      await chmod(envPath, 0o644);

      const exitCode = await runCli(
        ['provider-env', '--output', '.devcontainer/.kiln/env'],
        io(join(root, 'proj')),
      );

      expect(exitCode).toBe(0);
      expect((await stat(envPath)).mode & 0o777).toBe(0o600);
      expect(await readFixture(root, 'proj/.devcontainer/.kiln/env')).toBe('ANTHROPIC_AUTH_TOKEN=test-secret\n');
    });

    it('prints nothing without a marker', async () => {
      expect(await runCli(['provider-env'], io())).toBe(0);
      expect(stdout).toEqual([]);
    });
  });
});
