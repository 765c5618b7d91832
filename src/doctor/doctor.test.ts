import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createConfigResolver } from '@/config/resolver.js';
import type { CommandResult, CommandRunner } from '@/repository/types.js';
import { createTestCatalog } from '@/testing/fixtures/catalog.js';
import { createTempDir, removeTempDir, writeFixture } from '@/testing/fixtures/fs.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';

import { createDoctor } from './doctor.js';
import type { DoctorReport } from './types.js';

// ─── Test Fixtures ──────────────────────────────────────────────

/** Runner answering by joined arguments; anything unlisted succeeds silently. */
function scriptedRunner(responses: Record<string, Partial<CommandResult>>): CommandRunner {
  return {
    run: async (_cwd, args) => ({ stdout: '', stderr: '', exitCode: 0, ...responses[args.join(' ')] }),
  };
}

const specYaml = `version: "0.1"
name: demo
docker:
  image: mcr.microsoft.com/devcontainers/base:ubuntu
features:
  - claude-code
`;

function statuses(report: DoctorReport): Array<[string, string]> {
  return report.checks.map((check) => [check.name, check.status]);
}

describe('createDoctor', () => {
  let root: string;
  let projectDir: string;
  let git: CommandRunner;
  let docker: CommandRunner;

  function doctor() {
    return createDoctor({
      git,
      docker,
      resolver: createConfigResolver({ catalog: createTestCatalog(), logger: createMockLogger() }),
      cwd: root,
      env: {},
      providersRoot: join(root, 'providers'),
      logger: createMockLogger(),
    });
  }

  async function writeHealthyProject(): Promise<void> {
    await writeFixture(projectDir, 'kiln.yaml', specYaml);
    await writeFixture(projectDir, '.devcontainer/devcontainer.json', '// generated\n{"name": "demo",}\n');
    await writeFixture(projectDir, '.devcontainer/Dockerfile', 'FROM debian\n');
    await writeFixture(projectDir, '.devcontainer/features/claude-code/devcontainer-feature.json', '{}');
    await writeFixture(projectDir, '.devcontainer/features/claude-code/install.sh', '#!/bin/sh\n');
    await writeFixture(projectDir, '.devcontainer/.kiln/provider', 'anthropic\n');
    await writeFixture(projectDir, 'project/README.md', '# demo\n');
    await writeFixture(root, 'providers/anthropic/auth', 'test-secret\n');
  }

  beforeEach(async () => {
    root = await createTempDir('kiln-doctor-');
    projectDir = join(root, 'demo');
    git = scriptedRunner({ '--version': { stdout: 'git version 2.43.0\n' } });
    docker = scriptedRunner({
      '--version': { stdout: 'Docker version 27.0.3\n' },
      'info --format {{.ServerVersion}}': { stdout: '27.0.3\n' },
    });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reports a generated project as healthy', async () => {
    await writeHealthyProject();

    const report = await doctor().check(projectDir);

    expect(report.healthy).toBe(true);
    expect(report.checks.map((check) => [check.name, check.status, check.message])).toEqual([
      ['git', 'ok', 'git version 2.43.0'],
      ['docker', 'ok', 'Docker version 27.0.3 (daemon 27.0.3)'],
      ['specification', 'ok', 'demo (template generic)'],
      ['devcontainer', 'ok', 'devcontainer.json and Dockerfile present'],
      ['features', 'ok', 'claude-code'],
      ['provider', 'ok', 'anthropic'],
      ['workspace', 'ok', './project in a git repository'],
    ]);
  });

  describe('host tools', () => {
    it('marks tools that cannot be started as missing', async () => {
      await writeHealthyProject();
      git = scriptedRunner({ '--version': { exitCode: null, stderr: 'spawn git ENOENT' } });
      docker = scriptedRunner({ '--version': { exitCode: null, stderr: 'spawn docker ENOENT' } });

      const report = await doctor().check(projectDir);

      expect(report.healthy).toBe(false);
      expect(report.checks[0]).toEqual({
        name: 'git',
        status: 'missing',
        message: 'git not found',
        suggestion: 'Install git and put it on PATH',
      });
      expect(report.checks[1]?.status).toBe('missing');
    });

    it('warns when the docker daemon is not reachable', async () => {
      await writeHealthyProject();
      docker = scriptedRunner({
        '--version': { stdout: 'Docker version 27.0.3\n' },
        'info --format {{.ServerVersion}}': { exitCode: 1, stderr: 'Cannot connect to the Docker daemon' },
      });

      const report = await doctor().check(projectDir);

      expect(report.checks[1]).toEqual({
        name: 'docker',
        status: 'warning',
        message: 'Docker version 27.0.3; daemon not reachable',
        suggestion: 'Start the Docker daemon',
      });
      expect(report.healthy).toBe(true);
    });
  });

  describe('project', () => {
    it('skips the spec-dependent checks without a specification', async () => {
      const report = await doctor().check(projectDir);

      expect(statuses(report)).toEqual([
        ['git', 'ok'],
        ['docker', 'ok'],
        ['specification', 'warning'],
        ['devcontainer', 'missing'],
      ]);
      expect(report.healthy).toBe(false);
    });

    it('lists the validation issues of an invalid specification', async () => {
      await writeFixture(projectDir, 'kiln.yaml', 'version: "0.1"\nname: ""\ndocker:\n  image: debian\n');

      const report = await doctor().check(projectDir);
      const specCheck = report.checks[2];

      expect(specCheck?.status).toBe('error');
      expect(specCheck?.message.startsWith('name: ')).toBe(true);
      expect(specCheck?.suggestion).toBe('Run kiln validate kiln.yaml for details');
    });

    it('rejects an unparsable devcontainer.json', async () => {
      await writeHealthyProject();
      await writeFixture(projectDir, '.devcontainer/devcontainer.json', '{"name": ');

      const report = await doctor().check(projectDir);
      const devcontainer = report.checks[3];

      expect(devcontainer?.status).toBe('error');
      expect(devcontainer?.message.startsWith('devcontainer.json is not valid JSON (')).toBe(true);
    });

    it('names bundles that were not provisioned', async () => {
      await writeHealthyProject();
      await rm(join(projectDir, '.devcontainer/features/claude-code'), { recursive: true });

      const report = await doctor().check(projectDir);

      expect(report.checks[4]).toEqual({
        name: 'features',
        status: 'missing',
        message: 'Feature bundles not provisioned: claude-code',
        suggestion: 'Run kiln generate kiln.yaml',
      });
    });

    it('warns about missing credentials and a missing repository', async () => {
      await writeHealthyProject();
      await rm(join(root, 'providers'), { recursive: true });
      git = scriptedRunner({
        '--version': { stdout: 'git version 2.43.0\n' },
        'rev-parse --git-dir': { exitCode: 128, stderr: 'fatal: not a git repository' },
      });

      const report = await doctor().check(projectDir);

      expect(report.checks[5]).toMatchObject({ name: 'provider', status: 'warning' });
      expect(report.checks[5]?.message).toBe(
        `No credentials for 'anthropic' at ${join(root, 'providers', 'anthropic', 'auth')}`,
      );
      expect(report.checks[6]).toMatchObject({
        name: 'workspace',
        status: 'warning',
        message: './project exists; the project is not a git repository',
      });
      expect(report.healthy).toBe(true);
    });
  });
});
