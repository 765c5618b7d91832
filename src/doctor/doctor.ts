/**
 * Doctor — checks the host tools and a generated project's health.
 *
 * Checks run in a fixed order: git, docker, specification, devcontainer,
 * feature bundles, provider, workspace. The last three need the
 * specification to resolve and are skipped otherwise.
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import jsonc from 'jsonc-parser';
import type { ParseError } from 'jsonc-parser';

import { loadSpecDocument } from '@/config/loader.js';
import type { ConfigResolver } from '@/config/resolver.js';
import type { ProjectSpec } from '@/config/types.js';
import { SPEC_FILE_NAME } from '@/config/types.js';
import { AUTH_TOKEN_FILE, PROVIDER_MARKER_PATH } from '@/container/provider-state.js';
import { ValidationError } from '@/core/errors.js';
import { pathExists } from '@/core/fs.js';
import { FEATURES_TARGET_DIR, FEATURE_ENTRY_SCRIPT, FEATURE_METADATA_FILE } from '@/features/types.js';
import type { Logger } from '@/observability/logger.js';
import type { CommandRunner } from '@/repository/types.js';

import type { DoctorCheck, DoctorReport } from './types.js';

// ─── Options ────────────────────────────────────────────────────

export interface DoctorOptions {
  git: CommandRunner;
  docker: CommandRunner;
  resolver: ConfigResolver;
  /** Directory the tool version commands run in. */
  cwd: string;
  /** Environment used for `${VAR}` placeholders in the specification. */
  env: NodeJS.ProcessEnv;
  providersRoot: string;
  logger: Logger;
}

export interface Doctor {
  check(projectDir: string): Promise<DoctorReport>;
}

const DEVCONTAINER_DIR = '.devcontainer';

// ─── Factory ────────────────────────────────────────────────────

export function createDoctor(options: DoctorOptions): Doctor {
  const { git, docker, resolver, cwd, env, providersRoot } = options;
  const logger = options.logger.child({ component: 'doctor' });

  async function checkGit(): Promise<DoctorCheck> {
    const result = await git.run(cwd, ['--version']);
    if (result.exitCode === null) {
      return { name: 'git', status: 'missing', message: 'git not found', suggestion: 'Install git and put it on PATH' };
    }
    if (result.exitCode !== 0) {
      return { name: 'git', status: 'error', message: result.stderr.trim() || 'git --version failed' };
    }
    return { name: 'git', status: 'ok', message: result.stdout.trim() };
  }

  async function checkDocker(): Promise<DoctorCheck> {
    const version = await docker.run(cwd, ['--version']);
    if (version.exitCode === null) {
      return {
        name: 'docker',
        status: 'missing',
        message: 'docker not found',
        suggestion: 'Install Docker and put it on PATH',
      };
    }
    if (version.exitCode !== 0) {
      return { name: 'docker', status: 'error', message: version.stderr.trim() || 'docker --version failed' };
    }

    const info = await docker.run(cwd, ['info', '--format', '{{.ServerVersion}}']);
    if (info.exitCode !== 0) {
      return {
        name: 'docker',
        status: 'warning',
        message: `${version.stdout.trim()}; daemon not reachable`,
        suggestion: 'Start the Docker daemon',
      };
    }
    return { name: 'docker', status: 'ok', message: `${version.stdout.trim()} (daemon ${info.stdout.trim()})` };
  }

  async function checkSpec(projectDir: string): Promise<{ check: DoctorCheck; spec?: ProjectSpec }> {
    const specPath = join(projectDir, SPEC_FILE_NAME);
    if (!(await pathExists(specPath))) {
      return {
        check: {
          name: 'specification',
          status: 'warning',
          message: `${SPEC_FILE_NAME} not found`,
          suggestion: 'Run kiln init to create a project with a specification',
        },
      };
    }

    const document = await loadSpecDocument(specPath, env);
    if (!document.ok) {
      return { check: { name: 'specification', status: 'error', message: document.error.message } };
    }

    const spec = resolver.resolve({ document: document.value });
    if (!spec.ok) {
      const details =
        spec.error instanceof ValidationError
          ? spec.error.issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ')
          : spec.error.message;
      return {
        check: {
          name: 'specification',
          status: 'error',
          message: details,
          suggestion: `Run kiln validate ${SPEC_FILE_NAME} for details`,
        },
      };
    }

    return {
      check: {
        name: 'specification',
        status: 'ok',
        message: `${spec.value.name} (template ${spec.value.template})`,
      },
      spec: spec.value,
    };
  }

  async function checkDevcontainer(projectDir: string): Promise<DoctorCheck> {
    const name = 'devcontainer';
    const regenerate = `Run kiln generate ${SPEC_FILE_NAME}`;
    if (!(await pathExists(join(projectDir, DEVCONTAINER_DIR)))) {
      return { name, status: 'missing', message: `${DEVCONTAINER_DIR}/ not found`, suggestion: regenerate };
    }

    const configPath = join(projectDir, DEVCONTAINER_DIR, 'devcontainer.json');
    if (!(await pathExists(configPath))) {
      return { name, status: 'missing', message: 'devcontainer.json not found', suggestion: regenerate };
    }

    const errors: ParseError[] = [];
    jsonc.parse(await readFile(configPath, 'utf-8'), errors, { allowTrailingComma: true });
    const [first] = errors;
    if (first) {
      return {
        name,
        status: 'error',
        message: `devcontainer.json is not valid JSON (${jsonc.printParseErrorCode(first.error)} at offset ${first.offset})`,
        suggestion: regenerate,
      };
    }

    if (!(await pathExists(join(projectDir, DEVCONTAINER_DIR, 'Dockerfile')))) {
      return { name, status: 'warning', message: 'Dockerfile not found', suggestion: regenerate };
    }
    return { name, status: 'ok', message: 'devcontainer.json and Dockerfile present' };
  }

  async function checkFeatures(projectDir: string, spec: ProjectSpec): Promise<DoctorCheck> {
    const missing: string[] = [];
    for (const feature of spec.features) {
      const bundleDir = join(projectDir, FEATURES_TARGET_DIR, feature);
      const complete =
        (await pathExists(join(bundleDir, FEATURE_METADATA_FILE))) &&
        (await pathExists(join(bundleDir, FEATURE_ENTRY_SCRIPT)));
      if (!complete) missing.push(feature);
    }

    if (missing.length > 0) {
      return {
        name: 'features',
        status: 'missing',
        message: `Feature bundles not provisioned: ${missing.join(', ')}`,
        suggestion: `Run kiln generate ${SPEC_FILE_NAME}`,
      };
    }
    return {
      name: 'features',
      status: 'ok',
      message: spec.features.length > 0 ? spec.features.join(', ') : 'No feature bundles declared',
    };
  }

  async function checkProvider(projectDir: string, spec: ProjectSpec): Promise<DoctorCheck> {
    const markerPath = join(projectDir, PROVIDER_MARKER_PATH);
    if (!(await pathExists(markerPath))) {
      return {
        name: 'provider',
        status: 'warning',
        message: 'Provider marker not found',
        suggestion: `Run kiln generate ${SPEC_FILE_NAME}`,
      };
    }

    const provider = (await readFile(markerPath, 'utf-8')).trim();
    if (provider !== spec.claude.provider) {
      return {
        name: 'provider',
        status: 'warning',
        message: `Marker names '${provider}' but the specification selects '${spec.claude.provider}'`,
        suggestion: `Run kiln generate ${SPEC_FILE_NAME}`,
      };
    }

    const authPath = join(providersRoot, provider, AUTH_TOKEN_FILE);
    if (!(await pathExists(authPath))) {
      return {
        name: 'provider',
        status: 'warning',
        message: `No credentials for '${provider}' at ${authPath}`,
        suggestion: `Write the provider's token to ${authPath}`,
      };
    }
    return { name: 'provider', status: 'ok', message: provider };
  }

  async function checkWorkspace(projectDir: string, spec: ProjectSpec): Promise<DoctorCheck> {
    if (!(await pathExists(join(projectDir, spec.workspace.dir)))) {
      return {
        name: 'workspace',
        status: 'missing',
        message: `Workspace directory ${spec.workspace.dir} not found`,
        suggestion: `Run kiln generate ${SPEC_FILE_NAME}`,
      };
    }

    const repository = await git.run(projectDir, ['rev-parse', '--git-dir']);
    if (repository.exitCode !== 0) {
      return {
        name: 'workspace',
        status: 'warning',
        message: `${spec.workspace.dir} exists; the project is not a git repository`,
        suggestion: 'Run git init in the project directory',
      };
    }
    return { name: 'workspace', status: 'ok', message: `${spec.workspace.dir} in a git repository` };
  }

  return {
    async check(projectDir) {
      const checks: DoctorCheck[] = [await checkGit(), await checkDocker()];

      const { check: specCheck, spec } = await checkSpec(projectDir);
      checks.push(specCheck, await checkDevcontainer(projectDir));
      if (spec) {
        checks.push(
          await checkFeatures(projectDir, spec),
          await checkProvider(projectDir, spec),
          await checkWorkspace(projectDir, spec),
        );
      }

      const healthy = checks.every((check) => check.status === 'ok' || check.status === 'warning');
      logger.info('Doctor finished', {
        component: 'doctor',
        projectDir,
        healthy,
        problems: checks.filter((check) => check.status !== 'ok').map((check) => check.name),
      });
      return { projectDir, checks, healthy };
    },
  };
}
