/**
 * Generator — runs the generation pipeline for one project.
 *
 * Orchestrates: resolve → render → provision → plugins → settings → marker →
 * repository. Each step's failure is wrapped in a GenerationError naming the
 * step, and the remaining steps are skipped. Files already written stay in
 * place.
 */
import { readFile } from 'node:fs/promises';
import { join, posix } from 'node:path';

import { serializeSpecDocument } from '@/config/document-builder.js';
import type { ConfigResolver } from '@/config/resolver.js';
import type { ProjectSpec } from '@/config/types.js';
import { SPEC_FILE_NAME } from '@/config/types.js';
import { writeProviderMarker } from '@/container/provider-state.js';
import type { GenerationStep } from '@/core/errors.js';
import { GenerationError, KilnError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok, tryAsync } from '@/core/result.js';
import type { FeatureProvisioner } from '@/features/provisioner.js';
import { FEATURES_TARGET_DIR } from '@/features/types.js';
import { createProjectWriter } from '@/files/project-writer.js';
import { createReportBuilder } from '@/files/report.js';
import type { ProjectWriter, ReportBuilder } from '@/files/types.js';
import type { Logger } from '@/observability/logger.js';
import { resolveActivationPlan } from '@/plugins/activation-resolver.js';
import { loadPluginRegistry } from '@/plugins/registry.js';
import { writeSettings } from '@/plugins/settings-merger.js';
import type { PluginActivationPlan } from '@/plugins/types.js';
import { SETTINGS_FILE } from '@/plugins/types.js';
import type { RepositoryInitializer } from '@/repository/initializer.js';
import type { TemplateCatalog } from '@/templates/catalog.js';
import { renderTemplate } from '@/templates/renderer.js';
import { buildResolutionTable } from '@/templates/resolution-table.js';
import type { ResolutionTable } from '@/templates/types.js';

import type { GenerateRequest, GenerationResult } from './types.js';
import {
  DEFAULT_COMMIT_MESSAGE,
  GITIGNORE_TEMPLATE,
  README_TEMPLATE,
  SHARED_ASSETS_DIR,
} from './types.js';

// ─── Generator Options ──────────────────────────────────────────

export interface GeneratorOptions {
  catalog: TemplateCatalog;
  resolver: ConfigResolver;
  provisioner: FeatureProvisioner;
  initializer: RepositoryInitializer;
  logger: Logger;
  /** Installed-plugin registry file. */
  registryPath: string;
  /** Directory holding the shared assets. */
  assetsRoot: string;
}

export interface Generator {
  generate(request: GenerateRequest): Promise<Result<GenerationResult, GenerationError>>;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Anything thrown inside a step becomes a KilnError. */
function toKilnError(thrown: unknown): KilnError {
  if (thrown instanceof KilnError) return thrown;
  return new KilnError({
    message: thrown instanceof Error ? thrown.message : String(thrown),
    code: 'IO_ERROR',
    cause: thrown,
  });
}

/** Lines added to `.gitignore` / `.gitattributes` for the provisioned bundles. */
function vcsPolicyFiles(spec: ProjectSpec, gitignoreBase: string): Array<{ path: string; content: string }> {
  const features = `${FEATURES_TARGET_DIR}/`;
  switch (spec.git.generated) {
    case 'ignored':
      return [{ path: '.gitignore', content: `${gitignoreBase}\n# Provisioned feature bundles\n${features}\n` }];
    case 'linguist-generated':
      return [
        { path: '.gitignore', content: gitignoreBase },
        { path: '.gitattributes', content: `${FEATURES_TARGET_DIR}/** linguist-generated=true\n` },
      ];
    case 'committed':
      return [{ path: '.gitignore', content: gitignoreBase }];
  }
}

// ─── Generator ──────────────────────────────────────────────────

export function createGenerator(options: GeneratorOptions): Generator {
  const { catalog, resolver, provisioner, initializer, registryPath, assetsRoot } = options;
  const logger = options.logger.child({ component: 'generator' });

  async function runStep<T>(
    step: GenerationStep,
    operation: () => Promise<Result<T, KilnError>>,
  ): Promise<Result<T, GenerationError>> {
    const outcome = await tryAsync(operation, toKilnError);
    const result: Result<T, KilnError> = outcome.ok ? outcome.value : outcome;
    if (result.ok) return ok(result.value);

    logger.error('Generation step failed', {
      component: 'generator',
      step,
      code: result.error.code,
      error: result.error.message,
    });
    return err(new GenerationError(step, result.error));
  }

  async function renderFile(
    writer: ProjectWriter,
    table: ResolutionTable,
    source: string,
    text: string,
    destination: string,
  ): Promise<Result<void, KilnError>> {
    const rendered = renderTemplate(text, table, { source });
    if (!rendered.ok) return rendered;
    await writer.write(destination, rendered.value);
    return ok(undefined);
  }

  async function renderProject(
    request: GenerateRequest,
    spec: ProjectSpec,
    writer: ProjectWriter,
  ): Promise<Result<void, KilnError>> {
    const table = buildResolutionTable(spec);

    for (const file of await catalog.listTemplateFiles(spec.template)) {
      const text = await catalog.readTemplateFile(spec.template, file);
      const written = await renderFile(writer, table, `${spec.template}/${file}`, text, file);
      if (!written.ok) return written;
    }

    const sharedDir = join(assetsRoot, SHARED_ASSETS_DIR);
    const readme = await renderFile(
      writer,
      table,
      `${SHARED_ASSETS_DIR}/${README_TEMPLATE}`,
      await readFile(join(sharedDir, README_TEMPLATE), 'utf-8'),
      posix.join(spec.workspace.dir, 'README.md'),
    );
    if (!readme.ok) return readme;

    const gitignore = renderTemplate(
      await readFile(join(sharedDir, GITIGNORE_TEMPLATE), 'utf-8'),
      table,
      { source: `${SHARED_ASSETS_DIR}/${GITIGNORE_TEMPLATE}` },
    );
    if (!gitignore.ok) return gitignore;
    for (const file of vcsPolicyFiles(spec, gitignore.value)) {
      await writer.write(file.path, file.content);
    }

    if (request.writeDocument) {
      await writer.write(SPEC_FILE_NAME, serializeSpecDocument(request.document));
    }
    return ok(undefined);
  }

  async function resolvePlugins(
    spec: ProjectSpec,
    report: ReportBuilder,
  ): Promise<Result<PluginActivationPlan, KilnError>> {
    const loaded = await loadPluginRegistry({ registryPath, logger });
    if (!loaded.ok) return loaded;
    loaded.value.warnings.forEach((warning) => report.warn(warning));

    const { plan, warnings } = resolveActivationPlan({
      registry: loaded.value.registry,
      activate: spec.pluginActivation.activate,
      deactivate: spec.pluginActivation.deactivate,
      logger,
    });
    warnings.forEach((warning) => report.warn(warning));
    return ok(plan);
  }

  return {
    async generate(request) {
      const dryRun = request.dryRun ?? false;
      const startTime = Date.now();

      logger.info('Starting generation', {
        component: 'generator',
        outputDir: request.outputDir,
        preset: request.preset,
        dryRun,
      });

      // Nothing touches the filesystem until the spec resolves.
      const spec = await runStep('resolve', async () =>
        resolver.resolve({
          document: request.document,
          preset: request.preset,
          overrides: request.overrides,
        }),
      );
      if (!spec.ok) return spec;

      const report = createReportBuilder();
      const writer = createProjectWriter({
        root: request.outputDir,
        dryRun,
        report,
        logger,
        onWrite: request.onWrite,
      });

      const rendered = await runStep('render', () => renderProject(request, spec.value, writer));
      if (!rendered.ok) return rendered;

      const features = await runStep('provision', () =>
        provisioner.provision(spec.value.features, writer),
      );
      if (!features.ok) return features;

      const plan = await runStep('plugins', () => resolvePlugins(spec.value, report));
      if (!plan.ok) return plan;

      const settings = await runStep('settings', () =>
        writeSettings({
          writer,
          path: posix.join(spec.value.workspace.dir, SETTINGS_FILE),
          plan: plan.value,
          logger,
        }),
      );
      if (!settings.ok) return settings;

      const marker = await runStep('marker', async () =>
        ok(await writeProviderMarker(writer, spec.value.claude.provider)),
      );
      if (!marker.ok) return marker;

      let repository: GenerationResult['repository'];
      if (request.initRepository ?? true) {
        const initialized = await runStep('repository', () =>
          initializer.initialize(request.outputDir, {
            message: request.commitMessage ?? DEFAULT_COMMIT_MESSAGE,
            dryRun,
          }),
        );
        if (!initialized.ok) return initialized;
        repository = initialized.value;
      }

      const result: GenerationResult = {
        spec: spec.value,
        report: report.snapshot(),
        plan: plan.value,
        features: features.value,
        repository,
      };

      logger.info('Generation completed', {
        component: 'generator',
        project: spec.value.name,
        outputDir: request.outputDir,
        dryRun,
        created: result.report.created.length,
        modified: result.report.modified.length,
        skipped: result.report.skipped.length,
        warnings: result.report.warnings.length,
        durationMs: Date.now() - startTime,
      });

      return ok(result);
    },
  };
}
