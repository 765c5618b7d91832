/**
 * Feature Bundle Provisioner
 *
 * Copies feature bundles (metadata + entry script + anything else in the
 * bundle directory) into a generated project. Every requested bundle is
 * inspected before the first copy, and each copy fully replaces the
 * destination bundle directory.
 */
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { FeatureBundleMissingError } from '@/core/errors.js';
import { listFilesRecursive, pathExists } from '@/core/fs.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ProjectWriter } from '@/files/types.js';
import type { Logger } from '@/observability/logger.js';

import { featureMetadataSchema } from './schema.js';
import type { FeatureBundle, FeatureMetadata, ProvisionOptions, ProvisionedBundle } from './types.js';
import { FEATURES_TARGET_DIR, FEATURE_ENTRY_SCRIPT, FEATURE_METADATA_FILE } from './types.js';

// ─── Interface ──────────────────────────────────────────────────

export interface FeatureProvisioner {
  /** Check that a bundle exists and is complete. */
  inspectBundle(name: string): Promise<Result<FeatureBundle, FeatureBundleMissingError>>;

  /** Copy bundles through the writer. Nothing is copied if any bundle fails inspection. */
  provision(
    names: readonly string[],
    writer: ProjectWriter,
    options?: ProvisionOptions,
  ): Promise<Result<ProvisionedBundle[], FeatureBundleMissingError>>;
}

export interface FeatureProvisionerOptions {
  /** Directory containing one subdirectory per bundle. */
  bundlesRoot: string;
  logger: Logger;
}

const BUNDLE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// ─── Factory ────────────────────────────────────────────────────

export function createFeatureProvisioner(options: FeatureProvisionerOptions): FeatureProvisioner {
  const { bundlesRoot } = options;
  const logger = options.logger.child({ component: 'feature-provisioner' });

  async function readMetadata(
    name: string,
    sourceDir: string,
  ): Promise<Result<FeatureMetadata, FeatureBundleMissingError>> {
    const metadataPath = join(sourceDir, FEATURE_METADATA_FILE);
    if (!(await pathExists(metadataPath))) {
      return err(new FeatureBundleMissingError(name, `${FEATURE_METADATA_FILE} not found`));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(metadataPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new FeatureBundleMissingError(name, `${FEATURE_METADATA_FILE} is not valid JSON (${reason})`));
    }

    const parsed = featureMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
      return err(
        new FeatureBundleMissingError(name, `${FEATURE_METADATA_FILE} is invalid: ${fields.join(', ')}`),
      );
    }
    return ok(parsed.data);
  }

  async function inspectBundle(name: string): Promise<Result<FeatureBundle, FeatureBundleMissingError>> {
    if (!BUNDLE_NAME_PATTERN.test(name)) {
      return err(new FeatureBundleMissingError(name, 'invalid bundle name'));
    }

    const sourceDir = join(bundlesRoot, name);
    if (!(await pathExists(sourceDir))) {
      return err(new FeatureBundleMissingError(name, `no bundle directory at ${sourceDir}`));
    }

    const metadata = await readMetadata(name, sourceDir);
    if (!metadata.ok) return metadata;

    if (!(await pathExists(join(sourceDir, FEATURE_ENTRY_SCRIPT)))) {
      return err(new FeatureBundleMissingError(name, `${FEATURE_ENTRY_SCRIPT} not found`));
    }

    const paths = await listFilesRecursive(sourceDir);
    const files = await Promise.all(
      paths.map(async (path) => ({
        path,
        mode: (await stat(join(sourceDir, path))).mode & 0o777,
      })),
    );

    return ok({ name, sourceDir, metadata: metadata.value, files });
  }

  /** Content of every file currently in a destination bundle directory. */
  async function snapshotDestination(
    writer: ProjectWriter,
    destination: string,
  ): Promise<Map<string, Buffer>> {
    const snapshot = new Map<string, Buffer>();
    const fullPath = join(writer.root, destination);
    if (!(await pathExists(fullPath))) return snapshot;

    for (const path of await listFilesRecursive(fullPath)) {
      const content = await writer.read(`${destination}/${path}`);
      if (content !== undefined) snapshot.set(path, content);
    }
    return snapshot;
  }

  async function copyBundle(
    bundle: FeatureBundle,
    writer: ProjectWriter,
    destination: string,
  ): Promise<void> {
    const previous = await snapshotDestination(writer, destination);
    await writer.removeTree(destination);

    for (const file of bundle.files) {
      const content = await readFile(join(bundle.sourceDir, file.path));
      await writer.write(`${destination}/${file.path}`, content, {
        mode: file.mode,
        previous: previous.get(file.path),
      });
    }

    const dropped = [...previous.keys()].filter((path) => !bundle.files.some((f) => f.path === path));
    if (dropped.length > 0) {
      logger.debug('Stale bundle files removed', {
        component: 'feature-provisioner',
        bundle: bundle.name,
        files: dropped,
      });
    }
  }

  return {
    inspectBundle,

    async provision(names, writer, provisionOptions) {
      const targetDir = provisionOptions?.targetDir ?? FEATURES_TARGET_DIR;

      const bundles: FeatureBundle[] = [];
      for (const name of names) {
        const bundle = await inspectBundle(name);
        if (!bundle.ok) {
          logger.error('Feature bundle missing', {
            component: 'feature-provisioner',
            bundle: name,
            reason: bundle.error.message,
          });
          return bundle;
        }
        bundles.push(bundle.value);
      }

      const provisioned: ProvisionedBundle[] = [];
      for (const bundle of bundles) {
        const destination = `${targetDir}/${bundle.name}`;
        await copyBundle(bundle, writer, destination);
        provisioned.push({ name: bundle.name, path: destination, files: bundle.files.length });

        logger.info('Feature bundle provisioned', {
          component: 'feature-provisioner',
          bundle: bundle.name,
          version: bundle.metadata.version,
          destination,
          dryRun: writer.dryRun,
        });
      }

      return ok(provisioned);
    },
  };
}
