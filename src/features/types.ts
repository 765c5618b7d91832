import type { z } from 'zod';

import type { featureMetadataSchema } from './schema.js';

// ─── Bundle Metadata ────────────────────────────────────────────

/** Parsed `devcontainer-feature.json`. */
export type FeatureMetadata = z.infer<typeof featureMetadataSchema>;

export const FEATURE_METADATA_FILE = 'devcontainer-feature.json';
export const FEATURE_ENTRY_SCRIPT = 'install.sh';

/** Default location of provisioned bundles, relative to the project root. */
export const FEATURES_TARGET_DIR = '.devcontainer/features';

// ─── Bundles ────────────────────────────────────────────────────

export interface BundleFile {
  /** `/`-separated path relative to the bundle directory. */
  path: string;
  /** Permission bits of the source file. */
  mode: number;
}

/** A bundle that passed inspection and can be copied. */
export interface FeatureBundle {
  name: string;
  sourceDir: string;
  metadata: FeatureMetadata;
  files: BundleFile[];
}

export interface ProvisionOptions {
  /** Target directory relative to the writer root. Defaults to `.devcontainer/features`. */
  targetDir?: string;
}

export interface ProvisionedBundle {
  name: string;
  /** Bundle directory relative to the writer root. */
  path: string;
  files: number;
}
