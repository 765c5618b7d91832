export { createFeatureProvisioner } from './provisioner.js';
export type { FeatureProvisioner, FeatureProvisionerOptions } from './provisioner.js';
export { featureMetadataSchema } from './schema.js';
export type {
  BundleFile,
  FeatureBundle,
  FeatureMetadata,
  ProvisionOptions,
  ProvisionedBundle,
} from './types.js';
export { FEATURES_TARGET_DIR, FEATURE_ENTRY_SCRIPT, FEATURE_METADATA_FILE } from './types.js';
