// Core module — errors, Result and shared branded types
export {
  KilnError,
  ValidationError,
  SchemaVersionError,
  UnsupportedVersionError,
  TemplateNotFoundError,
  TemplateRenderError,
  FeatureBundleMissingError,
  PluginRegistryError,
  SettingsParseError,
  RepositoryOperationError,
  GenerationError,
} from './errors.js';
export type { GenerationStep, ValidationIssue } from './errors.js';
export type { Result } from './result.js';
export { ok, err, isOk, isErr, tryAsync, unwrap } from './result.js';
export type { PluginId } from './types.js';
export { pluginId, parsePluginId, deepFreeze } from './types.js';
