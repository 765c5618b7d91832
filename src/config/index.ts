// ─── Types ──────────────────────────────────────────────────────
export type {
  ClaudeProvider,
  GitGeneratedPolicy,
  InitDocumentInput,
  NormalizedDocument,
  PluginActivationLists,
  PluginDeclaration,
  ProjectSpec,
  ProxySpec,
  RuntimeSpec,
  SchemaVersion,
  SpecOverrides,
} from './types.js';
export {
  CLAUDE_PROVIDERS,
  DEFAULT_DOCKER_IMAGE,
  GIT_GENERATED_POLICIES,
  SPEC_FILE_NAME,
  SUPPORTED_SCHEMA_VERSIONS,
} from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  presetsFileSchema,
  specDocumentV01Schema,
  specOverridesSchema,
  templateInfoSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  ConfigError,
  loadSpecDocument,
  parseSpecDocument,
  readTextFile,
  resolveEnvVars,
} from './loader.js';
export { detectSchemaVersion } from './versions.js';

// ─── Resolver ───────────────────────────────────────────────────
export { createConfigResolver } from './resolver.js';
export type { ConfigResolver, ConfigResolverOptions, ResolveInput } from './resolver.js';
export { buildSpecDocument, serializeSpecDocument } from './document-builder.js';

// ─── Settings ───────────────────────────────────────────────────
export { BUNDLED_ASSETS_ROOT, loadKilnSettings } from './settings.js';
export type { KilnSettings } from './settings.js';
