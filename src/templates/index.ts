/**
 * Templates
 * Catalog of project templates and presets, and the token renderer.
 */

// Catalog
export {
  createTemplateCatalog,
  loadTemplateCatalog,
  PRESETS_FILE,
  TEMPLATE_FILES_DIR,
  TEMPLATE_INFO_FILE,
} from './catalog.js';
export type { TemplateCatalog, TemplateCatalogParams } from './catalog.js';

// Substitution
export { buildResolutionTable, featurePath, featureToken, languageVersionToken } from './resolution-table.js';
export { listTokens, renderTemplate } from './renderer.js';
export type { RenderOptions } from './renderer.js';

export type { FeatureInfo, PresetDescriptor, ResolutionTable, TemplateDescriptor } from './types.js';
