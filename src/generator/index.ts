export { createGenerator } from './generator.js';
export type { Generator, GeneratorOptions } from './generator.js';
export type { GenerateRequest, GenerationResult } from './types.js';
export {
  DEFAULT_COMMIT_MESSAGE,
  GITIGNORE_TEMPLATE,
  README_TEMPLATE,
  SHARED_ASSETS_DIR,
} from './types.js';
