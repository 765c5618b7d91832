/**
 * Template Catalog
 * Loads template descriptors (`templates/<name>/template-info.yaml`) and
 * presets (`presets.yaml`) from an assets root, and serves template files.
 */
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import type { z } from 'zod';

import { TemplateNotFoundError } from '@/core/errors.js';
import { listFilesRecursive, pathExists } from '@/core/fs.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { ConfigError, parseSpecDocument, readTextFile } from '@/config/loader.js';
import { presetsFileSchema, templateInfoSchema } from '@/config/schema.js';
import { toValidationIssues } from '@/config/versions.js';
import type { Logger } from '@/observability/logger.js';

import type { PresetDescriptor, TemplateDescriptor } from './types.js';

export const TEMPLATE_INFO_FILE = 'template-info.yaml';
export const TEMPLATE_FILES_DIR = 'files';
export const PRESETS_FILE = 'presets.yaml';

// ─── Catalog Interface ──────────────────────────────────────────

export interface TemplateCatalog {
  /** Assets root the catalog was built from. */
  readonly root: string;

  /** All templates, sorted by name. */
  listTemplates(): TemplateDescriptor[];

  /** Get a template by name. Returns undefined if not found. */
  getTemplate(name: string): TemplateDescriptor | undefined;

  /** Get a template by name, failing with TemplateNotFoundError. */
  requireTemplate(name: string): Result<TemplateDescriptor, TemplateNotFoundError>;

  /** All presets, sorted by name. */
  listPresets(): PresetDescriptor[];

  /** Get a preset by name. Returns undefined if not found. */
  getPreset(name: string): PresetDescriptor | undefined;

  /** Renderable files of a template as sorted `/`-separated relative paths. */
  listTemplateFiles(name: string): Promise<string[]>;

  /** Raw text of one renderable template file. */
  readTemplateFile(name: string, relativePath: string): Promise<string>;
}

export interface TemplateCatalogParams {
  root: string;
  templates: readonly TemplateDescriptor[];
  presets: readonly PresetDescriptor[];
}

/**
 * Create a catalog over already-loaded descriptors.
 * Template files are read lazily from `<root>/templates/<name>/files`.
 */
export function createTemplateCatalog(params: TemplateCatalogParams): TemplateCatalog {
  const templates = new Map(
    [...params.templates].sort((a, b) => a.name.localeCompare(b.name)).map((t) => [t.name, t]),
  );
  const presets = new Map(
    [...params.presets].sort((a, b) => a.name.localeCompare(b.name)).map((p) => [p.name, p]),
  );

  function filesDir(name: string): string {
    return join(params.root, 'templates', name, TEMPLATE_FILES_DIR);
  }

  return {
    root: params.root,

    listTemplates: () => [...templates.values()],

    getTemplate: (name) => templates.get(name),

    requireTemplate(name) {
      const template = templates.get(name);
      if (!template) {
        return err(new TemplateNotFoundError(name, [...templates.keys()]));
      }
      return ok(template);
    },

    listPresets: () => [...presets.values()],

    getPreset: (name) => presets.get(name),

    async listTemplateFiles(name) {
      const dir = filesDir(name);
      if (!(await pathExists(dir))) return [];
      return listFilesRecursive(dir);
    },

    readTemplateFile: (name, relativePath) => readFile(join(filesDir(name), relativePath), 'utf-8'),
  };
}

// ─── Loading ────────────────────────────────────────────────────

async function readYaml<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<Result<z.output<S>, ConfigError>> {
  const content = await readTextFile(filePath);
  if (!content.ok) return content;

  const parsed = parseSpecDocument(content.value, filePath);
  if (!parsed.ok) return parsed;

  const validation = schema.safeParse(parsed.value);
  if (!validation.success) {
    return err(
      new ConfigError(`Invalid catalog file: ${filePath}`, {
        filePath,
        issues: toValidationIssues(validation.error),
      }),
    );
  }
  return ok(validation.data);
}

async function loadTemplate(
  root: string,
  dirName: string,
): Promise<Result<TemplateDescriptor, ConfigError>> {
  const info = await readYaml(join(root, 'templates', dirName, TEMPLATE_INFO_FILE), templateInfoSchema);
  if (!info.ok) return info;

  const data = info.value;
  if (data.name !== dirName) {
    return err(
      new ConfigError(`Template directory "${dirName}" declares name "${data.name}"`, {
        directory: dirName,
        declaredName: data.name,
      }),
    );
  }

  return ok({
    name: data.name,
    description: data.description,
    version: data.version,
    language: data.language ?? null,
    packageManager: data.package_manager ?? null,
    image: data.image ?? null,
    langVersionDefault: data.lang_version_default,
    supportedVersions: data.supported_versions,
    features: data.features,
  });
}

async function loadPresets(root: string): Promise<Result<PresetDescriptor[], ConfigError>> {
  const presetsPath = join(root, PRESETS_FILE);
  if (!(await pathExists(presetsPath))) return ok([]);

  const file = await readYaml(presetsPath, presetsFileSchema);
  if (!file.ok) return file;

  return ok(
    Object.entries(file.value.presets).map(([name, preset]) => ({
      name,
      description: preset.description,
      template: preset.template,
      langVersion: preset.lang_version,
      features: preset.features,
      plugins: preset.plugins,
    })),
  );
}

/**
 * Load the catalog from an assets root containing `templates/` and
 * (optionally) `presets.yaml`. Every descriptor is validated; presets
 * referencing unknown templates are rejected.
 */
export async function loadTemplateCatalog(params: {
  root: string;
  logger: Logger;
}): Promise<Result<TemplateCatalog, ConfigError>> {
  const { root, logger } = params;
  const templatesDir = join(root, 'templates');

  let dirNames: string[];
  try {
    const entries = await readdir(templatesDir, { withFileTypes: true });
    dirNames = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  } catch (error) {
    return err(
      new ConfigError(`Templates directory not readable: ${templatesDir}`, {
        templatesDir,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const templates: TemplateDescriptor[] = [];
  for (const dirName of dirNames) {
    const template = await loadTemplate(root, dirName);
    if (!template.ok) return template;
    templates.push(template.value);
  }

  const presets = await loadPresets(root);
  if (!presets.ok) return presets;

  const known = new Set(templates.map((t) => t.name));
  for (const preset of presets.value) {
    if (!known.has(preset.template)) {
      return err(
        new ConfigError(`Preset "${preset.name}" references unknown template "${preset.template}"`, {
          preset: preset.name,
          template: preset.template,
        }),
      );
    }
  }

  logger.debug('Template catalog loaded', {
    component: 'template-catalog',
    root,
    templates: templates.length,
    presets: presets.value.length,
  });

  return ok(createTemplateCatalog({ root, templates, presets: presets.value }));
}
