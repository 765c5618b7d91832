/**
 * Zod schemas for validating specification documents and the template catalog.
 * Document schemas mirror the on-disk (snake_case) layout; the parsers in
 * versions.ts convert them into NormalizedDocument.
 */
import { posix } from 'node:path';

import { z } from 'zod';

import { CLAUDE_PROVIDERS, GIT_GENERATED_POLICIES } from './types.js';

// ─── Shared ─────────────────────────────────────────────────────

export const claudeProviderSchema = z.enum(CLAUDE_PROVIDERS);

export const gitGeneratedSchema = z.enum(GIT_GENERATED_POLICIES);

const nonEmpty = (label: string): z.ZodString => z.string().trim().min(1, `${label} cannot be empty`);

/** Relative and inside the project: not absolute, never climbing above the root. */
export function isProjectRelativePath(value: string): boolean {
  if (value === '') return true;
  const path = value.replace(/\\/g, '/');
  if (posix.isAbsolute(path) || /^[A-Za-z]:/.test(path)) return false;
  const normalized = posix.normalize(path);
  return normalized !== '..' && !normalized.startsWith('../');
}

const workspaceDir = nonEmpty('Workspace directory').refine(isProjectRelativePath, {
  message: 'Workspace directory must be a relative path inside the project',
});

// ─── Specification Document v0.1 ───────────────────────────────

/**
 * Schema for a v0.1 specification document.
 * `version` is checked before this schema runs and is not part of it.
 * Optional sections accept `null` because an empty YAML mapping parses to null.
 */
export const specDocumentV01Schema = z.object({
  name: nonEmpty('Project name'),
  template: nonEmpty('Template name').optional(),
  workspace: z
    .object({
      dir: workspaceDir.optional(),
    })
    .nullish(),
  docker: z.object({
    image: nonEmpty('Docker image'),
    build_args: z.array(z.string().min(1)).optional(),
  }),
  claude: z
    .object({
      version: nonEmpty('Claude version').optional(),
      provider: claudeProviderSchema.optional(),
      models: z.record(z.string()).optional(),
    })
    .nullish(),
  runtime: z
    .object({
      language: nonEmpty('Runtime language').optional(),
      version: nonEmpty('Runtime version').optional(),
      package_manager: nonEmpty('Package manager').optional(),
      tools: z.array(z.string().min(1)).optional(),
    })
    .nullish(),
  proxy: z
    .object({
      enabled: z.boolean().optional(),
      http: z.string().optional(),
      https: z.string().optional(),
      no_proxy: z.string().optional(),
    })
    .nullish(),
  marketplaces: z
    .record(
      z.object({
        url: z.string().url('Marketplace URL must be a valid URL'),
      }),
    )
    .nullish(),
  plugins: z
    .array(
      z.object({
        marketplace: nonEmpty('Plugin marketplace'),
        name: nonEmpty('Plugin name'),
        activate: z.boolean().default(true),
      }),
    )
    .nullish(),
  features: z.array(nonEmpty('Feature name')).nullish(),
  git: z
    .object({
      generated: gitGeneratedSchema.optional(),
    })
    .nullish(),
});

export type SpecDocumentV01 = z.infer<typeof specDocumentV01Schema>;

// ─── Overrides ──────────────────────────────────────────────────

/** Schema for caller-supplied overrides. Validated with the same rules as document fields. */
export const specOverridesSchema = z.object({
  template: nonEmpty('Template name').optional(),
  workspaceDir: workspaceDir.optional(),
  langVersion: nonEmpty('Language version').optional(),
  claudeVersion: nonEmpty('Claude version').optional(),
  claudeProvider: claudeProviderSchema.optional(),
  claudeModels: z.record(z.string()).optional(),
  httpProxy: z.string().optional(),
  httpsProxy: z.string().optional(),
  noProxy: z.string().optional(),
  proxyEnabled: z.boolean().optional(),
  features: z.array(nonEmpty('Feature name')).optional(),
  activatePlugins: z.array(nonEmpty('Plugin name')).optional(),
  deactivatePlugins: z.array(nonEmpty('Plugin name')).optional(),
});

// ─── Template Catalog ───────────────────────────────────────────

/** Schema for `templates/<name>/template-info.yaml`. */
export const templateInfoSchema = z.object({
  name: nonEmpty('Template name'),
  description: z.string().default(''),
  version: nonEmpty('Template version'),
  language: z.string().min(1).nullish(),
  package_manager: z.string().min(1).nullish(),
  image: z.string().min(1).optional(),
  lang_version_default: z.string().default(''),
  supported_versions: z.array(z.string().min(1)).default([]),
  features: z
    .array(
      z.object({
        name: nonEmpty('Feature name'),
        description: z.string().default(''),
      }),
    )
    .default([]),
});

/** Schema for the `presets.yaml` catalog file. */
export const presetsFileSchema = z.object({
  presets: z.record(
    z.object({
      description: z.string().default(''),
      template: nonEmpty('Preset template'),
      lang_version: z.string().min(1).optional(),
      features: z.array(nonEmpty('Feature name')).optional(),
      plugins: z
        .object({
          activate: z.array(nonEmpty('Plugin name')).default([]),
          deactivate: z.array(nonEmpty('Plugin name')).default([]),
        })
        .optional(),
    }),
  ),
});
