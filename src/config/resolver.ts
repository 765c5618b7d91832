/**
 * Config resolver — turns a raw specification document, an optional preset
 * and explicit overrides into one immutable ProjectSpec.
 *
 * Precedence, lowest first: template defaults → preset → document → overrides.
 */
import type { z } from 'zod';

import type { KilnError, ValidationIssue } from '@/core/errors.js';
import { UnsupportedVersionError, ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { deepFreeze, pluginId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TemplateCatalog } from '@/templates/catalog.js';
import { featureToken } from '@/templates/resolution-table.js';
import type { PresetDescriptor, TemplateDescriptor } from '@/templates/types.js';

import { specOverridesSchema } from './schema.js';
import type {
  NormalizedDocument,
  PluginActivationLists,
  ProjectSpec,
  ProxySpec,
  RuntimeSpec,
  SchemaVersion,
  SpecOverrides,
} from './types.js';
import {
  DEFAULT_CLAUDE_PROVIDER,
  DEFAULT_CLAUDE_VERSION,
  DEFAULT_GIT_GENERATED,
  DEFAULT_NO_PROXY,
  DEFAULT_TEMPLATE,
  DEFAULT_WORKSPACE_DIR,
} from './types.js';
import { DOCUMENT_PARSERS, detectSchemaVersion, toValidationIssues } from './versions.js';

// ─── Types ──────────────────────────────────────────────────────

export interface ResolveInput {
  /** Raw document as parsed from YAML/JSON. */
  document: unknown;
  /** Preset name from the catalog. */
  preset?: string;
  overrides?: SpecOverrides;
}

export interface ConfigResolver {
  resolve(input: ResolveInput): Result<ProjectSpec, KilnError>;
}

export interface ConfigResolverOptions {
  catalog: TemplateCatalog;
  logger: Logger;
}

type ValidOverrides = z.infer<typeof specOverridesSchema>;

interface ResolvedSources {
  version: SchemaVersion;
  document: NormalizedDocument;
  template: TemplateDescriptor;
  preset: PresetDescriptor | undefined;
  overrides: ValidOverrides;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Read `template` from a document that may have failed validation. */
function rawTemplateName(raw: unknown): string | undefined {
  if (raw === null || typeof raw !== 'object') return undefined;
  const value = 'template' in raw ? raw.template : undefined;
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/** Remove duplicates, keeping the first occurrence. */
function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/** A requested version needs a language to attach to. */
function runtimeIssues(
  document: NormalizedDocument,
  template: TemplateDescriptor,
  overrides: ValidOverrides,
): ValidationIssue[] {
  if (document.runtime?.language ?? template.language) return [];

  const message = `Template '${template.name}' declares no language runtime`;
  const issues: ValidationIssue[] = [];
  if (document.runtime?.version !== undefined) issues.push({ path: 'runtime.version', message });
  if (overrides.langVersion !== undefined) issues.push({ path: 'overrides.langVersion', message });
  return issues;
}

/** Bundles whose names reduce to the same `FEATURES_*` token. */
function featureTokenIssues(features: readonly string[]): ValidationIssue[] {
  const owners = new Map<string, string>();
  const issues: ValidationIssue[] = [];
  for (const feature of features) {
    const token = featureToken(feature);
    const owner = owners.get(token);
    if (owner === undefined) {
      owners.set(token, feature);
    } else {
      issues.push({
        path: 'features',
        message: `Features '${owner}' and '${feature}' both map to token ${token}`,
      });
    }
  }
  return issues;
}

function mergeRuntime(sources: ResolvedSources): RuntimeSpec | null {
  const { document, template, preset, overrides } = sources;
  const language = document.runtime?.language ?? template.language;
  if (!language) return null;

  return {
    language,
    version:
      overrides.langVersion ??
      document.runtime?.version ??
      preset?.langVersion ??
      template.langVersionDefault,
    packageManager: document.runtime?.packageManager ?? template.packageManager ?? '',
    tools: document.runtime?.tools ?? [],
  };
}

function mergeProxy(sources: ResolvedSources): ProxySpec {
  const { document, overrides } = sources;
  const http = overrides.httpProxy ?? document.proxy?.http ?? '';
  const https = overrides.httpsProxy ?? document.proxy?.https ?? '';
  return {
    enabled: overrides.proxyEnabled ?? document.proxy?.enabled ?? (http !== '' || https !== ''),
    http,
    https,
    noProxy: overrides.noProxy ?? document.proxy?.noProxy ?? DEFAULT_NO_PROXY,
  };
}

function mergeActivation(sources: ResolvedSources): PluginActivationLists {
  const { document, preset, overrides } = sources;
  const declared = document.plugins ?? [];
  const fromDocument = (activate: boolean): string[] =>
    declared.filter((p) => p.activate === activate).map((p) => pluginId(p.name, p.marketplace));

  return {
    activate: unique(
      overrides.activatePlugins ?? [...(preset?.plugins?.activate ?? []), ...fromDocument(true)],
    ),
    deactivate: unique(
      overrides.deactivatePlugins ?? [
        ...(preset?.plugins?.deactivate ?? []),
        ...fromDocument(false),
      ],
    ),
  };
}

function merge(sources: ResolvedSources): ProjectSpec {
  const { version, document, template, preset, overrides } = sources;

  return {
    schemaVersion: version,
    name: document.name,
    template: template.name,
    workspace: { dir: overrides.workspaceDir ?? document.workspaceDir ?? DEFAULT_WORKSPACE_DIR },
    docker: { image: document.docker.image, buildArgs: document.docker.buildArgs ?? [] },
    runtime: mergeRuntime(sources),
    claude: {
      version: overrides.claudeVersion ?? document.claude?.version ?? DEFAULT_CLAUDE_VERSION,
      provider: overrides.claudeProvider ?? document.claude?.provider ?? DEFAULT_CLAUDE_PROVIDER,
      models: overrides.claudeModels ?? document.claude?.models ?? {},
    },
    proxy: mergeProxy(sources),
    marketplaces: document.marketplaces ?? {},
    plugins: document.plugins ?? [],
    features: unique(
      overrides.features ??
        document.features ??
        preset?.features ??
        template.features.map((feature) => feature.name),
    ),
    pluginActivation: mergeActivation(sources),
    git: { generated: document.gitGenerated ?? DEFAULT_GIT_GENERATED },
  };
}

// ─── Resolver ───────────────────────────────────────────────────

/**
 * Create a config resolver backed by a template catalog.
 */
export function createConfigResolver(options: ConfigResolverOptions): ConfigResolver {
  const { catalog } = options;
  const logger = options.logger.child({ component: 'config-resolver' });

  return {
    resolve(input) {
      // The schema version gates everything else.
      const version = detectSchemaVersion(input.document);
      if (!version.ok) return version;

      const issues: ValidationIssue[] = [];

      const parsed = DOCUMENT_PARSERS[version.value](input.document);
      if (!parsed.ok) issues.push(...parsed.issues);

      const overridesResult = specOverridesSchema.safeParse(input.overrides ?? {});
      if (!overridesResult.success) {
        issues.push(...toValidationIssues(overridesResult.error, 'overrides'));
      }

      let preset: PresetDescriptor | undefined;
      if (input.preset !== undefined) {
        preset = catalog.getPreset(input.preset);
        if (!preset) {
          const available = catalog.listPresets().map((p) => p.name);
          issues.push({
            path: 'preset',
            message: `Unknown preset '${input.preset}'. Available: ${available.join(', ') || 'none'}`,
          });
        }
      }

      const overrideTemplate = input.overrides?.template;
      const templateName =
        overrideTemplate ??
        rawTemplateName(input.document) ??
        preset?.template ??
        DEFAULT_TEMPLATE;
      const template = catalog.requireTemplate(templateName);
      if (!template.ok) {
        const available = catalog.listTemplates().map((t) => t.name);
        issues.push({
          path: overrideTemplate !== undefined ? 'overrides.template' : 'template',
          message: `Unknown template '${templateName}'. Available: ${available.join(', ') || 'none'}`,
        });
      }

      if (parsed.ok && overridesResult.success && template.ok) {
        issues.push(...runtimeIssues(parsed.document, template.value, overridesResult.data));
      }

      if (issues.length > 0 || !parsed.ok || !overridesResult.success || !template.ok) {
        logger.debug('Specification rejected', { component: 'config-resolver', issues });
        return err(new ValidationError(issues));
      }

      const spec = merge({
        version: version.value,
        document: parsed.document,
        template: template.value,
        preset,
        overrides: overridesResult.data,
      });

      const collisions = featureTokenIssues(spec.features);
      if (collisions.length > 0) {
        logger.debug('Specification rejected', { component: 'config-resolver', issues: collisions });
        return err(new ValidationError(collisions));
      }

      const supported = template.value.supportedVersions;
      if (spec.runtime && supported.length > 0 && !supported.includes(spec.runtime.version)) {
        return err(new UnsupportedVersionError(spec.template, spec.runtime.version, supported));
      }

      logger.debug('Specification resolved', {
        component: 'config-resolver',
        project: spec.name,
        template: spec.template,
        preset: preset?.name,
        features: spec.features,
      });

      return ok(deepFreeze(spec));
    },
  };
}
