/**
 * Schema version dispatch.
 *
 * The `version` field of a document names its schema (not the project's
 * version). It is read before anything else; each supported version has
 * its own parser producing a NormalizedDocument.
 */
import type { z } from 'zod';

import { SchemaVersionError } from '@/core/errors.js';
import type { ValidationIssue } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { specDocumentV01Schema } from './schema.js';
import type { SpecDocumentV01 } from './schema.js';
import { SUPPORTED_SCHEMA_VERSIONS } from './types.js';
import type { NormalizedDocument, SchemaVersion } from './types.js';

// ─── Detection ──────────────────────────────────────────────────

function isSchemaVersion(value: string): value is SchemaVersion {
  return SUPPORTED_SCHEMA_VERSIONS.some((supported) => supported === value);
}

/**
 * Read the schema version of a raw document.
 * A bare YAML number (`version: 0.1`) is accepted as its string form.
 */
export function detectSchemaVersion(document: unknown): Result<SchemaVersion, SchemaVersionError> {
  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    return err(new SchemaVersionError(undefined, SUPPORTED_SCHEMA_VERSIONS));
  }

  const raw = 'version' in document ? document.version : undefined;
  const version = typeof raw === 'number' ? String(raw) : raw;
  if (typeof version !== 'string' || !isSchemaVersion(version)) {
    return err(new SchemaVersionError(raw, SUPPORTED_SCHEMA_VERSIONS));
  }
  return ok(version);
}

// ─── Parsers ────────────────────────────────────────────────────

/** Outcome of a version-specific parse: a document, or the issues found. */
export type DocumentParseResult =
  | { readonly ok: true; readonly document: NormalizedDocument }
  | { readonly ok: false; readonly issues: ValidationIssue[] };

export type DocumentParser = (raw: unknown) => DocumentParseResult;

/** Convert Zod issues into dotted-path validation issues. */
export function toValidationIssues(error: z.ZodError, prefix = ''): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: [prefix, ...issue.path.map(String)].filter((part) => part !== '').join('.'),
    message: issue.message,
  }));
}

function normalizeV01(doc: SpecDocumentV01): NormalizedDocument {
  return {
    name: doc.name,
    template: doc.template,
    workspaceDir: doc.workspace?.dir,
    docker: { image: doc.docker.image, buildArgs: doc.docker.build_args },
    runtime: doc.runtime
      ? {
          language: doc.runtime.language,
          version: doc.runtime.version,
          packageManager: doc.runtime.package_manager,
          tools: doc.runtime.tools,
        }
      : undefined,
    claude: doc.claude
      ? {
          version: doc.claude.version,
          provider: doc.claude.provider,
          models: doc.claude.models,
        }
      : undefined,
    proxy: doc.proxy
      ? {
          enabled: doc.proxy.enabled,
          http: doc.proxy.http,
          https: doc.proxy.https,
          noProxy: doc.proxy.no_proxy,
        }
      : undefined,
    marketplaces: doc.marketplaces ?? undefined,
    plugins: doc.plugins ?? undefined,
    features: doc.features ?? undefined,
    gitGenerated: doc.git?.generated,
  };
}

/**
 * Marketplace references are checked against the raw value so they are
 * reported even when unrelated fields fail schema validation.
 */
function checkMarketplaceReferences(raw: unknown): ValidationIssue[] {
  if (raw === null || typeof raw !== 'object') return [];
  const plugins = 'plugins' in raw ? raw.plugins : undefined;
  const marketplaces = 'marketplaces' in raw ? raw.marketplaces : undefined;
  if (!Array.isArray(plugins)) return [];

  const known =
    marketplaces !== null && typeof marketplaces === 'object'
      ? new Set(Object.keys(marketplaces))
      : new Set<string>();

  const issues: ValidationIssue[] = [];
  plugins.forEach((plugin: unknown, index) => {
    if (plugin === null || typeof plugin !== 'object') return;
    const marketplace = 'marketplace' in plugin ? plugin.marketplace : undefined;
    const name = 'name' in plugin ? plugin.name : undefined;
    if (typeof marketplace === 'string' && marketplace !== '' && !known.has(marketplace)) {
      issues.push({
        path: `plugins.${index}.marketplace`,
        message: `Plugin '${String(name)}' references unknown marketplace '${marketplace}'`,
      });
    }
  });
  return issues;
}

const parseV01: DocumentParser = (raw) => {
  const validation = specDocumentV01Schema.safeParse(raw);
  const issues = [
    ...(validation.success ? [] : toValidationIssues(validation.error)),
    ...checkMarketplaceReferences(raw),
  ];
  if (issues.length > 0 || !validation.success) {
    return { ok: false, issues };
  }
  return { ok: true, document: normalizeV01(validation.data) };
};

/** One parser per supported schema version. */
export const DOCUMENT_PARSERS: Readonly<Record<SchemaVersion, DocumentParser>> = {
  '0.1': parseV01,
};
