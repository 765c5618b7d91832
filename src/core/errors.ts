/**
 * Base error class for all Kiln errors.
 * Extends Error with a machine-readable code, a process exit code, and structured context.
 */
export class KilnError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    exitCode?: number;
    cause?: unknown;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'KilnError';
    this.code = params.code;
    this.exitCode = params.exitCode ?? 1;
    this.context = params.context;
  }
}

/** A single field-level violation found while validating a specification. */
export interface ValidationIssue {
  /** Dotted path of the offending field, e.g. `claude.provider`. */
  path: string;
  message: string;
}

/** Thrown when a specification document fails validation. Carries every violation found. */
export class ValidationError extends KilnError {
  public readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const fields = issues.map((issue) => issue.path || '(root)');
    super({
      message: `Specification validation failed: ${fields.join(', ')}`,
      code: 'VALIDATION_ERROR',
      exitCode: 2,
      context: { issues },
    });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Thrown when the document's schema `version` is missing or not recognized. */
export class SchemaVersionError extends KilnError {
  constructor(version: unknown, supported: readonly string[]) {
    const shown = typeof version === 'string' ? `'${version}'` : String(version);
    super({
      message: `Unsupported schema version: ${shown}. Supported versions: ${supported.join(', ')}`,
      code: 'SCHEMA_VERSION_UNSUPPORTED',
      exitCode: 2,
      context: { version, supported },
    });
    this.name = 'SchemaVersionError';
  }
}

/** Thrown when the requested language version is not supported by the template. */
export class UnsupportedVersionError extends KilnError {
  constructor(template: string, version: string, supported: readonly string[]) {
    super({
      message: `Language version '${version}' is not supported by template '${template}'. Supported: ${supported.join(', ')}`,
      code: 'LANGUAGE_VERSION_UNSUPPORTED',
      exitCode: 2,
      context: { template, version, supported },
    });
    this.name = 'UnsupportedVersionError';
  }
}

/** Thrown when a template name does not exist in the catalog. */
export class TemplateNotFoundError extends KilnError {
  constructor(template: string, available: readonly string[]) {
    super({
      message: `Template not found: ${template}`,
      code: 'TEMPLATE_NOT_FOUND',
      exitCode: 2,
      context: { template, available },
    });
    this.name = 'TemplateNotFoundError';
  }
}

/** Thrown when a template references tokens that have no resolution-table entry. */
export class TemplateRenderError extends KilnError {
  public readonly token: string;

  constructor(missingTokens: readonly string[], source?: string) {
    const token = missingTokens[0] ?? '';
    const where = source ? ` in ${source}` : '';
    super({
      message: `Unresolved template token {{${token}}}${where}`,
      code: 'TEMPLATE_RENDER_ERROR',
      context: { token, missingTokens, source },
    });
    this.name = 'TemplateRenderError';
    this.token = token;
  }
}

/** Thrown when a referenced feature bundle cannot be found or is incomplete. */
export class FeatureBundleMissingError extends KilnError {
  public readonly bundle: string;

  constructor(bundle: string, reason: string) {
    super({
      message: `Feature bundle "${bundle}" is missing: ${reason}`,
      code: 'FEATURE_BUNDLE_MISSING',
      context: { bundle, reason },
    });
    this.name = 'FeatureBundleMissingError';
    this.bundle = bundle;
  }
}

/** Thrown when the installed-plugin registry exists but cannot be read. */
export class PluginRegistryError extends KilnError {
  constructor(registryPath: string, reason: string, cause?: unknown) {
    super({
      message: `Plugin registry at ${registryPath} is unreadable: ${reason}`,
      code: 'PLUGIN_REGISTRY_ERROR',
      cause,
      context: { registryPath },
    });
    this.name = 'PluginRegistryError';
  }
}

/** Thrown when an existing settings document is not a parseable JSON object. */
export class SettingsParseError extends KilnError {
  constructor(settingsPath: string, reason: string, cause?: unknown) {
    super({
      message: `Existing settings at ${settingsPath} cannot be parsed: ${reason}`,
      code: 'SETTINGS_PARSE_ERROR',
      cause,
      context: { settingsPath },
    });
    this.name = 'SettingsParseError';
  }
}

/** Thrown when a git subprocess exits non-zero or cannot be spawned. */
export class RepositoryOperationError extends KilnError {
  constructor(args: readonly string[], exitCode: number | null, stderr: string, cause?: unknown) {
    super({
      message: `git ${args.join(' ')} failed${exitCode === null ? '' : ` (exit ${exitCode})`}: ${stderr.trim() || 'no output'}`,
      code: 'REPOSITORY_OPERATION_ERROR',
      cause,
      context: { args, gitExitCode: exitCode, stderr },
    });
    this.name = 'RepositoryOperationError';
  }
}

/** Pipeline step names, in execution order. */
export type GenerationStep =
  | 'resolve'
  | 'render'
  | 'provision'
  | 'plugins'
  | 'settings'
  | 'marker'
  | 'repository';

/**
 * Wraps the error that stopped a generation run with the step it happened in.
 * Keeps the wrapped error's exit code.
 */
export class GenerationError extends KilnError {
  public readonly step: GenerationStep;
  public readonly reason: KilnError;

  constructor(step: GenerationStep, reason: KilnError) {
    super({
      message: reason.message,
      code: 'GENERATION_FAILED',
      exitCode: reason.exitCode,
      cause: reason,
      context: { step, reasonCode: reason.code, ...reason.context },
    });
    this.name = 'GenerationError';
    this.step = step;
    this.reason = reason;
  }
}
