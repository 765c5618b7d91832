// ─── Template Catalog ───────────────────────────────────────────

export interface FeatureInfo {
  /** Name of the feature bundle this entry provisions. */
  readonly name: string;
  readonly description: string;
}

/** Identity and defaults of one project template. */
export interface TemplateDescriptor {
  readonly name: string;
  readonly description: string;
  readonly version: string;
  /** Language runtime the template targets; null for language-agnostic templates. */
  readonly language: string | null;
  readonly packageManager: string | null;
  /** Base image suggested for new projects. */
  readonly image: string | null;
  readonly langVersionDefault: string;
  /** Empty means any version is accepted. */
  readonly supportedVersions: readonly string[];
  readonly features: readonly FeatureInfo[];
}

/** A named set of defaults resolved beneath explicit values. */
export interface PresetDescriptor {
  readonly name: string;
  readonly description: string;
  readonly template: string;
  readonly langVersion?: string;
  readonly features?: readonly string[];
  readonly plugins?: {
    readonly activate: readonly string[];
    readonly deactivate: readonly string[];
  };
}

// ─── Substitution ───────────────────────────────────────────────

/**
 * Token name → substituted value. Built once per ProjectSpec;
 * iteration order is insertion order and never depends on input ordering.
 */
export type ResolutionTable = ReadonlyMap<string, string>;
