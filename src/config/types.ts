// ─── Enumerations ───────────────────────────────────────────────

/** Specification schema versions this build understands. */
export const SUPPORTED_SCHEMA_VERSIONS = ['0.1'] as const;
export type SchemaVersion = (typeof SUPPORTED_SCHEMA_VERSIONS)[number];

/** Providers the assistant CLI can be configured for. */
export const CLAUDE_PROVIDERS = ['anthropic', 'openai', 'bedrock', 'vertex', 'azure'] as const;
export type ClaudeProvider = (typeof CLAUDE_PROVIDERS)[number];

/** How the provisioned feature bundles are treated by version control. */
export const GIT_GENERATED_POLICIES = ['ignored', 'committed', 'linguist-generated'] as const;
export type GitGeneratedPolicy = (typeof GIT_GENERATED_POLICIES)[number];

// ─── Defaults ───────────────────────────────────────────────────

export const DEFAULT_TEMPLATE = 'generic';
export const DEFAULT_WORKSPACE_DIR = './project';
export const DEFAULT_CLAUDE_VERSION = 'latest';
export const DEFAULT_CLAUDE_PROVIDER: ClaudeProvider = 'anthropic';
export const DEFAULT_NO_PROXY = 'localhost,127.0.0.1,.local';
export const DEFAULT_GIT_GENERATED: GitGeneratedPolicy = 'ignored';
export const DEFAULT_DOCKER_IMAGE = 'mcr.microsoft.com/devcontainers/base:ubuntu';
/** File name of the document written into a generated project. */
export const SPEC_FILE_NAME = 'kiln.yaml';

// ─── Resolved Project Spec ──────────────────────────────────────

export interface RuntimeSpec {
  readonly language: string;
  readonly version: string;
  readonly packageManager: string;
  readonly tools: readonly string[];
}

export interface ProxySpec {
  readonly enabled: boolean;
  readonly http: string;
  readonly https: string;
  readonly noProxy: string;
}

export interface PluginDeclaration {
  readonly marketplace: string;
  readonly name: string;
  readonly activate: boolean;
}

export interface PluginActivationLists {
  /** Names to enable, short or qualified, in declaration order. */
  readonly activate: readonly string[];
  /** Names to disable, short or qualified, in declaration order. */
  readonly deactivate: readonly string[];
}

/**
 * Fully-defaulted configuration for one generation run.
 * Produced by the config resolver and deep-frozen.
 */
export interface ProjectSpec {
  readonly schemaVersion: SchemaVersion;
  readonly name: string;
  readonly template: string;
  readonly workspace: { readonly dir: string };
  readonly docker: { readonly image: string; readonly buildArgs: readonly string[] };
  /** Null when neither the template nor the document declares a language runtime. */
  readonly runtime: RuntimeSpec | null;
  readonly claude: {
    readonly version: string;
    readonly provider: ClaudeProvider;
    readonly models: Readonly<Record<string, string>>;
  };
  readonly proxy: ProxySpec;
  readonly marketplaces: Readonly<Record<string, { readonly url: string }>>;
  readonly plugins: readonly PluginDeclaration[];
  /** Feature bundle names to provision, in order. */
  readonly features: readonly string[];
  readonly pluginActivation: PluginActivationLists;
  readonly git: { readonly generated: GitGeneratedPolicy };
}

// ─── Normalized Document ────────────────────────────────────────

/**
 * Version-independent view of a specification document.
 * Each schema version's parser produces one; absent fields stay undefined
 * so the resolver can tell explicit values from defaults.
 */
export interface NormalizedDocument {
  name: string;
  template?: string;
  workspaceDir?: string;
  docker: { image: string; buildArgs?: string[] };
  runtime?: {
    language?: string;
    version?: string;
    packageManager?: string;
    tools?: string[];
  };
  claude?: {
    version?: string;
    provider?: ClaudeProvider;
    models?: Record<string, string>;
  };
  proxy?: {
    enabled?: boolean;
    http?: string;
    https?: string;
    noProxy?: string;
  };
  marketplaces?: Record<string, { url: string }>;
  plugins?: PluginDeclaration[];
  features?: string[];
  gitGenerated?: GitGeneratedPolicy;
}

// ─── Overrides ──────────────────────────────────────────────────

/** Values supplied explicitly by the caller (e.g. CLI flags). They win over everything. */
export interface SpecOverrides {
  template?: string;
  workspaceDir?: string;
  langVersion?: string;
  claudeVersion?: string;
  claudeProvider?: string;
  claudeModels?: Record<string, string>;
  httpProxy?: string;
  httpsProxy?: string;
  noProxy?: string;
  proxyEnabled?: boolean;
  features?: string[];
  activatePlugins?: string[];
  deactivatePlugins?: string[];
}

// ─── Init Input ─────────────────────────────────────────────────

/** Flags accepted by `init` when a document is built rather than read. */
export interface InitDocumentInput {
  name: string;
  /** Explicit template; omitted when a preset chooses it. */
  template?: string;
  /** Base image, usually the template's suggested image. */
  image?: string;
  workspaceDir?: string;
  langVersion?: string;
  claudeVersion?: string;
  claudeProvider?: string;
  httpProxy?: string;
  httpsProxy?: string;
  noProxy?: string;
}
