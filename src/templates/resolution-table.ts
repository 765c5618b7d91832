/**
 * Resolution table — every substitution token a template may use, derived
 * once from a ProjectSpec.
 */
import type { ProjectSpec } from '@/config/types.js';

import type { ResolutionTable } from './types.js';

/** Language name → the token carrying its version. */
const LANGUAGE_VERSION_TOKENS: Readonly<Record<string, string>> = {
  python: 'PYTHON_VERSION',
  node: 'NODE_VERSION',
  nodejs: 'NODE_VERSION',
  javascript: 'NODE_VERSION',
  rust: 'RUST_VERSION',
  go: 'GO_VERSION',
  golang: 'GO_VERSION',
};

/** Version token for a language, or undefined when the language has none. */
export function languageVersionToken(language: string): string | undefined {
  return Object.hasOwn(LANGUAGE_VERSION_TOKENS, language)
    ? LANGUAGE_VERSION_TOKENS[language]
    : undefined;
}

/** `claude-code` → `FEATURES_CLAUDE_CODE`. */
export function featureToken(bundle: string): string {
  return `FEATURES_${bundle.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}`;
}

/** Path of a provisioned bundle relative to `.devcontainer/`. */
export function featurePath(bundle: string): string {
  return `./features/${bundle}`;
}

function sortedRecord(record: Readonly<Record<string, string>>): Record<string, string> {
  return Object.fromEntries(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** JSON with nested lines shifted so the value sits under a key indented by `indent`. */
function indentedJson(value: unknown, indent: number): string {
  return JSON.stringify(value, null, 2).split('\n').join(`\n${' '.repeat(indent)}`);
}

interface ProxyValues {
  http: string;
  https: string;
  noProxy: string;
}

/**
 * Options passed to the bundles Kiln ships; other bundles get none.
 * Feature options are strings or booleans, so maps and lists travel as JSON text.
 */
function featureOptions(bundle: string, spec: ProjectSpec, proxy: ProxyValues): Record<string, unknown> {
  switch (bundle) {
    case 'proxy':
      return {
        http_proxy: proxy.http,
        https_proxy: proxy.https,
        no_proxy: proxy.noProxy,
        enabled: spec.proxy.enabled,
      };
    case 'claude-code':
      return {
        version: spec.claude.version,
        provider: spec.claude.provider,
        models: JSON.stringify(sortedRecord(spec.claude.models)),
        http_proxy: proxy.http,
        https_proxy: proxy.https,
      };
    case 'plugin-manager':
      return {
        activate_plugins: JSON.stringify(spec.pluginActivation.activate),
        deactivate_plugins: JSON.stringify(spec.pluginActivation.deactivate),
      };
    default:
      return {};
  }
}

/**
 * Build the token table for a spec. Insertion order is fixed; proxy URLs
 * are empty when the proxy is disabled.
 */
export function buildResolutionTable(spec: ProjectSpec): ResolutionTable {
  const table = new Map<string, string>();
  const runtime = spec.runtime;
  const proxy: ProxyValues = {
    http: spec.proxy.enabled ? spec.proxy.http : '',
    https: spec.proxy.enabled ? spec.proxy.https : '',
    noProxy: spec.proxy.noProxy,
  };

  // Project
  table.set('PROJECT_NAME', spec.name);
  table.set('TEMPLATE_NAME', spec.template);
  table.set('WORKSPACE_DIR', spec.workspace.dir);
  table.set('DOCKER_IMAGE', spec.docker.image);
  table.set('DOCKER_BUILD_ARGS', spec.docker.buildArgs.map((arg) => `ARG ${arg}`).join('\n'));

  // Language runtime
  table.set('LANGUAGE', runtime?.language ?? '');
  table.set('LANG_VERSION', runtime?.version ?? '');
  table.set('PACKAGE_MANAGER', runtime?.packageManager ?? '');
  table.set('RUNTIME_TOOLS', JSON.stringify(runtime?.tools ?? []));
  if (runtime) {
    const versionToken = languageVersionToken(runtime.language);
    if (versionToken) table.set(versionToken, runtime.version);
  }

  // Feature bundles
  for (const bundle of spec.features) {
    table.set(featureToken(bundle), featurePath(bundle));
  }
  const features = Object.fromEntries(
    spec.features.map((bundle) => [featurePath(bundle), featureOptions(bundle, spec, proxy)]),
  );
  table.set('DEVCONTAINER_FEATURES', indentedJson(features, 2));
  table.set('FEATURE_INSTALL_ORDER', indentedJson(spec.features.map(featurePath), 2));

  // Assistant
  table.set('CLAUDE_VERSION', spec.claude.version);
  table.set('CLAUDE_PROVIDER', spec.claude.provider);
  table.set('CLAUDE_MODELS', JSON.stringify(sortedRecord(spec.claude.models)));
  table.set('CLAUDE_ACTIVATE_PLUGINS', JSON.stringify(spec.pluginActivation.activate));
  table.set('CLAUDE_DEACTIVATE_PLUGINS', JSON.stringify(spec.pluginActivation.deactivate));

  // Proxy
  table.set('HTTP_PROXY', proxy.http);
  table.set('HTTPS_PROXY', proxy.https);
  table.set('NO_PROXY', proxy.noProxy);
  table.set('PROXY_ENABLED', String(spec.proxy.enabled));

  return table;
}
