/**
 * Raw specification documents as they look after YAML parsing.
 */

/** Smallest valid v0.1 document. */
export function createMinimalDocument(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    version: '0.1',
    name: 'demo',
    docker: { image: 'mcr.microsoft.com/devcontainers/base:ubuntu' },
    ...overrides,
  };
}

/** A v0.1 document using every section. */
export function createFullDocument(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    version: '0.1',
    name: 'analytics',
    template: 'python',
    workspace: { dir: './src' },
    docker: {
      image: 'mcr.microsoft.com/devcontainers/python:3.12',
      build_args: ['PIP_INDEX_URL'],
    },
    claude: {
      version: '1.0.30',
      provider: 'bedrock',
      models: { small: 'haiku', large: 'opus' },
    },
    runtime: {
      language: 'python',
      version: '3.13',
      package_manager: 'pip',
      tools: ['ruff', 'pytest'],
    },
    proxy: {
      http: 'http://proxy.internal:3128',
      https: 'http://proxy.internal:3128',
      no_proxy: 'localhost,.corp',
    },
    marketplaces: {
      official: { url: 'https://plugins.example.com/official' },
    },
    plugins: [
      { marketplace: 'official', name: 'linter' },
      { marketplace: 'official', name: 'formatter', activate: false },
    ],
    features: ['claude-code', 'proxy'],
    git: { generated: 'committed' },
    ...overrides,
  };
}
