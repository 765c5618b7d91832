/**
 * Builds a v0.1 specification document from `init` flags, so new projects
 * go through the same resolver path as documents read from disk.
 */
import { stringify } from 'yaml';

import type { InitDocumentInput } from './types.js';
import { DEFAULT_DOCKER_IMAGE } from './types.js';

/** Drop undefined members so the emitted document only carries what was given. */
function compact(record: Record<string, unknown>): Record<string, unknown> | undefined {
  const entries = Object.entries(record).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function buildSpecDocument(input: InitDocumentInput): Record<string, unknown> {
  const document: Record<string, unknown> = {
    version: '0.1',
    name: input.name,
    template: input.template,
    workspace: compact({ dir: input.workspaceDir }),
    docker: { image: input.image ?? DEFAULT_DOCKER_IMAGE },
    runtime: compact({ version: input.langVersion }),
    claude: compact({ version: input.claudeVersion, provider: input.claudeProvider }),
    proxy: compact({
      http: input.httpProxy,
      https: input.httpsProxy,
      no_proxy: input.noProxy,
    }),
  };
  return compact(document) ?? {};
}

/** Serialize a document the way it is written into a generated project. */
export function serializeSpecDocument(document: unknown): string {
  return stringify(document, { lineWidth: 0 });
}
