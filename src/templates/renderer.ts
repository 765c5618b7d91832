/**
 * Template renderer — substitutes `{{TOKEN}}` spans from a resolution table.
 *
 * Rendering is a single pass over the input: substituted values are never
 * scanned again, and a token with no table entry fails the whole render.
 */
import { TemplateRenderError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { ResolutionTable } from './types.js';

const TOKEN_PATTERN = /\{\{([A-Za-z_][A-Za-z0-9_]*)\}\}/g;

/** Unique token names in order of first appearance. */
export function listTokens(text: string): string[] {
  const tokens = new Set<string>();
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const token = match[1];
    if (token !== undefined) tokens.add(token);
  }
  return [...tokens];
}

export interface RenderOptions {
  /** Template path, used in error messages. */
  source?: string;
}

export function renderTemplate(
  text: string,
  table: ResolutionTable,
  options?: RenderOptions,
): Result<string, TemplateRenderError> {
  const missing = listTokens(text).filter((token) => !table.has(token));
  if (missing.length > 0) {
    return err(new TemplateRenderError(missing, options?.source));
  }

  return ok(
    text.replace(TOKEN_PATTERN, (match, token: string) => table.get(token) ?? match),
  );
}
