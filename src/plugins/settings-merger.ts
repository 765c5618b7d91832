/**
 * Settings Merger — persists an activation plan into the project-local
 * settings document. The activation map is replaced wholesale; every other
 * key keeps its exact text and position.
 */
import jsonc from 'jsonc-parser';
import type { FormattingOptions } from 'jsonc-parser';

import { SettingsParseError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { FileStatus, ProjectWriter } from '@/files/types.js';
import type { Logger } from '@/observability/logger.js';

import type { PluginActivationPlan } from './types.js';
import { ENABLED_PLUGINS_KEY } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Indentation of the first indented line, so edits match the user's layout. */
function detectFormatting(text: string): FormattingOptions {
  const indent = /^([ \t]+)\S/m.exec(text)?.[1];
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  if (indent?.startsWith('\t')) return { insertSpaces: false, tabSize: 1, eol };
  return { insertSpaces: true, tabSize: indent?.length ?? 2, eol };
}

/**
 * Merge a plan into existing settings text (undefined when there is none).
 *
 * A new document is 2-space JSON with a trailing newline. An existing one is
 * edited in place: only the `enabledPlugins` value changes, and every other
 * byte is kept.
 */
export function mergeSettings(
  existing: string | undefined,
  plan: PluginActivationPlan,
  settingsPath = '<settings>',
): Result<string, SettingsParseError> {
  if (existing === undefined) {
    return ok(`${JSON.stringify({ [ENABLED_PLUGINS_KEY]: plan }, null, 2)}\n`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(existing);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new SettingsParseError(settingsPath, reason, error));
  }

  if (!isPlainObject(parsed)) {
    return err(new SettingsParseError(settingsPath, 'top-level value is not an object'));
  }

  const edits = jsonc.modify(existing, [ENABLED_PLUGINS_KEY], { ...plan }, {
    formattingOptions: detectFormatting(existing),
  });
  return ok(jsonc.applyEdits(existing, edits));
}

export interface WriteSettingsParams {
  writer: ProjectWriter;
  /** Settings path relative to the writer root. */
  path: string;
  plan: PluginActivationPlan;
  logger: Logger;
}

/** Read, merge and write the settings document through a project writer. */
export async function writeSettings(
  params: WriteSettingsParams,
): Promise<Result<FileStatus, SettingsParseError>> {
  const { writer, path, plan, logger } = params;

  const current = await writer.read(path);
  const merged = mergeSettings(current?.toString('utf-8'), plan, path);
  if (!merged.ok) {
    logger.error('Existing settings could not be parsed', {
      component: 'settings-merger',
      path,
      reason: merged.error.message,
    });
    return merged;
  }

  const status = await writer.write(path, merged.value);
  logger.info('Plugin settings written', {
    component: 'settings-merger',
    path,
    status,
    plugins: Object.keys(plan).length,
  });
  return ok(status);
}
