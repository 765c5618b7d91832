/**
 * Document loader — reads YAML/JSON specification files, parses them,
 * and resolves environment variable placeholders.
 */
import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { KilnError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when a document cannot be read, parsed, or its
 * environment placeholders resolved.
 */
export class ConfigError extends KilnError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      exitCode: 2,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively resolves environment variable placeholders in an object.
 * Replaces strings matching the pattern `${VAR_NAME}` with the value
 * of the corresponding environment variable.
 *
 * @param obj - The object to process (can be any JSON-compatible value)
 * @param env - Variable source, `process.env` unless given
 * @returns The object with all environment variables resolved
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  // Numbers, booleans, null — return as-is
  return obj;
}

// ─── Parsing ────────────────────────────────────────────────────

/**
 * Parse document text. JSON is accepted since it is a subset of YAML.
 * An empty document is an error rather than `null`.
 */
export function parseSpecDocument(
  text: string,
  source = '<inline>',
): Result<unknown, ConfigError> {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    return err(
      new ConfigError(`Invalid YAML in ${source}`, {
        source,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  if (parsed === null || parsed === undefined) {
    return err(new ConfigError(`Document ${source} is empty`, { source }));
  }
  return ok(parsed);
}

/**
 * Read a file as UTF-8, mapping filesystem failures to ConfigError.
 */
export async function readTextFile(filePath: string): Promise<Result<string, ConfigError>> {
  try {
    return ok(await readFile(filePath, 'utf-8'));
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      return err(
        new ConfigError(`File not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read file: ${filePath}`, {
        filePath,
        errorCode: nodeError.code,
        errorMessage: nodeError.message,
      }),
    );
  }
}

// ─── Document Loader ────────────────────────────────────────────

/**
 * Loads a specification document from disk.
 *
 * 1. Reads the file
 * 2. Parses YAML (or JSON)
 * 3. Resolves environment variable placeholders
 *
 * Validation is left to the config resolver, which needs the schema
 * version before it can pick a schema.
 */
export async function loadSpecDocument(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<unknown, ConfigError>> {
  const content = await readTextFile(filePath);
  if (!content.ok) return content;

  const parsed = parseSpecDocument(content.value, filePath);
  if (!parsed.ok) return parsed;

  try {
    return ok(resolveEnvVars(parsed.value, env));
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }
}
