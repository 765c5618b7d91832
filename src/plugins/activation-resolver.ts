/**
 * Plugin Activation Resolver
 *
 * Maps requested plugin names (short or qualified) onto registry ids with a
 * two-tier lookup over the registry's fixed order:
 *   1. exact: the id itself, or an id beginning with `name@`
 *   2. fallback: the first id containing `name`
 * Names matching nothing are dropped with a warning.
 */
import type { Logger } from '@/observability/logger.js';

import type {
  ActivationList,
  ActivationResult,
  PluginActivationPlan,
  PluginNotFoundWarning,
  PluginRegistry,
} from './types.js';

/** Registry id for a requested name, or undefined when nothing matches. */
export function resolvePluginId(registry: PluginRegistry, name: string): string | undefined {
  if (name === '') return undefined;

  const exact = registry.entries.find((entry) => entry.id === name || entry.id.startsWith(`${name}@`));
  if (exact) return exact.id;

  return registry.entries.find((entry) => entry.id.includes(name))?.id;
}

export interface ResolveActivationParams {
  registry: PluginRegistry;
  activate: readonly string[];
  deactivate: readonly string[];
  logger: Logger;
}

/**
 * Build a fresh activation plan. Activation is applied first; deactivation
 * only writes `false` for ids not already enabled.
 */
export function resolveActivationPlan(params: ResolveActivationParams): ActivationResult {
  const { registry, logger } = params;
  const plan: PluginActivationPlan = {};
  const warnings: PluginNotFoundWarning[] = [];

  function lookup(name: string, list: ActivationList): string | undefined {
    const id = resolvePluginId(registry, name);
    if (id === undefined) {
      const message = `Plugin '${name}' not found in registry; dropped from ${list} list`;
      logger.warn(message, { component: 'plugin-activation', plugin: name, list });
      warnings.push({ code: 'PLUGIN_NOT_FOUND', message, name, list });
    }
    return id;
  }

  for (const name of params.activate) {
    const id = lookup(name, 'activate');
    if (id !== undefined) plan[id] = true;
  }

  for (const name of params.deactivate) {
    const id = lookup(name, 'deactivate');
    if (id !== undefined && plan[id] !== true) plan[id] = false;
  }

  logger.debug('Activation plan resolved', {
    component: 'plugin-activation',
    enabled: Object.values(plan).filter(Boolean).length,
    disabled: Object.values(plan).filter((value) => !value).length,
    dropped: warnings.length,
  });

  return { plan, warnings };
}
