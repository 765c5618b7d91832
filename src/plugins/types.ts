import type { ReportWarning } from '@/files/types.js';

// ─── Registry ───────────────────────────────────────────────────

/** One installed plugin, keyed by its qualified identifier. */
export interface PluginRegistryEntry {
  /** `name@marketplace`. */
  readonly id: string;
  readonly name: string;
  readonly marketplace: string;
  readonly scope: string;
  readonly installPath: string;
  readonly version?: string;
}

/** Read-only view of installed plugins, ordered lexicographically by id. */
export interface PluginRegistry {
  readonly entries: readonly PluginRegistryEntry[];
  get(id: string): PluginRegistryEntry | undefined;
}

// ─── Activation ─────────────────────────────────────────────────

/** Plugin id → enabled. Built fresh for every run. */
export type PluginActivationPlan = Record<string, boolean>;

export type ActivationList = 'activate' | 'deactivate';

/** A requested plugin name matched nothing in the registry; it was dropped. */
export interface PluginNotFoundWarning extends ReportWarning {
  code: 'PLUGIN_NOT_FOUND';
  name: string;
  list: ActivationList;
}

export interface ActivationResult {
  plan: PluginActivationPlan;
  warnings: PluginNotFoundWarning[];
}

// ─── Settings ───────────────────────────────────────────────────

/** Key of the activation map in the settings document. */
export const ENABLED_PLUGINS_KEY = 'enabledPlugins';

/** Settings document location relative to the workspace directory. */
export const SETTINGS_FILE = '.claude/settings.json';
