export type {
  ActivationList,
  ActivationResult,
  PluginActivationPlan,
  PluginNotFoundWarning,
  PluginRegistry,
  PluginRegistryEntry,
} from './types.js';
export { ENABLED_PLUGINS_KEY, SETTINGS_FILE } from './types.js';
export { createPluginRegistry, loadPluginRegistry, parsePluginRegistry } from './registry.js';
export type { RegistryLoadResult } from './registry.js';
export { resolveActivationPlan, resolvePluginId } from './activation-resolver.js';
export type { ResolveActivationParams } from './activation-resolver.js';
export { mergeSettings, writeSettings } from './settings-merger.js';
export type { WriteSettingsParams } from './settings-merger.js';
