// ─── Branded Types ──────────────────────────────────────────────
// Branded types prevent passing a short plugin name where a qualified identifier is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/** Fully-qualified plugin identifier of the form `name@marketplace`. */
export type PluginId = Brand<string, 'PluginId'>;

/** Build a PluginId from its parts. */
export function pluginId(name: string, marketplace: string): PluginId {
  return `${name}@${marketplace}` as PluginId;
}

/**
 * Split an identifier at its last `@`.
 * Returns undefined when the value is not qualified.
 */
export function parsePluginId(value: string): { name: string; marketplace: string } | undefined {
  const at = value.lastIndexOf('@');
  if (at <= 0 || at === value.length - 1) return undefined;
  return { name: value.slice(0, at), marketplace: value.slice(at + 1) };
}

/** Freeze a plain object graph in place. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
