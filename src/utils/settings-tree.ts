/**
 * @fileoverview Helpers for nested settings objects.
 *
 * Backends usually take a settings tree (`{ typescript: { format: {...} } }`)
 * and ask for pieces of it by dotted section name.
 *
 * @module utils/settings-tree
 */

export type SettingsTree = Record<string, unknown>;

export function isPlainObject(value: unknown): value is SettingsTree {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively merge `sources` into `target`, left to right.
 * Plain objects are merged key by key; arrays and everything else replace
 * the existing value. Mutates and returns `target`.
 */
export function deepExtend<T extends SettingsTree>(target: T, ...sources: SettingsTree[]): T {
  const out: SettingsTree = target;
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (key === '__proto__' || key === 'constructor') continue;
      if (isPlainObject(value)) {
        const current = out[key];
        out[key] = deepExtend(isPlainObject(current) ? current : {}, value);
      } else {
        out[key] = value;
      }
    }
  }
  return target;
}

/**
 * Look up a dotted section (`"typescript.format"`) in a settings tree.
 * Returns undefined as soon as a segment is missing.
 */
export function lookupSection(settings: unknown, section: string): unknown {
  let current: unknown = settings;
  for (const part of section.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[part];
    if (current === undefined || current === null) return undefined;
  }
  return current;
}
