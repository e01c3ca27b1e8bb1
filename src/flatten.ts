/**
 * Flattened view and dot-path lookup over nested mappings.
 */

import type { Mapping } from './values.js';
import { nestedStoreOf, setEntry } from './values.js';

/**
 * Merge every nesting level into one mapping. Nested mappings are inserted
 * after their own descendants, so when a key repeats the one visited last wins.
 */
export function flattenMapping(mapping: Mapping): Mapping {
  const result: Mapping = {};
  for (const [key, value] of Object.entries(mapping)) {
    const nested = nestedStoreOf(value);
    if (nested !== undefined) {
      for (const [childKey, childValue] of Object.entries(flattenMapping(nested))) {
        setEntry(result, childKey, childValue);
      }
    }
    setEntry(result, key, value);
  }
  return result;
}

export function getPath(mapping: Mapping, path: string, defaultValue?: unknown): unknown {
  const parts = path.split('.');
  let current: unknown = mapping;
  for (const part of parts) {
    const store = nestedStoreOf(current);
    if (store !== undefined && Object.hasOwn(store, part)) {
      current = store[part];
    } else {
      return defaultValue;
    }
  }
  return current;
}
