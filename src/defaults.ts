import type { SystemDefaults } from './config.js';
import type { Logger } from './logger.js';
import type { Mapping } from './values.js';
import { nestedStoreOf, setEntry } from './values.js';

/** Returns the mapping stored under `key`, creating an empty one when the key is absent. */
function ensureNested(store: Mapping, key: string): Mapping | undefined {
  if (!Object.hasOwn(store, key)) {
    setEntry(store, key, {});
  }
  return nestedStoreOf(store[key]);
}

/**
 * Guarantees `metadata.system.height` and `metadata.system.size`. Presence is
 * checked by key, so falsy caller values are kept. A `metadata` or `system`
 * entry that is not a mapping is left as it is.
 */
export function injectDefaults(store: Mapping, defaults: SystemDefaults, logger: Logger): void {
  const metadata = ensureNested(store, 'metadata');
  if (metadata === undefined) return;
  const system = ensureNested(metadata, 'system');
  if (system === undefined) return;

  for (const key of ['height', 'size'] as const) {
    if (!Object.hasOwn(system, key)) {
      setEntry(system, key, defaults[key]);
      logger.debug('Injected default value', { path: `metadata.system.${key}`, value: defaults[key] });
    }
  }
}
