/**
 * AttributeMapping: attribute-style access over a nested key/value store.
 */

import { resolveOptions, type AttributeMappingOptions } from './config.js';
import { injectDefaults } from './defaults.js';
import { RecordConversionError } from './errors.js';
import { flattenMapping, getPath } from './flatten.js';
import type { Logger } from './logger.js';
import type { Mapping, MappingConvertible, MappingView } from './values.js';
import { MAPPING_STORE, isMappingConvertible, isPlainMapping, setEntry } from './values.js';

function isInternalField(target: AttributeMapping, prop: string): boolean {
  return prop.startsWith('_') && Object.hasOwn(target, prop);
}

/**
 * Real members (methods, internal fields, symbols) resolve as usual; every
 * other string key is routed to the store.
 */
const HANDLER: ProxyHandler<AttributeMapping> = {
  get(target, prop, receiver) {
    if (typeof prop === 'symbol' || prop in target) {
      return Reflect.get(target, prop, receiver);
    }
    return target.getAttribute(prop);
  },

  set(target, prop, value, receiver) {
    if (typeof prop === 'symbol' || isInternalField(target, prop)) {
      return Reflect.set(target, prop, value, receiver);
    }
    target.setAttribute(prop, value);
    return true;
  },

  has(target, prop) {
    if (typeof prop === 'string' && target.hasAttribute(prop)) return true;
    return Reflect.has(target, prop);
  },
};

function convertRecord(key: string, record: MappingConvertible): Mapping {
  const recordType = record.constructor.name;
  let converted: unknown;
  try {
    converted = record.toMapping();
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new RecordConversionError(key, recordType, cause.message, { cause });
  }
  if (!isPlainMapping(converted)) {
    throw new RecordConversionError(key, recordType, 'toMapping() did not return a plain mapping');
  }
  return converted;
}

/**
 * Mappings are recursed into and records delegate to their own converter.
 * Everything else, arrays included, is copied by reference.
 */
function convertMapping(data: Mapping): Mapping {
  const result: Mapping = {};
  for (const [key, value] of Object.entries(data)) {
    if (isPlainMapping(value)) {
      setEntry(result, key, convertMapping(value));
    } else if (isMappingConvertible(value)) {
      setEntry(result, key, convertRecord(key, value));
    } else {
      setEntry(result, key, value);
    }
  }
  return result;
}

/**
 * Wraps a nested mapping so its entries can be read and written as
 * attributes. A name that is not a top-level key is looked up in the
 * flattened view of every nesting level; a name found nowhere reads as
 * `undefined`.
 *
 * ```ts
 * const data = AttributeMapping.fromMapping({ metadata: { user: { batch: 1121 } } });
 * data.batch;  // 1121
 * data.height; // 100, injected under metadata.system
 * ```
 */
export class AttributeMapping implements MappingView {
  [name: string]: unknown;

  private _store: Mapping;
  private _logger: Logger;

  constructor(entries?: Mapping, options?: AttributeMappingOptions) {
    const resolved = resolveOptions(options);
    this._store = { ...entries };
    this._logger = resolved.logger;
    if (resolved.injectDefaults) {
      injectDefaults(this._store, resolved.defaults, this._logger);
    }
    return new Proxy(this, HANDLER);
  }

  static fromMapping(source: Mapping, options?: AttributeMappingOptions): AttributeMapping {
    return new AttributeMapping(source, options);
  }

  get [MAPPING_STORE](): Mapping {
    return this._store;
  }

  /**
   * A plain mapping stored at the top level is replaced by a wrapper the
   * first time it is read; later reads return that same wrapper.
   */
  getAttribute(name: string): unknown {
    const store = this._store;
    if (Object.hasOwn(store, name)) {
      const value = store[name];
      if (isPlainMapping(value)) {
        const wrapped = new AttributeMapping(value, { injectDefaults: false, logger: this._logger });
        setEntry(store, name, wrapped);
        this._logger.debug('Materialized nested mapping', { key: name });
        return wrapped;
      }
      return value;
    }

    if (name.startsWith('_')) {
      return Reflect.get(this, name);
    }

    const flattened = flattenMapping(store);
    const found = Object.hasOwn(flattened, name);
    this._logger.trace('Resolved attribute through flattened view', { name, found });
    return found ? flattened[name] : undefined;
  }

  /** Always writes at the top level, shadowing any nested key of the same name. */
  setAttribute(name: string, value: unknown): void {
    setEntry(this._store, name, value);
  }

  hasAttribute(name: string): boolean {
    return Object.hasOwn(this._store, name);
  }

  listAttributes(): string[] {
    const names = new Set<string>(Object.keys(this._store));
    let current: object | null = this;
    while (current !== null && current !== Object.prototype) {
      for (const name of Object.getOwnPropertyNames(current)) {
        names.add(name);
      }
      current = Object.getPrototypeOf(current);
    }
    return [...names];
  }

  getPath(path: string, defaultValue?: unknown): unknown {
    return getPath(this._store, path, defaultValue);
  }

  toMapping(): Mapping {
    return convertMapping(this._store);
  }

  toJSON(): Mapping {
    return this.toMapping();
  }
}
