/**
 * Value kinds stored in an attribute mapping.
 */

export type Mapping = Record<string, unknown>;

/** Anything that knows how to turn itself into a plain mapping. */
export interface MappingConvertible {
  toMapping(): Mapping;
}

/**
 * Optional base class for structured records. Any object with a `toMapping()`
 * method is treated as a record whether or not it extends this class.
 */
export abstract class DataRecord implements MappingConvertible {
  abstract toMapping(): Mapping;
}

export type ValueKind = 'mapping' | 'record' | 'opaque';

/** Key under which a wrapper exposes its backing store to the helpers below. */
export const MAPPING_STORE: unique symbol = Symbol('attribute-mapping.store');

export interface MappingView extends MappingConvertible {
  readonly [MAPPING_STORE]: Mapping;
}

export function isPlainMapping(value: unknown): value is Mapping {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isMappingConvertible(value: unknown): value is MappingConvertible {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return typeof Reflect.get(value, 'toMapping') === 'function';
}

export function isMappingView(value: unknown): value is MappingView {
  return value !== null && typeof value === 'object' && MAPPING_STORE in value;
}

export function classifyValue(value: unknown): ValueKind {
  if (isPlainMapping(value)) return 'mapping';
  if (isMappingConvertible(value)) return 'record';
  return 'opaque';
}

/**
 * Returns the entries to descend into when walking nested structures: the
 * object itself for a plain mapping, the backing store for a wrapper.
 */
export function nestedStoreOf(value: unknown): Mapping | undefined {
  if (isPlainMapping(value)) return value;
  if (isMappingView(value)) return value[MAPPING_STORE];
  return undefined;
}

/**
 * Assigns an own enumerable entry. Unlike `target[key] = value` this also
 * stores a `__proto__` key instead of changing the prototype.
 */
export function setEntry(target: Mapping, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}
