import { describe, it, expect } from 'vitest';
import { AttributeMapping } from '../src/attribute-mapping.js';
import { SYSTEM_DEFAULTS, resolveOptions } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { Logger, defaultLogger } from '../src/logger.js';

describe('resolveOptions', () => {
  it('uses the built-in defaults with no options', () => {
    const resolved = resolveOptions();
    expect(resolved.defaults).toEqual({ height: 100, size: 10 });
    expect(resolved.injectDefaults).toBe(true);
    expect(resolved.logger).toBe(defaultLogger());
  });

  it('merges partial overrides', () => {
    expect(resolveOptions({ defaults: { height: 50 } }).defaults).toEqual({ height: 50, size: 10 });
  });

  it('ignores overrides set to undefined', () => {
    expect(resolveOptions({ defaults: { height: undefined, size: 4 } }).defaults).toEqual({ height: 100, size: 4 });
  });

  it('keeps the supplied logger', () => {
    const logger = new Logger({ name: 'custom' });
    expect(resolveOptions({ logger }).logger).toBe(logger);
  });

  it('rejects a NaN default', () => {
    expect(() => resolveOptions({ defaults: { size: Number.NaN } })).toThrow(ConfigError);
  });

  it('reports the offending field', () => {
    try {
      resolveOptions({ defaults: { height: Number.NaN } });
      expect.unreachable('resolveOptions should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('CONFIG_INVALID');
        expect(err.message).toBe('Invalid system defaults');
        const errors = err.details['errors'];
        expect(Array.isArray(errors) && errors.length > 0).toBe(true);
        expect(Array.isArray(errors) && errors[0].field).toBe('/height');
      }
    }
  });

  it('does not let overrides change the shared constant', () => {
    resolveOptions({ defaults: { height: 1, size: 2 } });
    expect(SYSTEM_DEFAULTS).toEqual({ height: 100, size: 10 });
    expect(Object.isFrozen(SYSTEM_DEFAULTS)).toBe(true);
  });
});

describe('default injection', () => {
  it('does not override supplied values', () => {
    const data = new AttributeMapping({ metadata: { system: { size: 10.7, height: 11 } } });
    expect(data.height).toBe(11);
    expect(data.size).toBe(10.7);
  });

  it('fills missing values when metadata is absent', () => {
    const data = new AttributeMapping({ name: 'my' });
    expect(data.getPath('metadata.system.height')).toBe(100);
    expect(data.getPath('metadata.system.size')).toBe(10);
  });

  it('fills only the missing value', () => {
    const data = new AttributeMapping({ metadata: { system: { height: 7 } } });
    expect(data.toMapping()).toEqual({ metadata: { system: { height: 7, size: 10 } } });
  });

  it('adds system next to existing metadata entries', () => {
    const data = new AttributeMapping({ metadata: { user: { batch: 1 } } });
    expect(data.toMapping()).toEqual({
      metadata: { user: { batch: 1 }, system: { height: 100, size: 10 } },
    });
  });

  it('preserves falsy values that are present', () => {
    const data = new AttributeMapping({ metadata: { system: { height: 0, size: null } } });
    expect(data.getPath('metadata.system.height')).toBe(0);
    expect(data.getPath('metadata.system.size')).toBeNull();
  });

  it('leaves a metadata entry that is not a mapping untouched', () => {
    const data = new AttributeMapping({ metadata: 'none' });
    expect(data.toMapping()).toEqual({ metadata: 'none' });
    expect(data.height).toBeUndefined();
  });

  it('leaves a system entry that is not a mapping untouched', () => {
    const data = new AttributeMapping({ metadata: { system: [1, 2] } });
    expect(data.toMapping()).toEqual({ metadata: { system: [1, 2] } });
  });

  it('injects into a metadata wrapper passed by the caller', () => {
    const metadata = new AttributeMapping({ user: { batch: 1 } }, { injectDefaults: false });
    const data = new AttributeMapping({ metadata });
    expect(data.metadata).toBe(metadata);
    expect(data.getPath('metadata.system.height')).toBe(100);
  });

  it('injects the built-in value for an undefined override', () => {
    const data = new AttributeMapping({}, { defaults: { height: undefined } });
    expect(data.height).toBe(100);
    expect(data.getPath('metadata.system.height')).toBe(100);
  });

  it('uses configured overrides', () => {
    const data = new AttributeMapping({ name: 'my' }, { defaults: { height: 50 } });
    expect(data.height).toBe(50);
    expect(data.size).toBe(10);
  });

  it('can be switched off', () => {
    const data = new AttributeMapping({ name: 'my' }, { injectDefaults: false });
    expect(data.toMapping()).toEqual({ name: 'my' });
    expect(data.height).toBeUndefined();
  });

  it('throws ConfigError from the constructor for invalid overrides', () => {
    expect(() => new AttributeMapping({}, { defaults: { height: Number.NaN } })).toThrow(ConfigError);
  });
});
