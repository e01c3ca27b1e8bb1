/**
 * Construction options for AttributeMapping.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from './errors.js';
import { type Logger, defaultLogger } from './logger.js';

export const SystemDefaultsSchema = Type.Object(
  {
    height: Type.Number(),
    size: Type.Number(),
  },
  { additionalProperties: false },
);

export type SystemDefaults = Static<typeof SystemDefaultsSchema>;

export const SYSTEM_DEFAULTS: Readonly<SystemDefaults> = Object.freeze({ height: 100, size: 10 });

const DefaultsOverrideSchema = Type.Partial(SystemDefaultsSchema, { additionalProperties: false });

export interface AttributeMappingOptions {
  /** Overrides for the injected `metadata.system` values. */
  defaults?: Partial<SystemDefaults>;
  /** Set to false to skip default injection entirely. */
  injectDefaults?: boolean;
  logger?: Logger;
}

export interface ResolvedOptions {
  defaults: SystemDefaults;
  injectDefaults: boolean;
  logger: Logger;
}

export function resolveOptions(options?: AttributeMappingOptions): ResolvedOptions {
  const overrides: unknown = options?.defaults ?? {};
  if (!Value.Check(DefaultsOverrideSchema, overrides)) {
    const errors: Array<Record<string, unknown>> = [];
    for (const error of Value.Errors(DefaultsOverrideSchema, overrides)) {
      errors.push({
        field: error.path || '/',
        code: String(error.type),
        message: error.message,
      });
    }
    throw new ConfigError('Invalid system defaults', { errors });
  }
  const defaults: SystemDefaults = { ...SYSTEM_DEFAULTS };
  for (const key of ['height', 'size'] as const) {
    const value = overrides[key];
    if (value !== undefined) {
      defaults[key] = value;
    }
  }
  return {
    defaults,
    injectDefaults: options?.injectDefaults ?? true,
    logger: options?.logger ?? defaultLogger(),
  };
}
