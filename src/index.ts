/**
 * attribute-mapping - Attribute-style access over nested key/value mappings.
 */

export { AttributeMapping } from './attribute-mapping.js';

// Values
export { DataRecord, MAPPING_STORE, classifyValue, isPlainMapping, isMappingConvertible, isMappingView, nestedStoreOf } from './values.js';
export type { Mapping, MappingConvertible, MappingView, ValueKind } from './values.js';

// Helpers
export { flattenMapping, getPath } from './flatten.js';
export { injectDefaults } from './defaults.js';

// Config
export { SYSTEM_DEFAULTS, SystemDefaultsSchema, resolveOptions } from './config.js';
export type { AttributeMappingOptions, ResolvedOptions, SystemDefaults } from './config.js';

// Errors
export { AttributeMappingError, ConfigError, RecordConversionError, ErrorCodes } from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Logging
export { Logger, defaultLogger } from './logger.js';
export type { LoggerOptions, LogLevel, LogFormat, WritableOutput } from './logger.js';

export const VERSION = '0.1.0';
