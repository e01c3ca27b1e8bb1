/**
 * Error hierarchy for attribute-mapping.
 */

export interface ErrorOptions {
  cause?: Error;
}

export class AttributeMappingError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'AttributeMappingError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

export class ConfigError extends AttributeMappingError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, details, options?.cause);
    this.name = 'ConfigError';
  }
}

/**
 * Raised by `toMapping()` when a record's own converter throws or does not
 * return a plain mapping.
 */
export class RecordConversionError extends AttributeMappingError {
  constructor(key: string, recordType: string, reason: string, options?: ErrorOptions) {
    super(
      'RECORD_CONVERSION_FAILED',
      `Cannot convert record '${key}' (${recordType}): ${reason}`,
      { key, recordType },
      options?.cause,
    );
    this.name = 'RecordConversionError';
  }
}

export const ErrorCodes = Object.freeze({
  CONFIG_INVALID: 'CONFIG_INVALID',
  RECORD_CONVERSION_FAILED: 'RECORD_CONVERSION_FAILED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
