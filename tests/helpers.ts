/**
 * Shared test fixtures and helpers.
 */

import { AttributeMapping } from '../src/attribute-mapping.js';
import { DataRecord, type Mapping } from '../src/values.js';
import { Logger, type LogLevel } from '../src/logger.js';

export class Point extends DataRecord {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    super();
    this.x = x;
    this.y = y;
  }

  toMapping(): Mapping {
    return { x: this.x, y: this.y };
  }
}

export class BrokenRecord extends DataRecord {
  toMapping(): Mapping {
    throw new Error('boom');
  }
}

export function sampleData(): Mapping {
  return {
    id: '1',
    name: 'first',
    metadata: {
      system: { size: 10.7, height: 11 },
      user: { batch: 1121 },
    },
  };
}

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

export interface LogLine {
  level: string;
  message: string;
  logger: string;
  extra: Record<string, unknown> | null;
}

export function createBufferLogger(level: LogLevel = 'trace') {
  const { output, lines } = createBufferOutput();
  const logger = new Logger({ level, output });
  const messages = (): LogLine[] => lines.map((line) => JSON.parse(line));
  return { logger, lines, messages };
}

export function asWrapper(value: unknown): AttributeMapping {
  if (!(value instanceof AttributeMapping)) {
    throw new Error(`Expected an AttributeMapping, got ${String(value)}`);
  }
  return value;
}

export function asArray(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Expected an array, got ${String(value)}`);
  }
  return value;
}
