/**
 * Structured logger used for the library's debug records.
 */

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'json' | 'text';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  output?: WritableOutput;
}

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _levelValue: number;
  private _output: WritableOutput;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'attribute-mapping';
    this._format = options?.format ?? 'json';
    this._levelValue = LEVELS[options?.level ?? 'info'] ?? 20;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
  }

  get name(): string {
    return this._name;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= this._levelValue;
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (!this.isEnabled(levelName)) return;
    const fields = extra ?? null;

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        logger: this._name,
        extra: fields,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      const lvl = levelName.toUpperCase();
      let extrasStr = '';
      if (fields) {
        extrasStr = ' ' + Object.entries(fields).map(([k, v]) => `${k}=${String(v)}`).join(' ');
      }
      this._output.write(`${ts} [${lvl}] [${this._name}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

let _defaultLogger: Logger | undefined;

/** Shared logger used when no `logger` option is given. */
export function defaultLogger(): Logger {
  _defaultLogger ??= new Logger();
  return _defaultLogger;
}
