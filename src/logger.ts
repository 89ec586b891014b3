/**
 * Leveled logger with text and JSON line output.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  format?: LogFormat;
  output?: WritableOutput;
}

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export function isLogLevel(s: string): s is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, s);
}

export class Logger {
  private readonly _name: string;
  private readonly _format: LogFormat;
  private readonly _level: LogLevel;
  private readonly _levelValue: number;
  private readonly _output: WritableOutput;

  constructor(options: LoggerOptions = {}) {
    this._name = options.name ?? 'sectconf';
    this._format = options.format ?? 'text';
    this._level = options.level ?? DEFAULT_LOG_LEVEL;
    this._levelValue = LEVELS[this._level];
    this._output = options.output ?? { write: (s: string) => console.error(s.trimEnd()) };
  }

  /** Logger sharing this one's level, format and output under another name. */
  child(name: string): Logger {
    return new Logger({
      name: `${this._name}:${name}`,
      level: this._level,
      format: this._format,
      output: this._output,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= this._levelValue;
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const now = new Date();

    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        logger: this._name,
        message,
        extra: extra ?? null,
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    let extrasStr = '';
    if (extra) {
      extrasStr = ' ' + Object.entries(extra).map(([k, v]) => `${k}=${formatExtra(v)}`).join(' ');
    }
    this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extrasStr}\n`);
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
}

function formatExtra(v: unknown): string {
  return typeof v === 'string' ? JSON.stringify(v) : String(v);
}
