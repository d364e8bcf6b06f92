/**
 * Structured logging for scope parsing and validation.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: 'json' | 'text';
  level?: LogLevel;
  output?: WritableOutput;
}

export class Logger {
  private _name: string;
  private _format: 'json' | 'text';
  private _levelValue: number;
  private _output: WritableOutput;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'optscope';
    this._format = options?.format ?? 'json';
    this._levelValue = LEVELS[options?.level ?? 'info'] ?? LEVELS.info;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
  }

  get name(): string {
    return this._name;
  }

  /** Returns a logger sharing this one's settings under `name`. */
  child(name: string): Logger {
    const logger = new Logger({ name, format: this._format, output: this._output });
    logger._levelValue = this._levelValue;
    return logger;
  }

  isEnabled(level: LogLevel): boolean {
    return (LEVELS[level] ?? LEVELS.info) >= this._levelValue;
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        message,
        logger: this._name,
        extra: extra ?? null,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      let extrasStr = '';
      if (extra) {
        extrasStr = ' ' + Object.entries(extra).map(([k, v]) => `${k}=${String(v)}`).join(' ');
      }
      this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extrasStr}\n`);
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

let defaultLogger: Logger | null = null;

/** Shared logger used when callers pass none. */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = new Logger();
  }
  return defaultLogger;
}
