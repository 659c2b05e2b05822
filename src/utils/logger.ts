export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Component name prefixed to every line, e.g. `store` or `merge`. */
  scope?: string;
  sink?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  /** A logger sharing this one's level and output, tagged with a component scope. */
  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new Logger({ ...this.opts, scope: parent ? `${parent}.${scope}` : scope });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = new Date().toISOString();
    const scope = this.opts.scope;
    const write = this.opts.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

    if (this.opts.json) {
      write(JSON.stringify({ timestamp, level, scope, message, data }));
      return;
    }

    const head = scope ? `${timestamp} ${level} [${scope}] ${message}` : `${timestamp} ${level} ${message}`;
    write(data === undefined ? head : `${head} ${safeJson(data)}`);
  }
}

/**
 * Build the process logger from `TRELLIS_LOG_LEVEL` and `TRELLIS_LOG_JSON`.
 * An unrecognised level falls back to `info`.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env, opts: Omit<LoggerOptions, 'level' | 'json'> = {}): Logger {
  const raw = env.TRELLIS_LOG_LEVEL?.trim().toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw) ?? 'info';
  return new Logger({ ...opts, level, json: env.TRELLIS_LOG_JSON === '1' });
}

/** Logger that drops everything; the default for library callers that pass none. */
export const silentLogger = new Logger({ level: 'silent' });

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
