/**
 * Shared logger for the margin tools.
 *
 * Every level goes to stderr through console.error: stdout belongs to the
 * JSON envelope that callers parse.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const VALID_LOG_LEVELS: readonly string[] = Object.keys(LOG_LEVELS);

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
}

/**
 * Initial level: RUNBLOCK_LOG_LEVEL, then LOG_LEVEL, then info.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  for (const candidate of [env.RUNBLOCK_LOG_LEVEL, env.LOG_LEVEL]) {
    const value = candidate?.trim().toLowerCase();
    if (isValidLogLevel(value)) return value;
  }
  return 'info';
}

/**
 * JSON replacer for Error objects, whose own properties are non-enumerable.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  return value;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;

  constructor(context: string = 'runblock', level: LogLevel = levelFromEnv()) {
    this.context = context;
    this.level = level;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;
    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      line += ` ${JSON.stringify(data, errorReplacer)}`;
    }
    console.error(line);
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }
}
