export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

/** Threshold from `LOG_LEVEL`, read on every call so tests can change it. */
export function currentLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export class Logger {
  constructor(private readonly scope?: string) {}

  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown) {
    this.write('error', message, meta);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLogLevel()]) {
      return;
    }

    const scope = this.scope ? ` [${this.scope}]` : '';
    const line = `[${level.toUpperCase()}] ${new Date().toISOString()}${scope} - ${message}`;

    switch (level) {
      case 'error':
        console.error(line, meta ?? '');
        break;
      case 'warn':
        console.warn(line, meta ?? '');
        break;
      case 'debug':
        console.debug(line, meta ?? '');
        break;
      default:
        console.log(line, meta ?? '');
    }
  }
}

export const logger = new Logger();
