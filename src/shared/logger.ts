type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

class Logger {
  constructor(private readonly level: LogLevel = resolveLevel(process.env.LOG_LEVEL)) {}

  debug(message: string, ...meta: unknown[]) {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]) {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]) {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]) {
    this.write('error', message, meta);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta: unknown[]) {
    if (LEVELS[level] < LEVELS[this.level]) return;

    const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    sink(line, ...meta);
  }
}

export type { LogLevel };
export const logger = new Logger();
