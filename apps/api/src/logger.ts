export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, extra?: Record<string, unknown>) {
    if (enabled('debug')) console.debug(`[${this.scope}] ${message}`, extra ?? '');
  }

  info(message: string, extra?: Record<string, unknown>) {
    if (enabled('info')) console.log(`[${this.scope}] ${message}`, extra ?? '');
  }

  warn(message: string, extra?: Record<string, unknown>) {
    if (enabled('warn')) console.warn(`[${this.scope}] ${message}`, extra ?? '');
  }

  error(message: string, extra?: Record<string, unknown>) {
    if (enabled('error')) console.error(`[${this.scope}] ${message}`, extra ?? '');
  }
}

export const createLogger = (scope: string) => new Logger(scope);
