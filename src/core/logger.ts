export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const raw = (value ?? '').trim().toLowerCase();
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : fallback;
}

export class Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('debug')) return;
    console.debug(this.prefix('debug'), message, ...meta);
  }

  info(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('info')) return;
    console.info(this.prefix('info'), message, ...meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('warn')) return;
    console.warn(this.prefix('warn'), message, ...meta);
  }

  error(message: string, ...meta: unknown[]): void {
    if (!this.isEnabled('error')) return;
    console.error(this.prefix('error'), message, ...meta);
  }

  private prefix(level: LogLevel): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
  }
}
