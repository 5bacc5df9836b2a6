import type { LogLevel, Logger } from './Logger';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  public debug(message: string, meta?: unknown): void {
    if (!this.enabled('debug')) return;
    console.debug(`[DEBUG] ${message}`, meta ?? '');
  }

  public info(message: string, meta?: unknown): void {
    if (!this.enabled('info')) return;
    console.log(`[INFO] ${message}`, meta ?? '');
  }

  public warn(message: string, meta?: unknown): void {
    if (!this.enabled('warn')) return;
    console.warn(`[WARN] ${message}`, meta ?? '');
  }

  public error(message: string, meta?: unknown): void {
    console.error(`[ERROR] ${message}`, meta ?? '');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
