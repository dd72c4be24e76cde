import type { LogLevel } from './types.js';

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Prefixed console logger gated by a level threshold.
 */
export class Logger {
  private readonly prefix: string;
  private readonly level: LogLevel;

  constructor(prefix: string, level: LogLevel = 'info') {
    this.prefix = `[${prefix}]`;
    this.level = level;
  }

  /**
   * Whether messages at `level` are currently written.
   */
  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return SEVERITY[level] <= SEVERITY[this.level];
  }

  /**
   * Child logger sharing the threshold, with a nested prefix.
   */
  child(name: string): Logger {
    return new Logger(`${this.prefix.slice(1, -1)}:${name}`, this.level);
  }

  error(...args: unknown[]): void {
    if (this.isEnabled('error')) {
      console.error(this.stamp(), this.prefix, ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.isEnabled('warn')) {
      console.warn(this.stamp(), this.prefix, ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.isEnabled('info')) {
      console.log(this.stamp(), this.prefix, ...args);
    }
  }

  debug(...args: unknown[]): void {
    if (this.isEnabled('debug')) {
      console.debug(this.stamp(), this.prefix, ...args);
    }
  }

  private stamp(): string {
    return new Date().toISOString();
  }
}
