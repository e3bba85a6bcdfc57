/**
 * Component logger shared by the AgentChat services
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Simple logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(component: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = 'info'
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(`[${this.component}] DEBUG:`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.log(`[${this.component}] INFO:`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(`[${this.component}] WARN:`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(`[${this.component}] ERROR:`, message, ...args);
  }

  child(component: string): Logger {
    return new ConsoleLogger(`${this.component}:${component}`, this.level);
  }
}

/**
 * Logger that discards everything; for tests
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => noopLogger,
};
