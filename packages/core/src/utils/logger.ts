import pino from 'pino';
import { loadConfig, type MethodSecurityConfig } from '../config';

export type LogLevel = MethodSecurityConfig['logging']['level'];

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Pretty-print through pino-pretty instead of emitting JSON lines */
  pretty?: boolean;
}

/**
 * Logger wrapper for method security
 */
export class Logger {
  private pino: pino.Logger;

  constructor(options: LoggerOptions = {}) {
    this.pino = pino({
      name: options.name ?? 'method-security',
      level: options.level ?? 'info',
      transport: options.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    });
  }

  static fromConfig(config: MethodSecurityConfig): Logger {
    return new Logger(config.logging);
  }

  get level(): string {
    return this.pino.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error) {
      this.pino.error({ detail: error }, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({ level: 'silent' });
    child.pino = this.pino.child(bindings);
    return child;
  }
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger, configured from the environment on first use so that bad
 * settings surface where a manager is set up rather than at import.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = Logger.fromConfig(loadConfig());
  }
  return defaultLogger;
}
