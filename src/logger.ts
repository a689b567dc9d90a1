/**
 * Structured Logging Module
 *
 * pino-based logging with scoped child loggers, one per component
 * (Transport, Session, Dispatcher, Input, ...). JSON output for
 * unattended runs, pino-pretty when a human is watching.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function envLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return isLogLevel(raw) ? raw : undefined;
}

function createRootLogger(config: LoggerConfig): Logger {
  // LOG_LEVEL wins so a service unit can turn up logging without editing the YAML
  const level = envLevel() ?? config.level ?? 'info';
  const pretty = config.pretty ?? (process.stdout.isTTY === true && process.env.NODE_ENV !== 'production');

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,module',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  }
  return pino({ level });
}

/**
 * Initialize the root logger. Call once at startup, after the config is read.
 * Loggers handed out before this call keep writing through the old root.
 */
export function initLogger(config: LoggerConfig = {}): void {
  rootLogger = createRootLogger(config);
}

/** Get the root logger, creating it with defaults on first use. */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger({});
  }
  return rootLogger;
}

/**
 * Get a scoped logger for a specific module.
 * Auto-initializes if not already initialized.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
