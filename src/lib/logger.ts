/**
 * Process-wide logger
 *
 * Writes through console, prefixed with a [Scope] tag in text format or as
 * one JSON object per line in json format. Configured from LOG_LEVEL and
 * LOG_FORMAT on first use; components take a Logger handle so tests can
 * swap it out.
 */

import { loadConfig, type LogFormat, type LogLevel } from './config';

export type LogContext = Record<string, unknown>;

type Severity = Exclude<LogLevel, 'silent'>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope: string;
  level: LogLevel;
  format: LogFormat;
}

const SEVERITY_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

class ConsoleLogger implements Logger {
  constructor(private readonly options: LoggerOptions) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({ ...this.options, scope });
  }

  private write(severity: Severity, message: string, context?: LogContext): void {
    if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.options.level]) {
      return;
    }

    if (this.options.format === 'json') {
      console[severity](
        JSON.stringify({
          ...context,
          timestamp: new Date().toISOString(),
          level: severity,
          scope: this.options.scope,
          message,
        })
      );
      return;
    }

    const line = `[${this.options.scope}] ${message}`;
    if (context) {
      console[severity](line, context);
    } else {
      console[severity](line);
    }
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

let processLogger: Logger | null = null;

/**
 * Logger shared by every component in the process, built from config on
 * first use
 *
 * @throws ConfigError if LOG_LEVEL or LOG_FORMAT holds an unknown value
 */
export function getLogger(): Logger {
  if (!processLogger) {
    const config = loadConfig();
    processLogger = createLogger({
      scope: 'VIN Forensics',
      level: config.logLevel,
      format: config.logFormat,
    });
  }
  return processLogger;
}
