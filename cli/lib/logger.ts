/**
 * Logging
 *
 * Line format: `[timestamp] [level] message {context}`.
 * Goes to stderr unless a log file is configured.
 */
import fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Append to this file instead of stderr */
  file?: string | null;
}

export function formatLogLine(level: LogLevel, message: string, context?: LogContext, now = new Date()): string {
  const ctx = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${now.toISOString()}] [${level}] ${message}${ctx}\n`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minimum = LOG_LEVELS.indexOf(options.level ?? 'info');
  const file = options.file || null;

  const write = (level: LogLevel, message: string, context?: LogContext) => {
    if (LOG_LEVELS.indexOf(level) < minimum) return;
    const line = formatLogLine(level, message, context);

    if (file) {
      try {
        fs.appendFileSync(file, line);
        return;
      } catch (e) {
        process.stderr.write(formatLogLine('warn', `Cannot write log file ${file}`, { error: String(e) }));
      }
    }
    process.stderr.write(line);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context)
  };
}
