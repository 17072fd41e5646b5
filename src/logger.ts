/**
 * Logging Module
 *
 * pino root logger with scoped child loggers per module.
 * Pretty mode writes `[module] message` lines; errors go to stderr,
 * everything below error to stdout.
 */

import pino, { Logger, Level, LevelWithSilent } from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = LevelWithSilent;

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Level from the LOG_LEVEL environment variable, if it names a pino level */
export function envLogLevel(): LogLevel | undefined {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : undefined;
}

function prettyStream(destination: 1 | 2) {
  return pretty({
    destination,
    sync: true,
    colorize: process.stdout.isTTY === true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname,module',
    messageFormat: '[{module}] {msg}',
  });
}

function splitStreams(usePretty: boolean) {
  const stdoutLevel: Level = 'trace';
  const stderrLevel: Level = 'error';
  return pino.multistream(
    [
      { level: stdoutLevel, stream: usePretty ? prettyStream(1) : pino.destination(1) },
      { level: stderrLevel, stream: usePretty ? prettyStream(2) : pino.destination(2) },
    ],
    { dedupe: true },
  );
}

/**
 * Initialize the root logger. Call once at startup.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? envLogLevel() ?? 'info';
  const usePretty = config.pretty ?? process.env.NODE_ENV !== 'production';

  rootLogger = pino({ level }, splitStreams(usePretty));
  return rootLogger;
}

/**
 * Get the root logger instance.
 * Auto-initializes if not already initialized.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
