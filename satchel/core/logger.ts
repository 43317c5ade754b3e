/**
 * Structured logging for satchel, built on pino.
 *
 * Output goes to stderr so a host process can keep stdout for its own use.
 * Components take a child of the shared root logger via `getLogger(component)`;
 * hosts that already run pino can hand their own instance to `setLogger`.
 */

import pino, { type LevelWithSilent, type Logger } from "pino";

export type { Logger };
export type LogLevel = LevelWithSilent;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : "warn");

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? "satchel",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

let rootLogger: Logger | null = null;

export function setLogger(logger: Logger | null): void {
  rootLogger = logger;
}

export function getLogger(component: string): Logger {
  if (!rootLogger) rootLogger = createLogger();
  return rootLogger.child({ component });
}
