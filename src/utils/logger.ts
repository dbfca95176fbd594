import pino, { type Logger, type TransportTargetOptions } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface LoggerOptions {
  level: LogLevel;
  /** Also append JSON lines to this file */
  logFile?: string;
  /** Pretty-print to stdout instead of raw JSON */
  pretty?: boolean;
}

export function createRootLogger(options: LoggerOptions): Logger {
  const targets: TransportTargetOptions[] = [
    options.pretty
      ? {
          target: "pino-pretty",
          level: options.level,
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : { target: "pino/file", level: options.level, options: { destination: 1 } },
  ];

  if (options.logFile) {
    targets.push({
      target: "pino/file",
      level: options.level,
      options: { destination: options.logFile, mkdir: true },
    });
  }

  return pino({
    level: options.level,
    base: {
      service: "inventory-valuation",
      env: process.env.NODE_ENV,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: { targets },
  });
}

export function createModuleLogger(root: Logger, module: string): Logger {
  return root.child({ module });
}
