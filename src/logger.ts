import * as winston from "winston";
import type Transport from "winston-transport";
import * as path from "path";
import * as fs from "fs";
import { SPLAT } from "triple-beam";
import { stripVTControlCharacters } from "util";

import { isObject } from "./error";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

// Extend the Winston log methods to support error signatures
export interface LogMethod extends winston.LogMethod {
  (level: LogLevel, err: Error, ...meta: any[]): Logger;
}

export interface LeveledLogMessage extends winston.LeveledLogMethod {
  // We use empty log messages to create newlines
  (): Logger;

  // We transform Errors to strings dynamically
  (err: Error, ...meta: any[]): Logger;
}

export interface Logger {
  log: LogMethod;

  error: LeveledLogMessage;
  warn: LeveledLogMessage;
  info: LeveledLogMessage;
  http: LeveledLogMessage;
  verbose: LeveledLogMessage;
  debug: LeveledLogMessage;
  silly: LeveledLogMessage;

  add(transport: Transport): Logger;
  remove(transport: Transport): Logger;
  readonly transports: Transport[];

  silent: boolean;
}

function expandErrors(logger: winston.Logger): winston.Logger {
  const oldLogFunc: winston.LogMethod = logger.log.bind(logger);
  const newLogFunc: winston.LogMethod = function (
    levelOrEntry: string | winston.LogEntry,
    message?: string | Error,
    ...meta: any[]
  ): winston.Logger {
    if (message && message instanceof Error) {
      message = message.stack || message.message;
      return oldLogFunc(levelOrEntry as string, message, ...meta);
    }
    // Overloads are weird in TypeScript. This method works so long as the original
    // function isn't checking arguments.length.
    return oldLogFunc(levelOrEntry as string, message as string, ...meta);
  };
  logger.log = newLogFunc;
  return logger;
}

function annotateDebugLines(logger: winston.Logger): winston.Logger {
  const debug: winston.LeveledLogMethod = logger.debug.bind(logger);
  const newDebug: winston.LeveledLogMethod = function (
    message: string | any,
    ...meta: any[]
  ): winston.Logger {
    if (typeof message === "string") {
      message = `[${new Date().toISOString()}] ${message || ""}`;
    }
    return debug(message, ...meta);
  };
  logger.debug = newDebug;
  return logger;
}

/**
 * Picks the first debug log file in the working directory that can be opened
 * for writing, or that does not exist yet.
 */
export function findAvailableLogFile(): string {
  const candidates = ["remote-config-admin-debug.log"];
  for (let i = 1; i < 10; i++) {
    candidates.push(`remote-config-admin-debug.${i}.log`);
  }

  for (const c of candidates) {
    const logFilename = path.join(process.cwd(), c);
    try {
      const fd = fs.openSync(logFilename, "r+");
      fs.closeSync(fd);
      return logFilename;
    } catch (e: unknown) {
      if (isObject(e) && e.code === "ENOENT") {
        return logFilename;
      }
      // EPERM and friends: try the next candidate.
    }
  }
  throw new Error("Unable to obtain permissions for remote-config-admin-debug.log");
}

export function tryStringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }

  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function segmentsOf(info: winston.Logform.TransformableInfo): string[] {
  const splat = info[SPLAT];
  return [info.message, ...(Array.isArray(splat) ? splat : [])].map(tryStringify);
}

const rawLogger = winston.createLogger();
// Set a default silent logger to suppress logs during tests
rawLogger.add(
  new winston.transports.Console({
    silent: true,
    consoleWarnLevels: ["debug", "warn"],
  }),
);
rawLogger.exitOnError = false;

// The type of winston.LeveledLogMessage and winston.LogMessage is an interface
// of function overloads, so there is no way to extend it and also change the
// return type of those methods to accept error parameters. The underlying code
// handles every parameter type we pass.
export const logger: Logger = annotateDebugLines(expandErrors(rawLogger)) as unknown as Logger;

/**
 * Sets up logging to the remote-config-admin-debug.log file.
 */
export function useFileLogger(logFile?: string): string {
  const logFileName = logFile ?? findAvailableLogFile();
  logger.add(
    new winston.transports.File({
      level: "debug",
      filename: logFileName,
      format: winston.format.printf((info) => {
        return `[${info.level}] ${stripVTControlCharacters(segmentsOf(info).join(" "))}`;
      }),
    }),
  );
  return logFileName;
}

/**
 * Sets up logging to the command line.
 */
export function useConsoleLoggers(): void {
  if (process.env.DEBUG) {
    logger.add(
      new winston.transports.Console({
        level: "debug",
        format: winston.format.printf((info) => stripVTControlCharacters(segmentsOf(info).join(" "))),
      }),
    );
  } else if (process.env.REMOTE_CONFIG_ADMIN_LOG) {
    logger.add(
      new winston.transports.Console({
        level: "info",
        format: winston.format.printf((info) => {
          const splat = info[SPLAT];
          return [info.message, ...(Array.isArray(splat) ? splat : [])]
            .filter((chunk): chunk is string => typeof chunk === "string")
            .join(" ");
        }),
      }),
    );
  }
}
