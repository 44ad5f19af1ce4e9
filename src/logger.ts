import * as winston from "winston";
import * as path from "path";
import * as fs from "fs";
import { SPLAT } from "triple-beam";
import { stripVTControlCharacters } from "util";

import { tryStringify } from "./utils";

const LOG_FILE_PREFIX = "dbadmin-debug";

/**
 * Folds the extra arguments of a call such as `logger.debug("Retrying task", name)`
 * into the message.
 */
const joinArgs = winston.format((info) => {
  const splat: unknown = info[SPLAT];
  const extra = Array.isArray(splat) ? splat.map(tryStringify) : [];
  info.message = stripVTControlCharacters([tryStringify(info.message), ...extra].join(" "));
  return info;
});

function debugFormat(withLevel: boolean): winston.Logform.Format {
  return winston.format.combine(
    winston.format.errors({ stack: true }),
    joinArgs(),
    winston.format.timestamp(),
    winston.format.printf((info) => {
      const text = tryStringify(info.stack ?? info.message);
      const line = `[${tryStringify(info.timestamp)}] ${text}`;
      return withLevel ? `[${info.level}] ${line}` : line;
    }),
  );
}

/**
 * Library logger. It writes nowhere until the application calls useFileLogger or
 * useConsoleLoggers.
 */
export const logger: winston.Logger = winston.createLogger({
  exitOnError: false,
  transports: [new winston.transports.Console({ silent: true })],
});

/**
 * First of dbadmin-debug.log, dbadmin-debug.1.log, ... dbadmin-debug.9.log in the
 * working directory that is missing or writable.
 */
export function findAvailableLogFile(): string {
  const names = [`${LOG_FILE_PREFIX}.log`];
  for (let i = 1; i < 10; i++) {
    names.push(`${LOG_FILE_PREFIX}.${i}.log`);
  }

  for (const name of names) {
    const candidate = path.join(process.cwd(), name);
    try {
      fs.accessSync(candidate, fs.constants.W_OK);
      return candidate;
    } catch (e: unknown) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        return candidate;
      }
      // Not writable; try the next name.
    }
  }
  throw new Error(`Unable to find a writable ${LOG_FILE_PREFIX}.log`);
}

/**
 * Appends every debug line, request and response bodies included, to a log file.
 * @return the file being written.
 */
export function useFileLogger(logFile?: string): string {
  const filename = logFile ?? findAvailableLogFile();
  logger.add(new winston.transports.File({ level: "debug", filename, format: debugFormat(true) }));
  return filename;
}

/**
 * Logs to stderr: everything when DEBUG is set, info and above when DBADMIN_LOG_CONSOLE is.
 */
export function useConsoleLoggers(): void {
  if (process.env.DEBUG) {
    logger.add(
      new winston.transports.Console({
        level: "debug",
        stderrLevels: ["error", "warn", "info", "debug"],
        format: debugFormat(false),
      }),
    );
  } else if (process.env.DBADMIN_LOG_CONSOLE) {
    logger.add(
      new winston.transports.Console({
        level: "info",
        stderrLevels: ["error", "warn", "info"],
        format: winston.format.combine(
          joinArgs(),
          winston.format.printf((info) => tryStringify(info.message)),
        ),
      }),
    );
  }
}
