// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import pino from "pino";
import type { Logger, DestinationStream, LoggerOptions as PinoOptions } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type { Logger };

/**
 * Configuration options for creating a pino logger instance.
 *
 * @property level - Log severity threshold. Messages below this level are suppressed.
 * @property name - Logger name included in every log entry.
 * @property pretty - Enable pino-pretty for human-readable output. Defaults to true in non-production.
 */
export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const DEFAULT_NAME = "tier-orchestrator";

const REDACT = {
  paths: [
    "*.password",
    "*.token",
    "*.secret",
    "*.signature",
    "*.authorization",
  ],
  censor: "[REDACTED]",
};

let logDestination: DestinationStream | undefined;

/**
 * Redirect all logger output to a file. Used by `serve --log-file` so the
 * process can run detached without a terminal.
 */
export function redirectLogToFile(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  logDestination = pino.destination({ dest: filePath, sync: false });
  const opts: PinoOptions = {
    name: logger.bindings()["name"] ?? DEFAULT_NAME,
    level: logger.level,
    redact: REDACT,
  };
  const newLogger = pino(opts, logDestination);
  // Child loggers created afterwards inherit the new destination via the parent
  Object.assign(logger, newLogger);
}

/** Change the level of the shared logger (config `logging.level`). */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a new pino logger with the given options.
 *
 * Sensitive fields (password, token, secret, signature, authorization) are
 * redacted. If {@link redirectLogToFile} was called, the logger writes to the
 * file destination instead of stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    name = DEFAULT_NAME,
    pretty = process.env["NODE_ENV"] !== "production",
  } = options;

  const transport = !logDestination && pretty
    ? { target: "pino-pretty", options: { colorize: true } }
    : undefined;

  const pinoOptions: PinoOptions = {
    name,
    level,
    transport,
    redact: REDACT,
  };

  return logDestination ? pino(pinoOptions, logDestination) : pino(pinoOptions);
}

/** Default logger instance for convenience. */
export const logger = createLogger();
