// src/utils/log.ts
import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
} from "pino";
import envPaths from "env-paths";
import { join } from "node:path";
import { validateLogLevel } from "./type-guards.js";

export interface LogConfig {
  level?: LevelWithSilent;
  toFile?: boolean;
}

/**
 * Path to the log file used by the pino/file transport.
 */
export function getLogFilePath(): string {
  return join(envPaths("whitespace-format", { suffix: "" }).log, "debug.log");
}

function destinations(toFile: boolean, logFile: string) {
  const targets: Array<{ target: string; options?: Record<string, unknown> }> =
    [];

  // stdout carries the report, so diagnostics go to stderr
  if (process.stderr.isTTY) {
    targets.push({
      target: "pino-pretty",
      options: { colorize: true, destination: 2 },
    });
  } else {
    targets.push({ target: "pino/file", options: { destination: 2 } });
  }

  if (toFile) {
    targets.push({
      target: "pino/file",
      options: { destination: logFile, mkdir: true },
    });
  }

  return { targets };
}

export function createLogger(cfg: LogConfig = {}): Logger {
  const envLevel = validateLogLevel(process.env.LOG_LEVEL);
  const level = cfg.level ?? envLevel ?? "silent";
  if (level === "silent") return pino({ level: "silent" });

  const toFile = cfg.toFile ?? process.env.LOG_TO_FILE === "1";

  return pino({ level }, sharedTransport(toFile));
}

// One worker thread per destination set, shared by every logger built here.
const transports = new Map<boolean, DestinationStream>();

function sharedTransport(toFile: boolean): DestinationStream {
  const existing = transports.get(toFile);
  if (existing) return existing;
  const stream = pino.transport(destinations(toFile, getLogFilePath()));
  transports.set(toFile, stream);
  return stream;
}

export let rootLogger: Logger = createLogger();

/**
 * Replaces the root logger, e.g. when `--verbose` raises the level.
 * Loggers obtained earlier from {@link getLogger} keep the old settings.
 * The transport worker is reused, so repeated calls start no new threads.
 */
export function configureLogger(cfg: LogConfig): Logger {
  rootLogger = createLogger(cfg);
  return rootLogger;
}

export const getLogger = (module: string): Logger =>
  rootLogger.child({ module });
