/**
 * Prefixed console logging for the decoder, listener and scripts.
 *
 * Threshold:
 * - F1_TELEMETRY_LOG_LEVEL when set (debug | info | warn | error | silent)
 * - otherwise warnings and errors only with NODE_ENV=production
 * - otherwise everything
 *
 * Usage:
 *   import { listenerLog } from './logger';
 *   listenerLog.debug('Datagram', bytes.length);  // Hidden below debug
 *   listenerLog.warn('Queue overflow');           // Visible unless silent
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const ENV_LOG_LEVEL = "F1_TELEMETRY_LOG_LEVEL";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const requested = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  if (requested && isLogLevel(requested)) return requested;
  return env.NODE_ENV === "production" ? "warn" : "debug";
}

let threshold: LogLevel = resolveLogLevel();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

export interface Logger {
  readonly prefix: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  /** Timestamped */
  error(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

export function createLogger(prefix: string): Logger {
  return {
    prefix,

    debug(message, ...args) {
      if (enabled("debug")) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message, ...args) {
      if (enabled("info")) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    warn(message, ...args) {
      if (enabled("warn")) {
        console.warn(formatMessage(prefix, message, false), ...args);
      }
    },

    error(message, ...args) {
      if (enabled("error")) {
        console.error(formatMessage(prefix, message, true), ...args);
      }
    },

    child(subPrefix) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

// Pre-configured loggers
export const log = createLogger("Telemetry");
export const listenerLog = createLogger("Listener");
export const registryLog = createLogger("Registry");
export const recorderLog = createLogger("Recorder");
export const samplesLog = createLogger("Samples");

export default log;
