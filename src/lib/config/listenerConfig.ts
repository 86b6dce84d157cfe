/**
 * Listener configuration.
 *
 * The game sends to UDP 20777 by default. The receive size covers the
 * largest 2021 packet (Motion, 1464 bytes) with headroom.
 */

import { log } from "../logger";

export const DEFAULT_TELEMETRY_PORT = 20777;
/** All interfaces */
export const DEFAULT_TELEMETRY_HOST = "0.0.0.0";
export const MAX_DATAGRAM_SIZE = 2048;
export const MAX_PENDING_DATAGRAMS = 1024;
/** Datagrams the capture script reads before giving up */
export const DEFAULT_CAPTURE_LIMIT = 100000;

export const ENV_TELEMETRY_HOST = "F1_TELEMETRY_HOST";
export const ENV_TELEMETRY_PORT = "F1_TELEMETRY_PORT";

export interface ListenerConfig {
  host: string;
  port: number;
  /** Datagrams longer than this are cut before decoding */
  maxDatagramSize: number;
  /** Datagrams queued while nobody is receiving; oldest dropped past this */
  maxPendingDatagrams: number;
}

export const DEFAULT_LISTENER_CONFIG: Readonly<ListenerConfig> = Object.freeze(
  {
    host: DEFAULT_TELEMETRY_HOST,
    port: DEFAULT_TELEMETRY_PORT,
    maxDatagramSize: MAX_DATAGRAM_SIZE,
    maxPendingDatagrams: MAX_PENDING_DATAGRAMS,
  },
);

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_TELEMETRY_PORT;
  const trimmed = raw.trim();
  const port = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!isValidPort(port)) {
    log.warn(
      `Ignoring ${ENV_TELEMETRY_PORT}=${JSON.stringify(raw)}; using ${DEFAULT_TELEMETRY_PORT}`,
    );
    return DEFAULT_TELEMETRY_PORT;
  }
  return port;
}

/** Positive integer count from a command-line argument, else the default. */
export function parseCaptureLimit(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_CAPTURE_LIMIT;
  const trimmed = raw.trim();
  const limit = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isSafeInteger(limit) || limit < 1) {
    log.warn(
      `Ignoring datagram limit ${JSON.stringify(raw)}; using ${DEFAULT_CAPTURE_LIMIT}`,
    );
    return DEFAULT_CAPTURE_LIMIT;
  }
  return limit;
}

/** Reads host/port overrides from the environment. */
export function resolveListenerConfig(
  env: Record<string, string | undefined> = process.env,
): ListenerConfig {
  const host = env[ENV_TELEMETRY_HOST]?.trim();
  return {
    ...DEFAULT_LISTENER_CONFIG,
    host: host ? host : DEFAULT_TELEMETRY_HOST,
    port: parsePort(env[ENV_TELEMETRY_PORT]),
  };
}
