import type { PacketKey } from "./header";

/**
 * Thrown when a buffer is shorter than a schema needs at some decode step.
 * Decoding never returns a partially filled record.
 */
export class TruncatedBufferError extends Error {
  readonly schema: string;
  readonly required: number;
  readonly actual: number;

  constructor(schema: string, required: number, actual: number) {
    super(`${schema}: need ${required} byte(s), buffer has ${actual}`);
    this.name = "TruncatedBufferError";
    this.schema = schema;
    this.required = required;
    this.actual = actual;
  }
}

/** Header triple with no registered packet type (unsupported game/protocol version). */
export class UnknownPacketError extends Error {
  readonly key: PacketKey;

  constructor(key: PacketKey) {
    super(
      `No packet registered for format=${key.packetFormat} version=${key.packetVersion} id=${key.packetId}`,
    );
    this.name = "UnknownPacketError";
    this.key = key;
  }
}

export class UnknownEventCodeError extends Error {
  readonly code: string;

  constructor(code: string) {
    super(`Unknown event code ${JSON.stringify(code)}`);
    this.name = "UnknownEventCodeError";
    this.code = code;
  }
}

export type PacketDecodeError =
  | TruncatedBufferError
  | UnknownPacketError
  | UnknownEventCodeError;

export function isPacketDecodeError(error: unknown): error is PacketDecodeError {
  return (
    error instanceof TruncatedBufferError ||
    error instanceof UnknownPacketError ||
    error instanceof UnknownEventCodeError
  );
}
