/**
 * Packet Registry - header-keyed dispatch
 *
 * Maps (packetFormat, packetVersion, packetId) to the record codec of the
 * packet carried by a datagram. The table is built once and frozen; the
 * default table covers format 2021, packet version 1, ids 0..11.
 */

import { registryLog } from "../logger";
import type { RecordCodec } from "./fields";
import { UnknownPacketError } from "./errors";
import { PACKET_FORMAT_2021, peekHeader, type PacketKey } from "./header";
import { packetMotionData, type PacketMotionData } from "./motion";
import { packetSessionData, type PacketSessionData } from "./session";
import { packetLapData, type PacketLapData } from "./lapData";
import { packetEventData, type PacketEventData } from "./event";
import {
  packetParticipantsData,
  type PacketParticipantsData,
} from "./participants";
import { packetCarSetupData, type PacketCarSetupData } from "./carSetup";
import {
  packetCarTelemetryData,
  type PacketCarTelemetryData,
} from "./carTelemetry";
import { packetCarStatusData, type PacketCarStatusData } from "./carStatus";
import {
  packetFinalClassificationData,
  type PacketFinalClassificationData,
} from "./finalClassification";
import { packetLobbyInfoData, type PacketLobbyInfoData } from "./lobbyInfo";
import { packetCarDamageData, type PacketCarDamageData } from "./carDamage";
import {
  packetSessionHistoryData,
  type PacketSessionHistoryData,
} from "./sessionHistory";

export const PACKET_VERSION_1 = 1;

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export interface PacketMap {
  motion: PacketMotionData;
  session: PacketSessionData;
  lapData: PacketLapData;
  event: PacketEventData;
  participants: PacketParticipantsData;
  carSetups: PacketCarSetupData;
  carTelemetry: PacketCarTelemetryData;
  carStatus: PacketCarStatusData;
  finalClassification: PacketFinalClassificationData;
  lobbyInfo: PacketLobbyInfoData;
  carDamage: PacketCarDamageData;
  sessionHistory: PacketSessionHistoryData;
}

export type PacketName = keyof PacketMap;

export interface DecodedPacketOf<N extends PacketName> {
  name: N;
  packet: PacketMap[N];
}

/** A decoded datagram, tagged with the packet type it was decoded as. */
export type DecodedPacket = {
  [N in PacketName]: DecodedPacketOf<N>;
}[PacketName];

export const PACKET_CODECS: {
  readonly [N in PacketName]: RecordCodec<PacketMap[N]>;
} = {
  motion: packetMotionData,
  session: packetSessionData,
  lapData: packetLapData,
  event: packetEventData,
  participants: packetParticipantsData,
  carSetups: packetCarSetupData,
  carTelemetry: packetCarTelemetryData,
  carStatus: packetCarStatusData,
  finalClassification: packetFinalClassificationData,
  lobbyInfo: packetLobbyInfoData,
  carDamage: packetCarDamageData,
  sessionHistory: packetSessionHistoryData,
};

/** Packet ids in wire order (index = packetId). */
export const PACKET_NAMES: readonly PacketName[] = Object.freeze([
  "motion",
  "session",
  "lapData",
  "event",
  "participants",
  "carSetups",
  "carTelemetry",
  "carStatus",
  "finalClassification",
  "lobbyInfo",
  "carDamage",
  "sessionHistory",
]);

export function isPacketName(value: string): value is PacketName {
  return PACKET_NAMES.some((name) => name === value);
}

export function codecFor<N extends PacketName>(
  name: N,
): RecordCodec<PacketMap[N]> {
  return PACKET_CODECS[name];
}

type PacketDecoder<N extends PacketName> = (
  bytes: Uint8Array,
) => DecodedPacketOf<N>;

function decoderFor<N extends PacketName>(name: N): PacketDecoder<N> {
  const codec = codecFor(name);
  return (bytes) => ({ name, packet: codec.decode(bytes) });
}

const DECODERS: { readonly [N in PacketName]: PacketDecoder<N> } = {
  motion: decoderFor("motion"),
  session: decoderFor("session"),
  lapData: decoderFor("lapData"),
  event: decoderFor("event"),
  participants: decoderFor("participants"),
  carSetups: decoderFor("carSetups"),
  carTelemetry: decoderFor("carTelemetry"),
  carStatus: decoderFor("carStatus"),
  finalClassification: decoderFor("finalClassification"),
  lobbyInfo: decoderFor("lobbyInfo"),
  carDamage: decoderFor("carDamage"),
  sessionHistory: decoderFor("sessionHistory"),
};

/** One registry row: a header key and the packet decoded for it. */
export interface PacketType {
  readonly name: PacketName;
  readonly key: PacketKey;
  readonly size: number;
  decode(bytes: Uint8Array): DecodedPacket;
}

export function packetType(name: PacketName, key: PacketKey): PacketType {
  return Object.freeze({
    name,
    key: Object.freeze({ ...key }),
    size: PACKET_CODECS[name].size,
    decode: (bytes: Uint8Array) => DECODERS[name](bytes),
  });
}

// ============================================================================
// REGISTRY
// ============================================================================

function keyString(key: PacketKey): string {
  return `${key.packetFormat}:${key.packetVersion}:${key.packetId}`;
}

export class PacketRegistry {
  private readonly rows: ReadonlyMap<string, PacketType>;

  constructor(types: readonly PacketType[]) {
    const rows = new Map<string, PacketType>();
    for (const type of types) {
      const id = keyString(type.key);
      const existing = rows.get(id);
      if (existing) {
        throw new Error(
          `Duplicate packet registration for ${id}: ${existing.name} and ${type.name}`,
        );
      }
      rows.set(id, type);
    }
    this.rows = rows;
    registryLog.debug(`Registered ${rows.size} packet type(s)`);
  }

  /** Throws UnknownPacketError when no row matches. */
  lookup(key: PacketKey): PacketType {
    const type = this.rows.get(keyString(key));
    if (!type) {
      throw new UnknownPacketError(key);
    }
    return type;
  }

  has(key: PacketKey): boolean {
    return this.rows.has(keyString(key));
  }

  types(): PacketType[] {
    return [...this.rows.values()];
  }

  get size(): number {
    return this.rows.size;
  }
}

/** Rows of the 2021 game, packet version 1. */
export function packetTypes2021(): PacketType[] {
  return PACKET_NAMES.map((name, packetId) =>
    packetType(name, {
      packetFormat: PACKET_FORMAT_2021,
      packetVersion: PACKET_VERSION_1,
      packetId,
    }),
  );
}

export function createPacketRegistry(
  extra: readonly PacketType[] = [],
): PacketRegistry {
  return new PacketRegistry([...packetTypes2021(), ...extra]);
}

// ============================================================================
// DECODE / ENCODE
// ============================================================================

/**
 * Decodes one datagram. The header is peeked to pick the packet type, then
 * the whole buffer (header included) is decoded by that type's codec.
 */
export function decodePacket(
  bytes: Uint8Array,
  registry: PacketRegistry,
): DecodedPacket {
  const { key } = peekHeader(bytes);
  return registry.lookup(key).decode(bytes);
}

function encodeAs<N extends PacketName>(decoded: DecodedPacketOf<N>): Uint8Array {
  return codecFor(decoded.name).encode(decoded.packet);
}

export function encodePacket(decoded: DecodedPacket): Uint8Array {
  return encodeAs(decoded);
}

export function isPacket<N extends PacketName>(
  decoded: DecodedPacket,
  name: N,
): decoded is Extract<DecodedPacket, { name: N }> {
  return decoded.name === name;
}

/** Narrows a decoded packet to the expected type, or throws. */
export function packetAs<N extends PacketName>(
  decoded: DecodedPacket,
  name: N,
): Extract<DecodedPacket, { name: N }>["packet"] {
  if (!isPacket(decoded, name)) {
    throw new TypeError(`Expected a ${name} packet, got ${decoded.name}`);
  }
  return decoded.packet;
}
