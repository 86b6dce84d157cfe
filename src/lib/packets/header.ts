/**
 * Common header carried at the front of every packet.
 *
 *   [0-1]   packetFormat (uint16, 2021)
 *   [2]     gameMajorVersion
 *   [3]     gameMinorVersion
 *   [4]     packetVersion
 *   [5]     packetId
 *   [6-13]  sessionUid (uint64)
 *   [14-17] sessionTime (float32, seconds)
 *   [18-21] frameIdentifier (uint32)
 *   [22]    playerCarIndex
 *   [23]    secondaryPlayerCarIndex (255 = no second player)
 */

import { float32, record, uint16, uint32, uint64, uint8 } from "./fields";

export const PACKET_FORMAT_2021 = 2021;

/** Splitscreen slot value when there is no second player. */
export const NO_SECONDARY_PLAYER = 255;

export interface PacketHeader {
  packetFormat: number;
  gameMajorVersion: number;
  gameMinorVersion: number;
  packetVersion: number;
  packetId: number;
  sessionUid: bigint;
  sessionTime: number;
  frameIdentifier: number;
  playerCarIndex: number;
  secondaryPlayerCarIndex: number;
}

/** Dispatch key: (packetFormat, packetVersion, packetId). */
export interface PacketKey {
  packetFormat: number;
  packetVersion: number;
  packetId: number;
}

export const packetHeader = record<PacketHeader>("PacketHeader", (field) => ({
  packetFormat: field("packetFormat", uint16),
  gameMajorVersion: field("gameMajorVersion", uint8),
  gameMinorVersion: field("gameMinorVersion", uint8),
  packetVersion: field("packetVersion", uint8),
  packetId: field("packetId", uint8),
  sessionUid: field("sessionUid", uint64),
  sessionTime: field("sessionTime", float32),
  frameIdentifier: field("frameIdentifier", uint32),
  playerCarIndex: field("playerCarIndex", uint8),
  secondaryPlayerCarIndex: field("secondaryPlayerCarIndex", uint8),
}));

export const PACKET_HEADER_SIZE = packetHeader.size;

export function decodeHeader(bytes: Uint8Array): PacketHeader {
  return packetHeader.decode(bytes);
}

export function headerKey(header: PacketHeader): PacketKey {
  return {
    packetFormat: header.packetFormat,
    packetVersion: header.packetVersion,
    packetId: header.packetId,
  };
}

/** Reads only the header of a datagram to decide which schema applies. */
export function peekHeader(bytes: Uint8Array): {
  header: PacketHeader;
  key: PacketKey;
} {
  const header = decodeHeader(bytes);
  return { header, key: headerKey(header) };
}
