/**
 * Datagram builders shared by the test suites.
 */

import { viewOf } from "../lib/packets/fields";
import {
  NO_SECONDARY_PLAYER,
  PACKET_FORMAT_2021,
  PACKET_HEADER_SIZE,
  packetHeader,
  type PacketHeader,
} from "../lib/packets/header";
import {
  PACKET_NAMES,
  codecFor,
  type PacketName,
} from "../lib/packets/PacketRegistry";

export function makeHeader(overrides: Partial<PacketHeader> = {}): PacketHeader {
  return {
    ...packetHeader.blank(),
    packetFormat: PACKET_FORMAT_2021,
    gameMajorVersion: 1,
    gameMinorVersion: 3,
    packetVersion: 1,
    secondaryPlayerCarIndex: NO_SECONDARY_PLAYER,
    ...overrides,
  };
}

export function packetIdOf(name: PacketName): number {
  return PACKET_NAMES.indexOf(name);
}

/** Schema default body with the given header fields. */
export function blankPacketBytes<N extends PacketName>(
  name: N,
  header: Partial<PacketHeader> = {},
): Uint8Array {
  const codec = codecFor(name);
  return codec.encode({
    ...codec.blank(),
    header: makeHeader({ packetId: packetIdOf(name), ...header }),
  });
}

/**
 * Body filled with a repeating pattern that never forms a NaN or negative
 * float. Event packets carry a speed trap with a zero tail.
 */
export function patternedPacketBytes(name: PacketName): Uint8Array {
  const size = codecFor(name).size;
  const bytes = Uint8Array.from({ length: size }, (_, i) => (i * 37 + 11) % 64);
  packetHeader.write(
    viewOf(bytes),
    0,
    makeHeader({ packetId: packetIdOf(name), frameIdentifier: 42 }),
  );
  if (name === "event") {
    bytes.set(new TextEncoder().encode("SPTP"), PACKET_HEADER_SIZE);
    bytes[size - 1] = 0;
  }
  return bytes;
}
