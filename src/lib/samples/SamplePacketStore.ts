/**
 * Sample Packet Store
 *
 * Keeps one packet's bytes per packet type and persists them as
 * `<packet-name>.bin` files, e.g. `motion.bin`, `lapData.bin`. The capture
 * script stores each packet re-encoded from its decoded value, so bytes past
 * the packet size and a non-zero event tail are not kept. Used to refresh
 * recorded fixtures from a live game and to replay them offline.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { samplesLog } from "../logger";
import {
  PACKET_NAMES,
  createPacketRegistry,
  decodePacket,
  isPacketName,
  type DecodedPacket,
  type PacketName,
  type PacketRegistry,
} from "../packets/PacketRegistry";

export const SAMPLE_EXTENSION = ".bin";

export function sampleFileName(name: PacketName): string {
  return `${name}${SAMPLE_EXTENSION}`;
}

export class SamplePacketStore {
  private readonly samples = new Map<PacketName, Uint8Array>();

  constructor(
    readonly directory: string,
    private readonly registry: PacketRegistry = createPacketRegistry(),
  ) {}

  /**
   * Keeps `bytes` as the sample for its packet type (latest wins).
   * Throws the decode error when the datagram is not a known packet.
   */
  add(bytes: Uint8Array): PacketName {
    const { name } = decodePacket(bytes, this.registry);
    this.samples.set(name, bytes.slice());
    return name;
  }

  get(name: PacketName): Uint8Array | undefined {
    return this.samples.get(name);
  }

  names(): PacketName[] {
    return PACKET_NAMES.filter((name) => this.samples.has(name));
  }

  missing(): PacketName[] {
    return PACKET_NAMES.filter((name) => !this.samples.has(name));
  }

  isComplete(): boolean {
    return this.missing().length === 0;
  }

  /** Writes every held sample; returns the written file paths. */
  async save(): Promise<string[]> {
    await mkdir(this.directory, { recursive: true });
    const written: string[] = [];
    for (const name of this.names()) {
      const bytes = this.samples.get(name);
      if (!bytes) continue;
      const file = path.join(this.directory, sampleFileName(name));
      await writeFile(file, bytes);
      written.push(file);
    }
    samplesLog.info(`Saved ${written.length} sample(s) to ${this.directory}`);
    return written;
  }

  /**
   * Reads every `.bin` file in the directory and decodes it. Files whose
   * name is not a packet type are skipped.
   */
  async load(): Promise<Map<PacketName, DecodedPacket>> {
    const entries = await readdir(this.directory);
    const loaded = new Map<PacketName, DecodedPacket>();

    for (const entry of entries.sort()) {
      if (!entry.endsWith(SAMPLE_EXTENSION)) continue;
      const stem = entry.slice(0, -SAMPLE_EXTENSION.length);
      if (!isPacketName(stem)) {
        samplesLog.warn(`Skipping ${entry}: not a packet type`);
        continue;
      }

      const bytes = new Uint8Array(
        await readFile(path.join(this.directory, entry)),
      );
      const decoded = decodePacket(bytes, this.registry);
      if (decoded.name !== stem) {
        samplesLog.warn(`${entry} holds a ${decoded.name} packet`);
      }
      this.samples.set(decoded.name, bytes);
      loaded.set(decoded.name, decoded);
    }

    samplesLog.debug(`Loaded ${loaded.size} sample(s) from ${this.directory}`);
    return loaded;
  }
}
