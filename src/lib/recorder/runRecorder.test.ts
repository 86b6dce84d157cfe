import { afterEach, describe, expect, it, vi } from "vitest";
import { runRecorder, type PacketSource } from "./runRecorder";
import { TruncatedBufferError } from "../packets/errors";
import {
  createPacketRegistry,
  decodePacket,
  type DecodedPacket,
} from "../packets/PacketRegistry";
import { toText } from "../format/formatPacket";
import { blankPacketBytes } from "../../tests/fixtures";

const registry = createPacketRegistry();

/** Hands out scripted results, then fails. */
function scriptedSource(results: (DecodedPacket | Error)[]): PacketSource {
  const queue = [...results];
  return {
    receiveOne: vi.fn(async () => {
      const next = queue.shift();
      if (next === undefined) throw new Error("source drained");
      if (next instanceof Error) throw next;
      return next;
    }),
  };
}

describe("runRecorder", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints each packet and skips decode failures", async () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const motion = decodePacket(blankPacketBytes("motion"), registry);
    const session = decodePacket(blankPacketBytes("session"), registry);
    const write = vi.fn();

    const summary = await runRecorder({
      source: scriptedSource([
        motion,
        new TruncatedBufferError("PacketHeader", 24, 3),
        session,
      ]),
      write,
      limit: 2,
    });

    expect(summary).toEqual({ printed: 2, skipped: 1 });
    expect(write).toHaveBeenNthCalledWith(1, toText(motion));
    expect(write).toHaveBeenNthCalledWith(2, toText(session));
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("uses a custom formatter", async () => {
    const lapData = decodePacket(blankPacketBytes("lapData"), registry);
    const write = vi.fn();

    await runRecorder({
      source: scriptedSource([lapData]),
      write,
      limit: 1,
      format: (decoded) => decoded.name,
    });

    expect(write).toHaveBeenCalledWith("lapData");
  });

  it("propagates failures other than decode errors", async () => {
    await expect(
      runRecorder({
        source: scriptedSource([new Error("socket gone")]),
        write: vi.fn(),
      }),
    ).rejects.toThrow("socket gone");
  });

  it("does not receive once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const source = scriptedSource([]);

    const summary = await runRecorder({
      source,
      write: vi.fn(),
      signal: controller.signal,
    });

    expect(summary).toEqual({ printed: 0, skipped: 0 });
    expect(source.receiveOne).not.toHaveBeenCalled();
  });

  it("ends quietly when the source closes after abort", async () => {
    const controller = new AbortController();
    const source: PacketSource = {
      receiveOne: async () => {
        controller.abort();
        throw new Error("Listener closed");
      },
    };

    await expect(
      runRecorder({ source, write: vi.fn(), signal: controller.signal }),
    ).resolves.toEqual({ printed: 0, skipped: 0 });
  });
});
