import { recorderLog } from "../logger";
import { toText } from "../format/formatPacket";
import { isPacketDecodeError } from "../packets/errors";
import type { DecodedPacket } from "../packets/PacketRegistry";

/** Anything that hands out decoded packets one at a time. */
export interface PacketSource {
  receiveOne(): Promise<DecodedPacket>;
}

export interface RecorderOptions {
  source: PacketSource;
  write: (text: string) => void;
  /** Stops the loop; the caller closes the source to unblock a pending receive */
  signal?: AbortSignal;
  /** Stop after this many printed packets */
  limit?: number;
  format?: (decoded: DecodedPacket) => string;
}

export interface RecorderSummary {
  printed: number;
  skipped: number;
}

/**
 * Prints every decoded packet. Datagrams that fail to decode are logged and
 * skipped; any other failure ends the loop unless the signal was aborted.
 */
export async function runRecorder({
  source,
  write,
  signal,
  limit,
  format = toText,
}: RecorderOptions): Promise<RecorderSummary> {
  const summary: RecorderSummary = { printed: 0, skipped: 0 };

  while (!signal?.aborted && (limit === undefined || summary.printed < limit)) {
    let decoded: DecodedPacket;
    try {
      decoded = await source.receiveOne();
    } catch (err) {
      if (isPacketDecodeError(err)) {
        summary.skipped++;
        recorderLog.warn(`Skipping datagram: ${err.message}`);
        continue;
      }
      if (signal?.aborted) break;
      throw err;
    }

    write(format(decoded));
    summary.printed++;
  }

  recorderLog.debug(
    `Recorder stopped (${summary.printed} printed, ${summary.skipped} skipped)`,
  );
  return summary;
}
