import { ascii, record } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { EVENT_CODES, eventDetailsFor, type EventDetails } from "./eventDetails";
import { EVENT_CODE_LENGTH } from "./limits";

/**
 * Packet 3. Notable session events. The details region is interpreted
 * according to `eventStringCode`.
 */
export interface PacketEventData {
  header: PacketHeader;
  eventStringCode: string;
  eventDetails: EventDetails;
}

const eventCode = ascii(EVENT_CODE_LENGTH, EVENT_CODES.SESSION_STARTED);

export const packetEventData = record<PacketEventData>(
  "PacketEventData",
  (field) => {
    const header = field("header", packetHeader);
    const eventStringCode = field("eventStringCode", eventCode);
    const eventDetails = field(
      "eventDetails",
      eventDetailsFor(eventStringCode),
    );
    return { header, eventStringCode, eventDetails };
  },
);
