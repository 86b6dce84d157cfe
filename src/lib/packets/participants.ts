import { array, record, text, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS } from "./limits";

export const PARTICIPANT_NAME_LENGTH = 48;

export interface ParticipantData {
  /** 1 = AI, 0 = human */
  aiControlled: number;
  /** 255 if network human */
  driverId: number;
  networkId: number;
  teamId: number;
  myTeam: number;
  raceNumber: number;
  nationality: number;
  /** UTF-8, NUL terminated; see decodeFixedText */
  name: Uint8Array;
  /** 0 = restricted, 1 = public */
  yourTelemetry: number;
}

export const participantData = record<ParticipantData>(
  "ParticipantData",
  (field) => ({
    aiControlled: field("aiControlled", uint8),
    driverId: field("driverId", uint8),
    networkId: field("networkId", uint8),
    teamId: field("teamId", uint8),
    myTeam: field("myTeam", uint8),
    raceNumber: field("raceNumber", uint8),
    nationality: field("nationality", uint8),
    name: field("name", text(PARTICIPANT_NAME_LENGTH)),
    yourTelemetry: field("yourTelemetry", uint8),
  }),
);

/** Packet 4. Who is in each car; `numActiveCars` slots are in use. */
export interface PacketParticipantsData {
  header: PacketHeader;
  numActiveCars: number;
  participants: ParticipantData[];
}

const allCars = array(participantData, MAX_CARS);

export const packetParticipantsData = record<PacketParticipantsData>(
  "PacketParticipantsData",
  (field) => ({
    header: field("header", packetHeader),
    numActiveCars: field("numActiveCars", uint8),
    participants: field("participants", allCars),
  }),
);
