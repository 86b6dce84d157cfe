import { array, record, text, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS } from "./limits";

export const LOBBY_NAME_LENGTH = 48;

export interface LobbyInfoData {
  aiControlled: number;
  /** 255 if no team selected yet */
  teamId: number;
  nationality: number;
  name: Uint8Array;
  carNumber: number;
  /** 0 = not ready, 1 = ready, 2 = spectating */
  readyStatus: number;
}

export const lobbyInfoData = record<LobbyInfoData>("LobbyInfoData", (field) => ({
  aiControlled: field("aiControlled", uint8),
  teamId: field("teamId", uint8),
  nationality: field("nationality", uint8),
  name: field("name", text(LOBBY_NAME_LENGTH)),
  carNumber: field("carNumber", uint8),
  readyStatus: field("readyStatus", uint8),
}));

/** Packet 9. Players in a multiplayer lobby. */
export interface PacketLobbyInfoData {
  header: PacketHeader;
  numPlayers: number;
  lobbyPlayers: LobbyInfoData[];
}

const allCars = array(lobbyInfoData, MAX_CARS);

export const packetLobbyInfoData = record<PacketLobbyInfoData>(
  "PacketLobbyInfoData",
  (field) => ({
    header: field("header", packetHeader),
    numPlayers: field("numPlayers", uint8),
    lobbyPlayers: field("lobbyPlayers", allCars),
  }),
);
