import { array, record, uint16, uint32, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_LAP_HISTORY, MAX_TYRE_STINTS } from "./limits";

export const LAP_VALID = 0x01;
export const SECTOR1_VALID = 0x02;
export const SECTOR2_VALID = 0x04;
export const SECTOR3_VALID = 0x08;

export interface LapHistoryData {
  lapTimeInMs: number;
  sector1TimeInMs: number;
  sector2TimeInMs: number;
  sector3TimeInMs: number;
  /** LAP_VALID | SECTORn_VALID bits */
  lapValidBitFlags: number;
}

export const lapHistoryData = record<LapHistoryData>(
  "LapHistoryData",
  (field) => ({
    lapTimeInMs: field("lapTimeInMs", uint32),
    sector1TimeInMs: field("sector1TimeInMs", uint16),
    sector2TimeInMs: field("sector2TimeInMs", uint16),
    sector3TimeInMs: field("sector3TimeInMs", uint16),
    lapValidBitFlags: field("lapValidBitFlags", uint8),
  }),
);

export interface TyreStintHistoryData {
  /** 255 while the stint is the current tyre */
  endLap: number;
  tyreActualCompound: number;
  tyreVisualCompound: number;
}

export const tyreStintHistoryData = record<TyreStintHistoryData>(
  "TyreStintHistoryData",
  (field) => ({
    endLap: field("endLap", uint8),
    tyreActualCompound: field("tyreActualCompound", uint8),
    tyreVisualCompound: field("tyreVisualCompound", uint8),
  }),
);

/**
 * Packet 11. Lap and tyre history for a single car (`carIdx`). The game
 * cycles through the cars, one packet each.
 */
export interface PacketSessionHistoryData {
  header: PacketHeader;
  carIdx: number;
  /** Includes the current partial lap */
  numLaps: number;
  numTyreStints: number;
  bestLapTimeLapNum: number;
  bestSector1LapNum: number;
  bestSector2LapNum: number;
  bestSector3LapNum: number;
  lapHistoryData: LapHistoryData[];
  tyreStintsHistoryData: TyreStintHistoryData[];
}

const laps = array(lapHistoryData, MAX_LAP_HISTORY);
const stints = array(tyreStintHistoryData, MAX_TYRE_STINTS);

export const packetSessionHistoryData = record<PacketSessionHistoryData>(
  "PacketSessionHistoryData",
  (field) => ({
    header: field("header", packetHeader),
    carIdx: field("carIdx", uint8),
    numLaps: field("numLaps", uint8),
    numTyreStints: field("numTyreStints", uint8),
    bestLapTimeLapNum: field("bestLapTimeLapNum", uint8),
    bestSector1LapNum: field("bestSector1LapNum", uint8),
    bestSector2LapNum: field("bestSector2LapNum", uint8),
    bestSector3LapNum: field("bestSector3LapNum", uint8),
    lapHistoryData: field("lapHistoryData", laps),
    tyreStintsHistoryData: field("tyreStintsHistoryData", stints),
  }),
);
