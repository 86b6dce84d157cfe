import { array, float64, record, uint32, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS, MAX_TYRE_STINTS } from "./limits";

export interface FinalClassificationData {
  position: number;
  numLaps: number;
  gridPosition: number;
  points: number;
  numPitStops: number;
  resultStatus: number;
  bestLapTimeInMs: number;
  /** Seconds, without penalties */
  totalRaceTime: number;
  penaltiesTime: number;
  numPenalties: number;
  numTyreStints: number;
  tyreStintsActual: number[];
  tyreStintsVisual: number[];
}

const stints = array(uint8, MAX_TYRE_STINTS);

export const finalClassificationData = record<FinalClassificationData>(
  "FinalClassificationData",
  (field) => ({
    position: field("position", uint8),
    numLaps: field("numLaps", uint8),
    gridPosition: field("gridPosition", uint8),
    points: field("points", uint8),
    numPitStops: field("numPitStops", uint8),
    resultStatus: field("resultStatus", uint8),
    bestLapTimeInMs: field("bestLapTimeInMs", uint32),
    totalRaceTime: field("totalRaceTime", float64),
    penaltiesTime: field("penaltiesTime", uint8),
    numPenalties: field("numPenalties", uint8),
    numTyreStints: field("numTyreStints", uint8),
    tyreStintsActual: field("tyreStintsActual", stints),
    tyreStintsVisual: field("tyreStintsVisual", stints),
  }),
);

/** Packet 8. Sent once at the end of a race. */
export interface PacketFinalClassificationData {
  header: PacketHeader;
  numCars: number;
  classificationData: FinalClassificationData[];
}

const allCars = array(finalClassificationData, MAX_CARS);

export const packetFinalClassificationData =
  record<PacketFinalClassificationData>(
    "PacketFinalClassificationData",
    (field) => ({
      header: field("header", packetHeader),
      numCars: field("numCars", uint8),
      classificationData: field("classificationData", allCars),
    }),
  );
