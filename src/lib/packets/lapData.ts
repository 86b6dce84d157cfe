import { array, float32, record, uint16, uint32, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS } from "./limits";

export interface LapData {
  lastLapTimeInMs: number;
  currentLapTimeInMs: number;
  sector1TimeInMs: number;
  sector2TimeInMs: number;
  /** Metres around the current lap; negative before the line is crossed */
  lapDistance: number;
  totalDistance: number;
  /** Seconds */
  safetyCarDelta: number;
  carPosition: number;
  currentLapNum: number;
  /** 0 = none, 1 = pitting, 2 = in pit area */
  pitStatus: number;
  numPitStops: number;
  /** 0 = sector1, 1 = sector2, 2 = sector3 */
  sector: number;
  currentLapInvalid: number;
  penalties: number;
  warnings: number;
  numUnservedDriveThroughPens: number;
  numUnservedStopGoPens: number;
  gridPosition: number;
  /** 0 = in garage, 1 = flying lap, 2 = in lap, 3 = out lap, 4 = on track */
  driverStatus: number;
  /**
   * 0 = invalid, 1 = inactive, 2 = active, 3 = finished, 4 = did not finish,
   * 5 = disqualified, 6 = not classified, 7 = retired
   */
  resultStatus: number;
  pitLaneTimerActive: number;
  pitLaneTimeInLaneInMs: number;
  pitStopTimerInMs: number;
  pitStopShouldServePen: number;
}

export const lapData = record<LapData>("LapData", (field) => ({
  lastLapTimeInMs: field("lastLapTimeInMs", uint32),
  currentLapTimeInMs: field("currentLapTimeInMs", uint32),
  sector1TimeInMs: field("sector1TimeInMs", uint16),
  sector2TimeInMs: field("sector2TimeInMs", uint16),
  lapDistance: field("lapDistance", float32),
  totalDistance: field("totalDistance", float32),
  safetyCarDelta: field("safetyCarDelta", float32),
  carPosition: field("carPosition", uint8),
  currentLapNum: field("currentLapNum", uint8),
  pitStatus: field("pitStatus", uint8),
  numPitStops: field("numPitStops", uint8),
  sector: field("sector", uint8),
  currentLapInvalid: field("currentLapInvalid", uint8),
  penalties: field("penalties", uint8),
  warnings: field("warnings", uint8),
  numUnservedDriveThroughPens: field("numUnservedDriveThroughPens", uint8),
  numUnservedStopGoPens: field("numUnservedStopGoPens", uint8),
  gridPosition: field("gridPosition", uint8),
  driverStatus: field("driverStatus", uint8),
  resultStatus: field("resultStatus", uint8),
  pitLaneTimerActive: field("pitLaneTimerActive", uint8),
  pitLaneTimeInLaneInMs: field("pitLaneTimeInLaneInMs", uint16),
  pitStopTimerInMs: field("pitStopTimerInMs", uint16),
  pitStopShouldServePen: field("pitStopShouldServePen", uint8),
}));

/** Packet 2. Lap timing for every car on track. */
export interface PacketLapData {
  header: PacketHeader;
  lapData: LapData[];
}

const allCars = array(lapData, MAX_CARS);

export const packetLapData = record<PacketLapData>("PacketLapData", (field) => ({
  header: field("header", packetHeader),
  lapData: field("lapData", allCars),
}));
