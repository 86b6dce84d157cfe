import { array, float32, int8, record, uint16, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS } from "./limits";

export interface CarStatusData {
  /** 0 = off, 1 = medium, 2 = full */
  tractionControl: number;
  antiLockBrakes: number;
  /** 0 = lean, 1 = standard, 2 = rich, 3 = max */
  fuelMix: number;
  frontBrakeBias: number;
  pitLimiterStatus: number;
  fuelInTank: number;
  fuelCapacity: number;
  fuelRemainingLaps: number;
  maxRpm: number;
  idleRpm: number;
  maxGears: number;
  drsAllowed: number;
  /** 0 = DRS not available, otherwise metres until available */
  drsActivationDistance: number;
  actualTyreCompound: number;
  visualTyreCompound: number;
  tyresAgeLaps: number;
  /** -1 = invalid/unknown, 0 = none, 1 = green, 2 = blue, 3 = yellow, 4 = red */
  vehicleFiaFlags: number;
  /** Joules */
  ersStoreEnergy: number;
  /** 0 = none, 1 = medium, 2 = hotlap, 3 = overtake */
  ersDeployMode: number;
  ersHarvestedThisLapMguk: number;
  ersHarvestedThisLapMguh: number;
  ersDeployedThisLap: number;
  networkPaused: number;
}

export const carStatusData = record<CarStatusData>("CarStatusData", (field) => ({
  tractionControl: field("tractionControl", uint8),
  antiLockBrakes: field("antiLockBrakes", uint8),
  fuelMix: field("fuelMix", uint8),
  frontBrakeBias: field("frontBrakeBias", uint8),
  pitLimiterStatus: field("pitLimiterStatus", uint8),
  fuelInTank: field("fuelInTank", float32),
  fuelCapacity: field("fuelCapacity", float32),
  fuelRemainingLaps: field("fuelRemainingLaps", float32),
  maxRpm: field("maxRpm", uint16),
  idleRpm: field("idleRpm", uint16),
  maxGears: field("maxGears", uint8),
  drsAllowed: field("drsAllowed", uint8),
  drsActivationDistance: field("drsActivationDistance", uint16),
  actualTyreCompound: field("actualTyreCompound", uint8),
  visualTyreCompound: field("visualTyreCompound", uint8),
  tyresAgeLaps: field("tyresAgeLaps", uint8),
  vehicleFiaFlags: field("vehicleFiaFlags", int8),
  ersStoreEnergy: field("ersStoreEnergy", float32),
  ersDeployMode: field("ersDeployMode", uint8),
  ersHarvestedThisLapMguk: field("ersHarvestedThisLapMguk", float32),
  ersHarvestedThisLapMguh: field("ersHarvestedThisLapMguh", float32),
  ersDeployedThisLap: field("ersDeployedThisLap", float32),
  networkPaused: field("networkPaused", uint8),
}));

/** Packet 7. */
export interface PacketCarStatusData {
  header: PacketHeader;
  carStatusData: CarStatusData[];
}

const allCars = array(carStatusData, MAX_CARS);

export const packetCarStatusData = record<PacketCarStatusData>(
  "PacketCarStatusData",
  (field) => ({
    header: field("header", packetHeader),
    carStatusData: field("carStatusData", allCars),
  }),
);
