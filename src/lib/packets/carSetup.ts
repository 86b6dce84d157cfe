import { array, float32, record, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS } from "./limits";

export interface CarSetupData {
  frontWing: number;
  rearWing: number;
  /** Differential adjustment on throttle (percentage) */
  onThrottle: number;
  offThrottle: number;
  frontCamber: number;
  rearCamber: number;
  frontToe: number;
  rearToe: number;
  frontSuspension: number;
  rearSuspension: number;
  frontAntiRollBar: number;
  rearAntiRollBar: number;
  frontSuspensionHeight: number;
  rearSuspensionHeight: number;
  brakePressure: number;
  brakeBias: number;
  /** PSI */
  rearLeftTyrePressure: number;
  rearRightTyrePressure: number;
  frontLeftTyrePressure: number;
  frontRightTyrePressure: number;
  ballast: number;
  fuelLoad: number;
}

export const carSetupData = record<CarSetupData>("CarSetupData", (field) => ({
  frontWing: field("frontWing", uint8),
  rearWing: field("rearWing", uint8),
  onThrottle: field("onThrottle", uint8),
  offThrottle: field("offThrottle", uint8),
  frontCamber: field("frontCamber", float32),
  rearCamber: field("rearCamber", float32),
  frontToe: field("frontToe", float32),
  rearToe: field("rearToe", float32),
  frontSuspension: field("frontSuspension", uint8),
  rearSuspension: field("rearSuspension", uint8),
  frontAntiRollBar: field("frontAntiRollBar", uint8),
  rearAntiRollBar: field("rearAntiRollBar", uint8),
  frontSuspensionHeight: field("frontSuspensionHeight", uint8),
  rearSuspensionHeight: field("rearSuspensionHeight", uint8),
  brakePressure: field("brakePressure", uint8),
  brakeBias: field("brakeBias", uint8),
  rearLeftTyrePressure: field("rearLeftTyrePressure", float32),
  rearRightTyrePressure: field("rearRightTyrePressure", float32),
  frontLeftTyrePressure: field("frontLeftTyrePressure", float32),
  frontRightTyrePressure: field("frontRightTyrePressure", float32),
  ballast: field("ballast", uint8),
  fuelLoad: field("fuelLoad", float32),
}));

/** Packet 5. Car setups; other players' setups are zeroed in multiplayer. */
export interface PacketCarSetupData {
  header: PacketHeader;
  carSetups: CarSetupData[];
}

const allCars = array(carSetupData, MAX_CARS);

export const packetCarSetupData = record<PacketCarSetupData>(
  "PacketCarSetupData",
  (field) => ({
    header: field("header", packetHeader),
    carSetups: field("carSetups", allCars),
  }),
);
