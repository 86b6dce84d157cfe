import { array, float32, record, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS, WHEEL_COUNT } from "./limits";

// All damage and wear values are percentages.
export interface CarDamageData {
  tyresWear: number[];
  tyresDamage: number[];
  brakesDamage: number[];
  frontLeftWingDamage: number;
  frontRightWingDamage: number;
  rearWingDamage: number;
  floorDamage: number;
  diffuserDamage: number;
  sidepodDamage: number;
  /** 0 = OK, 1 = fault */
  drsFault: number;
  gearBoxDamage: number;
  engineDamage: number;
  engineMguhWear: number;
  engineEsWear: number;
  engineCeWear: number;
  engineIceWear: number;
  engineMgukWear: number;
  engineTcWear: number;
}

export const carDamageData = record<CarDamageData>("CarDamageData", (field) => ({
  tyresWear: field("tyresWear", array(float32, WHEEL_COUNT)),
  tyresDamage: field("tyresDamage", array(uint8, WHEEL_COUNT)),
  brakesDamage: field("brakesDamage", array(uint8, WHEEL_COUNT)),
  frontLeftWingDamage: field("frontLeftWingDamage", uint8),
  frontRightWingDamage: field("frontRightWingDamage", uint8),
  rearWingDamage: field("rearWingDamage", uint8),
  floorDamage: field("floorDamage", uint8),
  diffuserDamage: field("diffuserDamage", uint8),
  sidepodDamage: field("sidepodDamage", uint8),
  drsFault: field("drsFault", uint8),
  gearBoxDamage: field("gearBoxDamage", uint8),
  engineDamage: field("engineDamage", uint8),
  engineMguhWear: field("engineMguhWear", uint8),
  engineEsWear: field("engineEsWear", uint8),
  engineCeWear: field("engineCeWear", uint8),
  engineIceWear: field("engineIceWear", uint8),
  engineMgukWear: field("engineMgukWear", uint8),
  engineTcWear: field("engineTcWear", uint8),
}));

/** Packet 10. */
export interface PacketCarDamageData {
  header: PacketHeader;
  carDamageData: CarDamageData[];
}

const allCars = array(carDamageData, MAX_CARS);

export const packetCarDamageData = record<PacketCarDamageData>(
  "PacketCarDamageData",
  (field) => ({
    header: field("header", packetHeader),
    carDamageData: field("carDamageData", allCars),
  }),
);
