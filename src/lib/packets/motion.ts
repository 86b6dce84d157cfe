import { array, float32, int16, record } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS, WHEEL_COUNT } from "./limits";

export interface CarMotionData {
  worldPositionX: number;
  worldPositionY: number;
  worldPositionZ: number;
  worldVelocityX: number;
  worldVelocityY: number;
  worldVelocityZ: number;
  /** Direction vectors are normalised and scaled to int16 (divide by 32767). */
  worldForwardDirX: number;
  worldForwardDirY: number;
  worldForwardDirZ: number;
  worldRightDirX: number;
  worldRightDirY: number;
  worldRightDirZ: number;
  gForceLateral: number;
  gForceLongitudinal: number;
  gForceVertical: number;
  /** Radians */
  yaw: number;
  pitch: number;
  roll: number;
}

export const carMotionData = record<CarMotionData>("CarMotionData", (field) => ({
  worldPositionX: field("worldPositionX", float32),
  worldPositionY: field("worldPositionY", float32),
  worldPositionZ: field("worldPositionZ", float32),
  worldVelocityX: field("worldVelocityX", float32),
  worldVelocityY: field("worldVelocityY", float32),
  worldVelocityZ: field("worldVelocityZ", float32),
  worldForwardDirX: field("worldForwardDirX", int16),
  worldForwardDirY: field("worldForwardDirY", int16),
  worldForwardDirZ: field("worldForwardDirZ", int16),
  worldRightDirX: field("worldRightDirX", int16),
  worldRightDirY: field("worldRightDirY", int16),
  worldRightDirZ: field("worldRightDirZ", int16),
  gForceLateral: field("gForceLateral", float32),
  gForceLongitudinal: field("gForceLongitudinal", float32),
  gForceVertical: field("gForceVertical", float32),
  yaw: field("yaw", float32),
  pitch: field("pitch", float32),
  roll: field("roll", float32),
}));

/**
 * Packet 0. Motion for every car, plus player-car-only suspension and
 * local-frame data.
 */
export interface PacketMotionData {
  header: PacketHeader;
  carMotionData: CarMotionData[];
  // Player car only. Wheel order: RL, RR, FL, FR
  suspensionPosition: number[];
  suspensionVelocity: number[];
  suspensionAcceleration: number[];
  wheelSpeed: number[];
  wheelSlip: number[];
  localVelocityX: number;
  localVelocityY: number;
  localVelocityZ: number;
  angularVelocityX: number;
  angularVelocityY: number;
  angularVelocityZ: number;
  angularAccelerationX: number;
  angularAccelerationY: number;
  angularAccelerationZ: number;
  /** Current front wheels angle in radians */
  frontWheelsAngle: number;
}

const allCars = array(carMotionData, MAX_CARS);
const wheels = array(float32, WHEEL_COUNT);

export const packetMotionData = record<PacketMotionData>(
  "PacketMotionData",
  (field) => ({
    header: field("header", packetHeader),
    carMotionData: field("carMotionData", allCars),
    suspensionPosition: field("suspensionPosition", wheels),
    suspensionVelocity: field("suspensionVelocity", wheels),
    suspensionAcceleration: field("suspensionAcceleration", wheels),
    wheelSpeed: field("wheelSpeed", wheels),
    wheelSlip: field("wheelSlip", wheels),
    localVelocityX: field("localVelocityX", float32),
    localVelocityY: field("localVelocityY", float32),
    localVelocityZ: field("localVelocityZ", float32),
    angularVelocityX: field("angularVelocityX", float32),
    angularVelocityY: field("angularVelocityY", float32),
    angularVelocityZ: field("angularVelocityZ", float32),
    angularAccelerationX: field("angularAccelerationX", float32),
    angularAccelerationY: field("angularAccelerationY", float32),
    angularAccelerationZ: field("angularAccelerationZ", float32),
    frontWheelsAngle: field("frontWheelsAngle", float32),
  }),
);
