import { array, float32, int8, record, uint16, uint8 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_CARS, WHEEL_COUNT } from "./limits";

export interface CarTelemetryData {
  /** km/h */
  speed: number;
  /** 0.0 to 1.0 */
  throttle: number;
  /** -1.0 (full lock left) to 1.0 (full lock right) */
  steer: number;
  brake: number;
  clutch: number;
  /** 1-8, N = 0, R = -1 */
  gear: number;
  engineRpm: number;
  drs: number;
  revLightsPercent: number;
  /** bit 0 = leftmost LED, bit 14 = rightmost LED */
  revLightsBitValue: number;
  brakesTemperature: number[];
  tyresSurfaceTemperature: number[];
  tyresInnerTemperature: number[];
  engineTemperature: number;
  tyresPressure: number[];
  surfaceType: number[];
}

export const carTelemetryData = record<CarTelemetryData>(
  "CarTelemetryData",
  (field) => ({
    speed: field("speed", uint16),
    throttle: field("throttle", float32),
    steer: field("steer", float32),
    brake: field("brake", float32),
    clutch: field("clutch", uint8),
    gear: field("gear", int8),
    engineRpm: field("engineRpm", uint16),
    drs: field("drs", uint8),
    revLightsPercent: field("revLightsPercent", uint8),
    revLightsBitValue: field("revLightsBitValue", uint16),
    brakesTemperature: field("brakesTemperature", array(uint16, WHEEL_COUNT)),
    tyresSurfaceTemperature: field(
      "tyresSurfaceTemperature",
      array(uint8, WHEEL_COUNT),
    ),
    tyresInnerTemperature: field(
      "tyresInnerTemperature",
      array(uint8, WHEEL_COUNT),
    ),
    engineTemperature: field("engineTemperature", uint16),
    tyresPressure: field("tyresPressure", array(float32, WHEEL_COUNT)),
    surfaceType: field("surfaceType", array(uint8, WHEEL_COUNT)),
  }),
);

/** Packet 6. Driver inputs and car temperatures for every car. */
export interface PacketCarTelemetryData {
  header: PacketHeader;
  carTelemetryData: CarTelemetryData[];
  /** 255 = MFD closed */
  mfdPanelIndex: number;
  mfdPanelIndexSecondaryPlayer: number;
  /** 1-8, 0 if no gear suggested */
  suggestedGear: number;
}

const allCars = array(carTelemetryData, MAX_CARS);

export const packetCarTelemetryData = record<PacketCarTelemetryData>(
  "PacketCarTelemetryData",
  (field) => ({
    header: field("header", packetHeader),
    carTelemetryData: field("carTelemetryData", allCars),
    mfdPanelIndex: field("mfdPanelIndex", uint8),
    mfdPanelIndexSecondaryPlayer: field("mfdPanelIndexSecondaryPlayer", uint8),
    suggestedGear: field("suggestedGear", int8),
  }),
);
