import { array, int8, record, uint16, uint32, uint8, float32 } from "./fields";
import { packetHeader, type PacketHeader } from "./header";
import { MAX_MARSHAL_ZONES, MAX_WEATHER_FORECAST_SAMPLES } from "./limits";

export interface MarshalZone {
  /** Fraction (0..1) of the lap where the zone starts */
  zoneStart: number;
  /** -1 = invalid/unknown, 0 = none, 1 = green, 2 = blue, 3 = yellow, 4 = red */
  zoneFlag: number;
}

export const marshalZone = record<MarshalZone>("MarshalZone", (field) => ({
  zoneStart: field("zoneStart", float32),
  zoneFlag: field("zoneFlag", int8),
}));

export interface WeatherForecastSample {
  sessionType: number;
  /** Minutes ahead the forecast is for */
  timeOffset: number;
  weather: number;
  trackTemperature: number;
  /** 0 = up, 1 = down, 2 = no change */
  trackTemperatureChange: number;
  airTemperature: number;
  airTemperatureChange: number;
  rainPercentage: number;
}

export const weatherForecastSample = record<WeatherForecastSample>(
  "WeatherForecastSample",
  (field) => ({
    sessionType: field("sessionType", uint8),
    timeOffset: field("timeOffset", uint8),
    weather: field("weather", uint8),
    trackTemperature: field("trackTemperature", int8),
    trackTemperatureChange: field("trackTemperatureChange", int8),
    airTemperature: field("airTemperature", int8),
    airTemperatureChange: field("airTemperatureChange", int8),
    rainPercentage: field("rainPercentage", uint8),
  }),
);

/**
 * Packet 1. Track, weather and assist state for the current session.
 *
 * Only the first `numMarshalZones` / `numWeatherForecastSamples` slots of the
 * fixed arrays are meaningful.
 */
export interface PacketSessionData {
  header: PacketHeader;
  /** 0 = clear, 1 = light cloud, 2 = overcast, 3 = light rain, 4 = heavy rain, 5 = storm */
  weather: number;
  trackTemperature: number;
  airTemperature: number;
  totalLaps: number;
  /** Metres */
  trackLength: number;
  sessionType: number;
  /** -1 for unknown */
  trackId: number;
  formula: number;
  sessionTimeLeft: number;
  sessionDuration: number;
  pitSpeedLimit: number;
  gamePaused: number;
  isSpectating: number;
  spectatorCarIndex: number;
  sliProNativeSupport: number;
  numMarshalZones: number;
  marshalZones: MarshalZone[];
  /** 0 = none, 1 = full, 2 = virtual, 3 = formation lap */
  safetyCarStatus: number;
  networkGame: number;
  numWeatherForecastSamples: number;
  weatherForecastSamples: WeatherForecastSample[];
  forecastAccuracy: number;
  aiDifficulty: number;
  seasonLinkIdentifier: number;
  weekendLinkIdentifier: number;
  sessionLinkIdentifier: number;
  pitStopWindowIdealLap: number;
  pitStopWindowLatestLap: number;
  pitStopRejoinPosition: number;
  steeringAssist: number;
  brakingAssist: number;
  gearboxAssist: number;
  pitAssist: number;
  pitReleaseAssist: number;
  ersAssist: number;
  drsAssist: number;
  dynamicRacingLine: number;
  dynamicRacingLineType: number;
}

const marshalZones = array(marshalZone, MAX_MARSHAL_ZONES);
const forecastSamples = array(
  weatherForecastSample,
  MAX_WEATHER_FORECAST_SAMPLES,
);

export const packetSessionData = record<PacketSessionData>(
  "PacketSessionData",
  (field) => ({
    header: field("header", packetHeader),
    weather: field("weather", uint8),
    trackTemperature: field("trackTemperature", int8),
    airTemperature: field("airTemperature", int8),
    totalLaps: field("totalLaps", uint8),
    trackLength: field("trackLength", uint16),
    sessionType: field("sessionType", uint8),
    trackId: field("trackId", int8),
    formula: field("formula", uint8),
    sessionTimeLeft: field("sessionTimeLeft", uint16),
    sessionDuration: field("sessionDuration", uint16),
    pitSpeedLimit: field("pitSpeedLimit", uint8),
    gamePaused: field("gamePaused", uint8),
    isSpectating: field("isSpectating", uint8),
    spectatorCarIndex: field("spectatorCarIndex", uint8),
    sliProNativeSupport: field("sliProNativeSupport", uint8),
    numMarshalZones: field("numMarshalZones", uint8),
    marshalZones: field("marshalZones", marshalZones),
    safetyCarStatus: field("safetyCarStatus", uint8),
    networkGame: field("networkGame", uint8),
    numWeatherForecastSamples: field("numWeatherForecastSamples", uint8),
    weatherForecastSamples: field("weatherForecastSamples", forecastSamples),
    forecastAccuracy: field("forecastAccuracy", uint8),
    aiDifficulty: field("aiDifficulty", uint8),
    seasonLinkIdentifier: field("seasonLinkIdentifier", uint32),
    weekendLinkIdentifier: field("weekendLinkIdentifier", uint32),
    sessionLinkIdentifier: field("sessionLinkIdentifier", uint32),
    pitStopWindowIdealLap: field("pitStopWindowIdealLap", uint8),
    pitStopWindowLatestLap: field("pitStopWindowLatestLap", uint8),
    pitStopRejoinPosition: field("pitStopRejoinPosition", uint8),
    steeringAssist: field("steeringAssist", uint8),
    brakingAssist: field("brakingAssist", uint8),
    gearboxAssist: field("gearboxAssist", uint8),
    pitAssist: field("pitAssist", uint8),
    pitReleaseAssist: field("pitReleaseAssist", uint8),
    ersAssist: field("ersAssist", uint8),
    drsAssist: field("drsAssist", uint8),
    dynamicRacingLine: field("dynamicRacingLine", uint8),
    dynamicRacingLineType: field("dynamicRacingLineType", uint8),
  }),
);
