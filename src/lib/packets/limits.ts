/** Fixed array capacities of the 2021 packet format. */
export const MAX_CARS = 22;
export const MAX_MARSHAL_ZONES = 21;
export const MAX_WEATHER_FORECAST_SAMPLES = 56;
export const MAX_LAP_HISTORY = 100;
export const MAX_TYRE_STINTS = 8;
export const EVENT_CODE_LENGTH = 4;

/** Wheel arrays are ordered RL, RR, FL, FR. */
export const WHEEL_COUNT = 4;
