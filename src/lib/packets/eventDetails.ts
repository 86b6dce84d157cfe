/**
 * Event detail payload: one of several shapes overlaying the same 8-byte
 * region of the Event packet. The shape is chosen by the packet's 4-letter
 * event code, never by anything inside the region.
 *
 * Decoding keeps the bytes past the resolved shape in `trailing`.
 * Encoding always zero-fills them.
 */

import {
  float32,
  record,
  uint32,
  uint8,
  viewOf,
  type Codec,
  type RecordCodec,
} from "./fields";
import { TruncatedBufferError, UnknownEventCodeError } from "./errors";

export interface FastestLap {
  vehicleIdx: number;
  /** Seconds */
  lapTime: number;
}

export interface Retirement {
  vehicleIdx: number;
}

export interface TeamMateInPits {
  vehicleIdx: number;
}

export interface RaceWinner {
  vehicleIdx: number;
}

export interface Penalty {
  penaltyType: number;
  infringementType: number;
  vehicleIdx: number;
  otherVehicleIdx: number;
  /** Time gained, or time spent doing the action, in seconds */
  time: number;
  lapNum: number;
  placesGained: number;
}

export interface SpeedTrap {
  vehicleIdx: number;
  /** km/h */
  speed: number;
  overallFastestInSession: number;
  driverFastestInSession: number;
}

export interface StartLights {
  numLights: number;
}

export interface DriveThroughPenaltyServed {
  vehicleIdx: number;
}

export interface StopGoPenaltyServed {
  vehicleIdx: number;
}

export interface Flashback {
  flashbackFrameIdentifier: number;
  flashbackSessionTime: number;
}

export interface Buttons {
  /** Bit flags of the buttons currently pressed */
  buttonStatus: number;
}

/** Events such as SSTA or CHQF carry no payload. */
export type NoDetails = Record<string, never>;

export const fastestLap = record<FastestLap>("FastestLap", (field) => ({
  vehicleIdx: field("vehicleIdx", uint8),
  lapTime: field("lapTime", float32),
}));

export const retirement = record<Retirement>("Retirement", (field) => ({
  vehicleIdx: field("vehicleIdx", uint8),
}));

export const teamMateInPits = record<TeamMateInPits>(
  "TeamMateInPits",
  (field) => ({
    vehicleIdx: field("vehicleIdx", uint8),
  }),
);

export const raceWinner = record<RaceWinner>("RaceWinner", (field) => ({
  vehicleIdx: field("vehicleIdx", uint8),
}));

export const penalty = record<Penalty>("Penalty", (field) => ({
  penaltyType: field("penaltyType", uint8),
  infringementType: field("infringementType", uint8),
  vehicleIdx: field("vehicleIdx", uint8),
  otherVehicleIdx: field("otherVehicleIdx", uint8),
  time: field("time", uint8),
  lapNum: field("lapNum", uint8),
  placesGained: field("placesGained", uint8),
}));

export const speedTrap = record<SpeedTrap>("SpeedTrap", (field) => ({
  vehicleIdx: field("vehicleIdx", uint8),
  speed: field("speed", float32),
  overallFastestInSession: field("overallFastestInSession", uint8),
  driverFastestInSession: field("driverFastestInSession", uint8),
}));

export const startLights = record<StartLights>("StartLights", (field) => ({
  numLights: field("numLights", uint8),
}));

export const driveThroughPenaltyServed = record<DriveThroughPenaltyServed>(
  "DriveThroughPenaltyServed",
  (field) => ({
    vehicleIdx: field("vehicleIdx", uint8),
  }),
);

export const stopGoPenaltyServed = record<StopGoPenaltyServed>(
  "StopGoPenaltyServed",
  (field) => ({
    vehicleIdx: field("vehicleIdx", uint8),
  }),
);

export const flashback = record<Flashback>("Flashback", (field) => ({
  flashbackFrameIdentifier: field("flashbackFrameIdentifier", uint32),
  flashbackSessionTime: field("flashbackSessionTime", float32),
}));

export const buttons = record<Buttons>("Buttons", (field) => ({
  buttonStatus: field("buttonStatus", uint32),
}));

export const noDetails = record<NoDetails>("NoDetails", () => ({}));

export interface EventDetailShapes {
  none: NoDetails;
  fastestLap: FastestLap;
  retirement: Retirement;
  teamMateInPits: TeamMateInPits;
  raceWinner: RaceWinner;
  penalty: Penalty;
  speedTrap: SpeedTrap;
  startLights: StartLights;
  driveThroughPenaltyServed: DriveThroughPenaltyServed;
  stopGoPenaltyServed: StopGoPenaltyServed;
  flashback: Flashback;
  buttons: Buttons;
}

export type EventDetailShape = keyof EventDetailShapes;

export interface EventDetailsOf<S extends EventDetailShape> {
  shape: S;
  data: EventDetailShapes[S];
  /** Region bytes past the shape, as received. Not interpreted, not re-encoded. */
  trailing: Uint8Array;
}

export type EventDetails = {
  [S in EventDetailShape]: EventDetailsOf<S>;
}[EventDetailShape];

const SHAPE_CODECS: {
  readonly [S in EventDetailShape]: RecordCodec<EventDetailShapes[S]>;
} = {
  none: noDetails,
  fastestLap,
  retirement,
  teamMateInPits,
  raceWinner,
  penalty,
  speedTrap,
  startLights,
  driveThroughPenaltyServed,
  stopGoPenaltyServed,
  flashback,
  buttons,
};

/** Size of the shared region: the largest shape (Flashback). */
export const EVENT_DETAILS_SIZE = Math.max(
  ...Object.values(SHAPE_CODECS).map((codec) => codec.size),
);

export const EVENT_CODES = {
  SESSION_STARTED: "SSTA",
  SESSION_ENDED: "SEND",
  FASTEST_LAP: "FTLP",
  RETIREMENT: "RTMT",
  DRS_ENABLED: "DRSE",
  DRS_DISABLED: "DRSD",
  TEAM_MATE_IN_PITS: "TMPT",
  CHEQUERED_FLAG: "CHQF",
  RACE_WINNER: "RCWN",
  PENALTY_ISSUED: "PENA",
  SPEED_TRAP: "SPTP",
  START_LIGHTS: "STLG",
  LIGHTS_OUT: "LGOT",
  DRIVE_THROUGH_SERVED: "DTSV",
  STOP_GO_SERVED: "SGSV",
  FLASHBACK: "FLBK",
  BUTTON_STATUS: "BUTN",
} as const;

export type EventCode = (typeof EVENT_CODES)[keyof typeof EVENT_CODES];

export const EVENT_CODE_SHAPES: ReadonlyMap<string, EventDetailShape> =
  new Map<EventCode, EventDetailShape>([
    [EVENT_CODES.SESSION_STARTED, "none"],
    [EVENT_CODES.SESSION_ENDED, "none"],
    [EVENT_CODES.FASTEST_LAP, "fastestLap"],
    [EVENT_CODES.RETIREMENT, "retirement"],
    [EVENT_CODES.DRS_ENABLED, "none"],
    [EVENT_CODES.DRS_DISABLED, "none"],
    [EVENT_CODES.TEAM_MATE_IN_PITS, "teamMateInPits"],
    [EVENT_CODES.CHEQUERED_FLAG, "none"],
    [EVENT_CODES.RACE_WINNER, "raceWinner"],
    [EVENT_CODES.PENALTY_ISSUED, "penalty"],
    [EVENT_CODES.SPEED_TRAP, "speedTrap"],
    [EVENT_CODES.START_LIGHTS, "startLights"],
    [EVENT_CODES.LIGHTS_OUT, "none"],
    [EVENT_CODES.DRIVE_THROUGH_SERVED, "driveThroughPenaltyServed"],
    [EVENT_CODES.STOP_GO_SERVED, "stopGoPenaltyServed"],
    [EVENT_CODES.FLASHBACK, "flashback"],
    [EVENT_CODES.BUTTON_STATUS, "buttons"],
  ]);

export function shapeForCode(code: string): EventDetailShape {
  const shape = EVENT_CODE_SHAPES.get(code);
  if (shape === undefined) {
    throw new UnknownEventCodeError(code);
  }
  return shape;
}

export function shapeCodec<S extends EventDetailShape>(
  shape: S,
): RecordCodec<EventDetailShapes[S]> {
  return SHAPE_CODECS[shape];
}

type ShapeReader<S extends EventDetailShape> = (
  view: DataView,
  offset: number,
  trailing: Uint8Array,
) => EventDetailsOf<S>;

function readerFor<S extends EventDetailShape>(shape: S): ShapeReader<S> {
  const codec = shapeCodec(shape);
  return (view, offset, trailing) => ({
    shape,
    data: codec.read(view, offset),
    trailing,
  });
}

const READERS: { readonly [S in EventDetailShape]: ShapeReader<S> } = {
  none: readerFor("none"),
  fastestLap: readerFor("fastestLap"),
  retirement: readerFor("retirement"),
  teamMateInPits: readerFor("teamMateInPits"),
  raceWinner: readerFor("raceWinner"),
  penalty: readerFor("penalty"),
  speedTrap: readerFor("speedTrap"),
  startLights: readerFor("startLights"),
  driveThroughPenaltyServed: readerFor("driveThroughPenaltyServed"),
  stopGoPenaltyServed: readerFor("stopGoPenaltyServed"),
  flashback: readerFor("flashback"),
  buttons: readerFor("buttons"),
};

function readEventDetails(
  view: DataView,
  offset: number,
  code: string,
): EventDetails {
  const shape = shapeForCode(code);
  if (offset + EVENT_DETAILS_SIZE > view.byteLength) {
    throw new TruncatedBufferError(
      "EventDetails",
      offset + EVENT_DETAILS_SIZE,
      view.byteLength,
    );
  }
  const used = SHAPE_CODECS[shape].size;
  const trailing = new Uint8Array(
    view.buffer,
    view.byteOffset + offset + used,
    EVENT_DETAILS_SIZE - used,
  ).slice();
  return READERS[shape](view, offset, trailing);
}

function writeEventDetails<S extends EventDetailShape>(
  view: DataView,
  offset: number,
  details: EventDetailsOf<S>,
): void {
  const codec = shapeCodec(details.shape);
  codec.write(view, offset, details.data);
  new Uint8Array(
    view.buffer,
    view.byteOffset + offset + codec.size,
    EVENT_DETAILS_SIZE - codec.size,
  ).fill(0);
}

/** Builds a details value for a shape, with a zeroed tail. */
export function createEventDetails<S extends EventDetailShape>(
  shape: S,
  data: EventDetailShapes[S],
): EventDetailsOf<S> {
  return {
    shape,
    data,
    trailing: new Uint8Array(EVENT_DETAILS_SIZE - SHAPE_CODECS[shape].size),
  };
}

/**
 * Field codec for the details region of an Event packet whose code is
 * `code`. Encoding rejects details whose shape does not match the code.
 */
export function eventDetailsFor(code: string): Codec<EventDetails> {
  return {
    size: EVENT_DETAILS_SIZE,
    shape: { kind: "eventDetails" },
    read: (view, offset) => readEventDetails(view, offset, code),
    write: (view, offset, value) => {
      const expected = shapeForCode(code);
      if (value.shape !== expected) {
        throw new TypeError(
          `Event ${code} carries ${expected} details, got ${value.shape}`,
        );
      }
      writeEventDetails(view, offset, value);
    },
    blank: () => {
      const shape = shapeForCode(code);
      const zeroed = new Uint8Array(EVENT_DETAILS_SIZE);
      return READERS[shape](
        viewOf(zeroed),
        0,
        zeroed.slice(SHAPE_CODECS[shape].size),
      );
    },
  };
}

export function decodeEventDetails(
  bytes: Uint8Array,
  code: string,
): EventDetails {
  return readEventDetails(viewOf(bytes), 0, code);
}

export function encodeEventDetails(details: EventDetails): Uint8Array {
  const out = new Uint8Array(EVENT_DETAILS_SIZE);
  writeEventDetails(viewOf(out), 0, details);
  return out;
}
