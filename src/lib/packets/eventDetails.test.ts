import { describe, it, expect } from "vitest";
import {
  EVENT_DETAILS_SIZE,
  createEventDetails,
  decodeEventDetails,
  encodeEventDetails,
  shapeForCode,
  type EventDetailShape,
} from "./eventDetails";
import { packetEventData } from "./event";
import { UnknownEventCodeError } from "./errors";
import { formatEventDetails } from "../format/formatPacket";
import { makeHeader } from "../../tests/fixtures";

function region(fill: (view: DataView) => void): Uint8Array {
  const bytes = new Uint8Array(EVENT_DETAILS_SIZE);
  fill(new DataView(bytes.buffer));
  return bytes;
}

interface ShapeCase {
  code: string;
  shape: EventDetailShape;
  bytes: Uint8Array;
  data: Record<string, number>;
}

const shapeCases: ShapeCase[] = [
  {
    code: "FTLP",
    shape: "fastestLap",
    bytes: region((v) => {
      v.setUint8(0, 3);
      v.setFloat32(1, 85.5, true);
    }),
    data: { vehicleIdx: 3, lapTime: 85.5 },
  },
  {
    code: "RTMT",
    shape: "retirement",
    bytes: region((v) => v.setUint8(0, 7)),
    data: { vehicleIdx: 7 },
  },
  {
    code: "TMPT",
    shape: "teamMateInPits",
    bytes: region((v) => v.setUint8(0, 2)),
    data: { vehicleIdx: 2 },
  },
  {
    code: "RCWN",
    shape: "raceWinner",
    bytes: region((v) => v.setUint8(0, 1)),
    data: { vehicleIdx: 1 },
  },
  {
    code: "PENA",
    shape: "penalty",
    bytes: region((v) => [1, 2, 3, 4, 5, 6, 7].forEach((x, i) => v.setUint8(i, x))),
    data: {
      penaltyType: 1,
      infringementType: 2,
      vehicleIdx: 3,
      otherVehicleIdx: 4,
      time: 5,
      lapNum: 6,
      placesGained: 7,
    },
  },
  {
    code: "SPTP",
    shape: "speedTrap",
    bytes: region((v) => {
      v.setUint8(0, 4);
      v.setFloat32(1, 312.5, true);
      v.setUint8(5, 1);
      v.setUint8(6, 0);
    }),
    data: {
      vehicleIdx: 4,
      speed: 312.5,
      overallFastestInSession: 1,
      driverFastestInSession: 0,
    },
  },
  {
    code: "STLG",
    shape: "startLights",
    bytes: region((v) => v.setUint8(0, 3)),
    data: { numLights: 3 },
  },
  {
    code: "DTSV",
    shape: "driveThroughPenaltyServed",
    bytes: region((v) => v.setUint8(0, 9)),
    data: { vehicleIdx: 9 },
  },
  {
    code: "SGSV",
    shape: "stopGoPenaltyServed",
    bytes: region((v) => v.setUint8(0, 10)),
    data: { vehicleIdx: 10 },
  },
  {
    code: "FLBK",
    shape: "flashback",
    bytes: region((v) => {
      v.setUint32(0, 1234, true);
      v.setFloat32(4, 45.25, true);
    }),
    data: { flashbackFrameIdentifier: 1234, flashbackSessionTime: 45.25 },
  },
  {
    code: "BUTN",
    shape: "buttons",
    bytes: region((v) => v.setUint32(0, 0x401, true)),
    data: { buttonStatus: 1025 },
  },
];

describe("event detail union", () => {
  it("is as large as the largest shape", () => {
    expect(EVENT_DETAILS_SIZE).toBe(8);
  });

  it.each(shapeCases)("resolves $code to $shape", ({ code, shape, bytes, data }) => {
    const details = decodeEventDetails(bytes, code);

    expect(details.shape).toBe(shape);
    expect(details.data).toEqual(data);
    expect(Object.keys(formatEventDetails(details))).toEqual(Object.keys(data));
    expect(encodeEventDetails(details)).toEqual(bytes);
  });

  it.each(["SSTA", "SEND", "DRSE", "DRSD", "CHQF", "LGOT"])(
    "%s carries no payload",
    (code) => {
      const bytes = region((v) => v.setUint8(0, 99));
      const details = decodeEventDetails(bytes, code);

      expect(details.shape).toBe("none");
      expect(formatEventDetails(details)).toEqual({});
      expect(Array.from(details.trailing)).toEqual([99, 0, 0, 0, 0, 0, 0, 0]);
    },
  );

  it("keeps bytes past the shape but zero-fills them on encode", () => {
    const bytes = region((v) => {
      v.setUint8(0, 3);
      v.setFloat32(1, 85.5, true);
      v.setUint8(5, 9);
      v.setUint8(7, 9);
    });
    const details = decodeEventDetails(bytes, "FTLP");

    expect(Array.from(details.trailing)).toEqual([9, 0, 9]);
    expect(Array.from(encodeEventDetails(details).subarray(5))).toEqual([0, 0, 0]);
  });

  it("rejects unknown codes", () => {
    expect(() => decodeEventDetails(new Uint8Array(8), "XXXX")).toThrow(
      UnknownEventCodeError,
    );
    expect(() => shapeForCode("ftlp")).toThrow('Unknown event code "ftlp"');
  });
});

describe("packetEventData", () => {
  it("is 36 bytes", () => {
    expect(packetEventData.size).toBe(36);
  });

  it("decodes details according to the code", () => {
    const bytes = packetEventData.encode({
      header: makeHeader({ packetId: 3 }),
      eventStringCode: "RCWN",
      eventDetails: createEventDetails("raceWinner", { vehicleIdx: 11 }),
    });

    const packet = packetEventData.decode(bytes);
    expect(packet.eventStringCode).toBe("RCWN");
    expect(packet.eventDetails.shape).toBe("raceWinner");
    expect(packet.eventDetails.data).toEqual({ vehicleIdx: 11 });
    expect(bytes[28]).toBe(11);
  });

  it("propagates an unknown code from packet decode", () => {
    const bytes = packetEventData.encode(packetEventData.blank());
    bytes.set([0x4e, 0x4f, 0x50, 0x45], 24);

    expect(() => packetEventData.decode(bytes)).toThrow(UnknownEventCodeError);
  });

  it("refuses details that do not match the code", () => {
    expect(() =>
      packetEventData.encode({
        header: makeHeader({ packetId: 3 }),
        eventStringCode: "FTLP",
        eventDetails: createEventDetails("buttons", { buttonStatus: 1 }),
      }),
    ).toThrow(TypeError);
  });

  it("defaults to a session-started event", () => {
    const blank = packetEventData.blank();
    expect(blank.eventStringCode).toBe("SSTA");
    expect(blank.eventDetails.shape).toBe("none");
    expect(packetEventData.decode(packetEventData.encode(blank))).toEqual(blank);
  });
});
