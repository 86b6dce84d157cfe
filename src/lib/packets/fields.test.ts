import { describe, it, expect } from "vitest";
import {
  array,
  ascii,
  float32,
  int8,
  record,
  text,
  uint16,
  uint64,
  uint8,
  viewOf,
} from "./fields";
import { TruncatedBufferError } from "./errors";

interface Sample {
  flag: number;
  count: number;
  ratio: number;
}

const sample = record<Sample>("Sample", (field) => ({
  flag: field("flag", uint8),
  count: field("count", uint16),
  ratio: field("ratio", float32),
}));

describe("record", () => {
  it("computes size and offsets from the layout", () => {
    expect(sample.size).toBe(7);
    expect(sample.fields.map((f) => [f.name, f.offset])).toEqual([
      ["flag", 0],
      ["count", 1],
      ["ratio", 3],
    ]);
    expect(Object.isFrozen(sample.fields)).toBe(true);
  });

  it("reads little-endian without padding", () => {
    const bytes = new Uint8Array([0x01, 0x34, 0x12, 0, 0, 0x20, 0x41]);
    expect(sample.decode(bytes)).toEqual({ flag: 1, count: 0x1234, ratio: 10 });
  });

  it("encodes to exactly size bytes", () => {
    const bytes = sample.encode({ flag: 255, count: 513, ratio: -2 });
    expect(Array.from(bytes)).toEqual([255, 0x01, 0x02, 0, 0, 0, 0xc0]);
  });

  it("rejects a short buffer before reading anything", () => {
    expect(() => sample.decode(new Uint8Array(6))).toThrow(TruncatedBufferError);
    try {
      sample.decode(new Uint8Array(6));
    } catch (err) {
      expect(err).toMatchObject({ schema: "Sample", required: 7, actual: 6 });
    }
  });

  it("names the field that runs past the view", () => {
    expect(() => sample.read(viewOf(new Uint8Array(4)), 0)).toThrow(
      "Sample.ratio: need 7 byte(s), buffer has 4",
    );
  });

  it("blank() is the zero value", () => {
    expect(sample.blank()).toEqual({ flag: 0, count: 0, ratio: 0 });
  });

  it("nests records and arrays", () => {
    interface Outer {
      tag: number;
      items: Sample[];
    }
    const outer = record<Outer>("Outer", (field) => ({
      tag: field("tag", int8),
      items: field("items", array(sample, 3)),
    }));

    expect(outer.size).toBe(1 + 3 * 7);

    const value: Outer = {
      tag: -3,
      items: [
        { flag: 1, count: 2, ratio: 0.5 },
        { flag: 3, count: 4, ratio: 1.5 },
        { flag: 5, count: 6, ratio: 2.5 },
      ],
    };
    expect(outer.decode(outer.encode(value))).toEqual(value);
  });
});

describe("NaN floats", () => {
  // float32 0x7f800001, little-endian
  const signallingNan = [0x01, 0x00, 0x80, 0x7f];

  it("writes back the exact bits of a NaN field", () => {
    const bytes = new Uint8Array([7, 0, 0, ...signallingNan]);
    const decoded = sample.decode(bytes);

    expect(decoded.ratio).toBeNaN();
    expect(Array.from(sample.encode(decoded))).toEqual(Array.from(bytes));
  });

  it("writes back the exact bits of a NaN array element", () => {
    const pair = array(float32, 2);
    const bytes = new Uint8Array([0, 0, 0x80, 0x3f, ...signallingNan]);
    const decoded = pair.read(viewOf(bytes), 0);

    expect(decoded[0]).toBe(1);
    expect(decoded[1]).toBeNaN();

    const out = new Uint8Array(8);
    pair.write(viewOf(out), 0, decoded);
    expect(Array.from(out)).toEqual(Array.from(bytes));
  });

  it("encodes a replaced value normally", () => {
    const decoded = sample.decode(new Uint8Array([7, 0, 0, ...signallingNan]));
    decoded.ratio = 2;

    expect(Array.from(sample.encode(decoded))).toEqual([7, 0, 0, 0, 0, 0, 0x40]);
  });
});

describe("array", () => {
  it("refuses to encode the wrong number of elements", () => {
    const pair = array(uint8, 2);
    const view = viewOf(new Uint8Array(2));
    expect(() => pair.write(view, 0, [1])).toThrow(RangeError);
    expect(() => pair.write(view, 0, [1, 2, 3])).toThrow(RangeError);
  });
});

describe("text", () => {
  it("returns a copy of the field bytes", () => {
    const source = new Uint8Array([65, 66, 0, 0]);
    const value = text(4).read(viewOf(source), 0);
    source[0] = 90;
    expect(Array.from(value)).toEqual([65, 66, 0, 0]);
  });

  it("pads short values with NUL and rejects long ones", () => {
    const field = text(4);
    const target = new Uint8Array([9, 9, 9, 9]);
    field.write(viewOf(target), 0, new Uint8Array([1, 2]));
    expect(Array.from(target)).toEqual([1, 2, 0, 0]);
    expect(() =>
      field.write(viewOf(target), 0, new Uint8Array(5)),
    ).toThrow(RangeError);
  });
});

describe("ascii", () => {
  it("reads and writes fixed-length codes", () => {
    const code = ascii(4, "NONE");
    const bytes = new Uint8Array(4);
    code.write(viewOf(bytes), 0, "FTLP");
    expect(Array.from(bytes)).toEqual([0x46, 0x54, 0x4c, 0x50]);
    expect(code.read(viewOf(bytes), 0)).toBe("FTLP");
    expect(code.blank()).toBe("NONE");
    expect(() => code.write(viewOf(bytes), 0, "FTL")).toThrow(RangeError);
  });
});

describe("uint64", () => {
  it("keeps the full 64-bit range", () => {
    const bytes = new Uint8Array(8);
    const value = 2n ** 63n + 5n;
    uint64.write(viewOf(bytes), 0, value);
    expect(bytes[0]).toBe(5);
    expect(bytes[7]).toBe(0x80);
    expect(uint64.read(viewOf(bytes), 0)).toBe(value);
  });
});
