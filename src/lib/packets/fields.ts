/**
 * Field engine for fixed-layout, little-endian, tightly packed records.
 *
 * Every record is described once by a layout function that names its fields
 * in wire order. The same layout drives four passes:
 *   - describe: builds the static field table and the fixed size
 *   - read:     decodes a record from a DataView at an offset
 *   - write:    encodes a record into a DataView at an offset
 *   - blank:    builds the default value of the schema
 *
 * Sizes are computed at construction and never per instance.
 *
 * A NaN read from a float field keeps its raw bits beside the decoded record
 * or array, and those bits are written back while the value is still NaN.
 * Signalling NaNs do not survive conversion to a JS number otherwise.
 */

import { TruncatedBufferError } from "./errors";

export type ScalarType =
  | "uint8"
  | "int8"
  | "uint16"
  | "int16"
  | "uint32"
  | "float32"
  | "float64"
  | "uint64";

export interface Field {
  readonly name: string;
  readonly offset: number;
  readonly codec: Codec<unknown>;
}

export type CodecShape =
  | { readonly kind: "scalar"; readonly type: ScalarType }
  | { readonly kind: "text" }
  | { readonly kind: "ascii" }
  | {
      readonly kind: "array";
      readonly element: Codec<unknown>;
      readonly length: number;
    }
  | {
      readonly kind: "record";
      readonly name: string;
      readonly fields: readonly Field[];
    }
  | { readonly kind: "eventDetails" };

export interface Codec<T> {
  readonly size: number;
  readonly shape: CodecShape;
  read(view: DataView, offset: number): T;
  write(view: DataView, offset: number, value: T): void;
  blank(): T;
}

export interface RecordCodec<T> extends Codec<T> {
  readonly name: string;
  readonly fields: readonly Field[];
  decode(bytes: Uint8Array): T;
  encode(value: T): Uint8Array;
}

/** Visits one field: reads, writes or describes it depending on the pass. */
export type FieldVisitor<T> = <K extends keyof T & string>(
  name: K,
  codec: Codec<T[K]>,
) => T[K];

export type Layout<T> = (field: FieldVisitor<T>) => T;

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// ============================================================================
// NAN BITS
// ============================================================================

type NanBits = Map<string | number, Uint8Array>;

const nanBitsOf = new WeakMap<object, NanBits>();

function isFloat(codec: Codec<unknown>): boolean {
  return (
    codec.shape.kind === "scalar" &&
    (codec.shape.type === "float32" || codec.shape.type === "float64")
  );
}

function keepNanBits(
  kept: NanBits,
  key: string | number,
  codec: Codec<unknown>,
  value: unknown,
  view: DataView,
  offset: number,
): void {
  if (isFloat(codec) && Number.isNaN(value)) {
    kept.set(key, bytesAt(view, offset, codec.size).slice());
  }
}

function attachNanBits<T>(container: T, kept: NanBits): T {
  if (kept.size > 0 && typeof container === "object" && container !== null) {
    nanBitsOf.set(container, kept);
  }
  return container;
}

function keptBitsFor(container: unknown): NanBits | undefined {
  return typeof container === "object" && container !== null
    ? nanBitsOf.get(container)
    : undefined;
}

/** Writes the kept bits when `value` is still NaN, else encodes normally. */
function writeKeeping<T>(
  codec: Codec<T>,
  view: DataView,
  offset: number,
  value: T,
  bits: Uint8Array | undefined,
): void {
  if (bits && Number.isNaN(value)) {
    bytesAt(view, offset, bits.length).set(bits);
  } else {
    codec.write(view, offset, value);
  }
}

// ============================================================================
// SCALARS
// ============================================================================

function scalar(
  type: Exclude<ScalarType, "uint64">,
  size: number,
  read: (view: DataView, offset: number) => number,
  write: (view: DataView, offset: number, value: number) => void,
): Codec<number> {
  return {
    size,
    shape: { kind: "scalar", type },
    read,
    write,
    blank: () => 0,
  };
}

export const uint8 = scalar(
  "uint8",
  1,
  (v, o) => v.getUint8(o),
  (v, o, x) => v.setUint8(o, x),
);
export const int8 = scalar(
  "int8",
  1,
  (v, o) => v.getInt8(o),
  (v, o, x) => v.setInt8(o, x),
);
export const uint16 = scalar(
  "uint16",
  2,
  (v, o) => v.getUint16(o, true),
  (v, o, x) => v.setUint16(o, x, true),
);
export const int16 = scalar(
  "int16",
  2,
  (v, o) => v.getInt16(o, true),
  (v, o, x) => v.setInt16(o, x, true),
);
export const uint32 = scalar(
  "uint32",
  4,
  (v, o) => v.getUint32(o, true),
  (v, o, x) => v.setUint32(o, x, true),
);
export const float32 = scalar(
  "float32",
  4,
  (v, o) => v.getFloat32(o, true),
  (v, o, x) => v.setFloat32(o, x, true),
);
export const float64 = scalar(
  "float64",
  8,
  (v, o) => v.getFloat64(o, true),
  (v, o, x) => v.setFloat64(o, x, true),
);

export const uint64: Codec<bigint> = {
  size: 8,
  shape: { kind: "scalar", type: "uint64" },
  read: (v, o) => v.getBigUint64(o, true),
  write: (v, o, x) => v.setBigUint64(o, x, true),
  blank: () => 0n,
};

// ============================================================================
// BYTE STRINGS
// ============================================================================

function bytesAt(view: DataView, offset: number, length: number): Uint8Array {
  return new Uint8Array(view.buffer, view.byteOffset + offset, length);
}

/**
 * Fixed-length text stored as raw bytes. Interpretation as UTF-8 happens in
 * the formatter only, so arbitrary bytes survive a round trip.
 */
export function text(length: number): Codec<Uint8Array> {
  return {
    size: length,
    shape: { kind: "text" },
    read: (view, offset) => bytesAt(view, offset, length).slice(),
    write: (view, offset, value) => {
      if (value.length > length) {
        throw new RangeError(
          `Text field holds ${length} byte(s), got ${value.length}`,
        );
      }
      const target = bytesAt(view, offset, length);
      target.fill(0);
      target.set(value);
    },
    blank: () => new Uint8Array(length),
  };
}

/** Short single-byte character code, e.g. the 4-letter event code. */
export function ascii(length: number, blankValue: string): Codec<string> {
  return {
    size: length,
    shape: { kind: "ascii" },
    read: (view, offset) => {
      let out = "";
      for (let i = 0; i < length; i++) {
        out += String.fromCharCode(view.getUint8(offset + i));
      }
      return out;
    },
    write: (view, offset, value) => {
      if (value.length !== length) {
        throw new RangeError(
          `Code must be ${length} character(s), got ${JSON.stringify(value)}`,
        );
      }
      for (let i = 0; i < length; i++) {
        view.setUint8(offset + i, value.charCodeAt(i) & 0xff);
      }
    },
    blank: () => blankValue,
  };
}

// ============================================================================
// ARRAYS & RECORDS
// ============================================================================

/** Fixed-capacity array. Every slot is always encoded, active or not. */
export function array<T>(element: Codec<T>, length: number): Codec<T[]> {
  return {
    size: element.size * length,
    shape: { kind: "array", element, length },
    read: (view, offset) => {
      const out: T[] = [];
      const kept: NanBits = new Map();
      for (let i = 0; i < length; i++) {
        const at = offset + i * element.size;
        const item = element.read(view, at);
        keepNanBits(kept, i, element, item, view, at);
        out.push(item);
      }
      return attachNanBits(out, kept);
    },
    write: (view, offset, value) => {
      if (value.length !== length) {
        throw new RangeError(
          `Array holds exactly ${length} element(s), got ${value.length}`,
        );
      }
      const kept = keptBitsFor(value);
      value.forEach((item, i) => {
        const at = offset + i * element.size;
        writeKeeping(element, view, at, item, kept?.get(i));
      });
    },
    blank: () => Array.from({ length }, () => element.blank()),
  };
}

export function record<T>(name: string, layout: Layout<T>): RecordCodec<T> {
  const fields: Field[] = [];
  let size = 0;
  layout((fieldName, codec) => {
    fields.push({ name: fieldName, offset: size, codec });
    size += codec.size;
    return codec.blank();
  });
  Object.freeze(fields);

  const read = (view: DataView, offset: number): T => {
    let cursor = offset;
    const kept: NanBits = new Map();
    const value = layout((fieldName, codec) => {
      if (cursor + codec.size > view.byteLength) {
        throw new TruncatedBufferError(
          `${name}.${fieldName}`,
          cursor + codec.size,
          view.byteLength,
        );
      }
      const fieldValue = codec.read(view, cursor);
      keepNanBits(kept, fieldName, codec, fieldValue, view, cursor);
      cursor += codec.size;
      return fieldValue;
    });
    return attachNanBits(value, kept);
  };

  const write = (view: DataView, offset: number, value: T): void => {
    let cursor = offset;
    const kept = keptBitsFor(value);
    layout((fieldName, codec) => {
      const fieldValue = value[fieldName];
      writeKeeping(codec, view, cursor, fieldValue, kept?.get(fieldName));
      cursor += codec.size;
      return fieldValue;
    });
  };

  return {
    name,
    size,
    fields,
    shape: { kind: "record", name, fields },
    read,
    write,
    blank: () => layout((_fieldName, codec) => codec.blank()),
    decode: (bytes) => {
      if (bytes.byteLength < size) {
        throw new TruncatedBufferError(name, size, bytes.byteLength);
      }
      return read(viewOf(bytes), 0);
    },
    encode: (value) => {
      const out = new Uint8Array(size);
      write(viewOf(out), 0, value);
      return out;
    },
  };
}
