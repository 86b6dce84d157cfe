/**
 * Presentation views over decoded packets.
 *
 * Walks the static field tables of the record codecs, never the byte layout.
 * Output is lossy (floats rounded to 3 decimals) and is never fed back into
 * encoding.
 */

import type { Codec, CodecShape, Field, RecordCodec } from "../packets/fields";
import { decodeFixedText } from "../packets/text";
import {
  EVENT_CODE_SHAPES,
  shapeCodec,
  type EventDetails,
} from "../packets/eventDetails";
import {
  codecFor,
  type DecodedPacket,
  type DecodedPacketOf,
  type PacketName,
} from "../packets/PacketRegistry";
import {
  toCanonicalText,
  type FormattedMapping,
  type FormattedValue,
} from "./canonicalJson";

export type { FormattedMapping, FormattedValue } from "./canonicalJson";

const FLOAT_PRECISION = 1000;

export function roundFloat(value: number): number {
  if (!Number.isFinite(value)) return value;
  return Math.round(value * FLOAT_PRECISION) / FLOAT_PRECISION;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

const EVENT_SHAPES = new Set<string>(EVENT_CODE_SHAPES.values());

function isEventDetails(value: unknown): value is EventDetails {
  return (
    isObject(value) &&
    typeof value.shape === "string" &&
    EVENT_SHAPES.has(value.shape) &&
    isObject(value.data)
  );
}

function mismatch(path: string, expected: string, value: unknown): TypeError {
  return new TypeError(`${path}: expected ${expected}, got ${typeof value}`);
}

function formatValue(
  shape: CodecShape,
  value: unknown,
  path: string,
): FormattedValue {
  switch (shape.kind) {
    case "scalar":
      if (typeof value === "bigint") return value;
      if (typeof value !== "number") throw mismatch(path, "number", value);
      return shape.type === "float32" || shape.type === "float64"
        ? roundFloat(value)
        : value;

    case "text":
      if (!(value instanceof Uint8Array)) {
        throw mismatch(path, "bytes", value);
      }
      return decodeFixedText(value);

    case "ascii":
      if (typeof value !== "string") throw mismatch(path, "string", value);
      return value;

    case "array":
      if (!Array.isArray(value)) throw mismatch(path, "array", value);
      return value.map((item: unknown, i) =>
        formatValue(shape.element.shape, item, `${path}[${i}]`),
      );

    case "record":
      return formatFields(shape.fields, value, path);

    case "eventDetails":
      if (!isEventDetails(value)) {
        throw mismatch(path, "event details", value);
      }
      return formatEventDetails(value);
  }
}

function formatFields(
  fields: readonly Field[],
  value: unknown,
  path: string,
): FormattedMapping {
  if (!isObject(value)) throw mismatch(path, "record", value);
  const out: FormattedMapping = {};
  for (const field of fields) {
    out[field.name] = formatValue(
      field.codec.shape,
      value[field.name],
      `${path}.${field.name}`,
    );
  }
  return out;
}

/** Mapping view of a single record (a packet or any sub-record). */
export function formatRecord<T>(
  codec: RecordCodec<T>,
  value: T,
): FormattedMapping {
  return formatFields(codec.fields, value, codec.name);
}

/** Only the resolved shape's fields; trailing bytes are not shown. */
export function formatEventDetails(details: EventDetails): FormattedMapping {
  return formatRecord(shapeCodec(details.shape), details.data);
}

/** Formats one field value on its own, e.g. a single array. */
export function formatField<T>(codec: Codec<T>, value: T): FormattedValue {
  return formatValue(codec.shape, value, "value");
}

function mappingOf<N extends PacketName>(
  decoded: DecodedPacketOf<N>,
): FormattedMapping {
  return formatRecord(codecFor(decoded.name), decoded.packet);
}

export function toMapping(decoded: DecodedPacket): FormattedMapping {
  return mappingOf(decoded);
}

export function toText(decoded: DecodedPacket): string {
  return toCanonicalText(toMapping(decoded));
}
