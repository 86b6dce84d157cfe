const utf8Decoder = new TextDecoder("utf-8");
const utf8Encoder = new TextEncoder();

/** UTF-8 text up to the first NUL byte (or the whole field when there is none). */
export function decodeFixedText(bytes: Uint8Array): string {
  const end = bytes.indexOf(0);
  return utf8Decoder.decode(end === -1 ? bytes : bytes.subarray(0, end));
}

/** Encodes text into a NUL-padded field of exactly `length` bytes. */
export function encodeFixedText(text: string, length: number): Uint8Array {
  const encoded = utf8Encoder.encode(text);
  if (encoded.length > length) {
    throw new RangeError(
      `"${text}" needs ${encoded.length} byte(s), field holds ${length}`,
    );
  }
  const out = new Uint8Array(length);
  out.set(encoded);
  return out;
}
