import { DecodeErrorCode, fail } from "../common/errors.js";
import type { DecodeResult } from "../common/errors.js";
import { LENGTH_WORD_BYTES } from "../common/types.js";
import type { DecodedLength } from "../common/types.js";

/**
 * Decode a definite BER length field.
 * @param bytes - Backing array.
 * @param offset - Absolute offset of the first length octet.
 * @param available - Bytes readable from `offset` onward; nothing past
 *   `offset + available` or the end of `bytes` is touched.
 */
export function decodeLength(
  bytes: Uint8Array,
  offset: number,
  available: number,
): DecodeResult<DecodedLength> {
  if (!Number.isSafeInteger(offset) || offset < 0 || offset > bytes.length) {
    return fail(
      DecodeErrorCode.TruncatedInput,
      offset,
      `offset ${offset} is outside the ${bytes.length}-byte array`,
    );
  }
  // NaN fails the comparison below as well
  const readable = Math.min(available, bytes.length - offset);
  if (!(readable >= 1)) {
    return fail(DecodeErrorCode.TruncatedInput, offset, "missing length octet");
  }
  const first = bytes[offset];
  if ((first & 0x80) === 0) {
    return { ok: true, value: { length: first, octets: 1 } };
  }

  const count = first & 0x7f;
  if (count >= LENGTH_WORD_BYTES) {
    return fail(
      DecodeErrorCode.MalformedLength,
      offset,
      `long-form length uses ${count} octets (limit ${LENGTH_WORD_BYTES - 1})`,
    );
  }
  if (readable - 1 < count) {
    return fail(
      DecodeErrorCode.TruncatedInput,
      offset,
      `long-form length needs ${count} octets, ${readable - 1} remain`,
    );
  }

  let length = 0;
  for (let i = 1; i <= count; i++) {
    const b = bytes[offset + i];
    if (length > (Number.MAX_SAFE_INTEGER - b) / 256) {
      return fail(
        DecodeErrorCode.MalformedLength,
        offset,
        "long-form length overflows the safe integer range",
      );
    }
    length = length * 256 + b;
  }
  return { ok: true, value: { length, octets: 1 + count } };
}
