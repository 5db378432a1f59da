/**
 * Helpers for interpreting the byte ranges handed out by the cursor
 */

export function toUint8Array(
  input: ArrayBufferLike | Uint8Array,
): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

export function toHex(input: ArrayBufferLike | Uint8Array): string {
  return Array.from(toUint8Array(input))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, "");
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new Error(`Invalid hex string: '${hex}'`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function bytesEqual(
  a: ArrayBufferLike | Uint8Array,
  b: ArrayBufferLike | Uint8Array,
): boolean {
  const x = toUint8Array(a);
  const y = toUint8Array(b);
  if (x.length !== y.length) return false;
  for (let i = 0; i < x.length; i++) {
    if (x[i] !== y[i]) return false;
  }
  return true;
}

/**
 * Render OBJECT IDENTIFIER content octets in dotted form.
 * Throws on empty input, a truncated sub-identifier, or an arc beyond
 * Number.MAX_SAFE_INTEGER.
 */
export function decodeOID(input: ArrayBufferLike | Uint8Array): string {
  const bytes = toUint8Array(input);
  if (bytes.length === 0) throw new Error("Empty OID encoding (0 bytes)");

  const subIds: number[] = [];
  let i = 0;
  while (i < bytes.length) {
    let val = 0;
    let b: number;
    do {
      if (i >= bytes.length)
        throw new Error(`Truncated OID at byte index ${i}`);
      b = bytes[i++];
      if (val > (Number.MAX_SAFE_INTEGER - (b & 0x7f)) / 128) {
        throw new Error(
          `OID arc exceeds safe integer range at byte index ${i - 1}`,
        );
      }
      val = val * 128 + (b & 0x7f);
    } while (b & 0x80);
    subIds.push(val);
  }

  const [first, ...rest] = subIds;
  const arcs =
    first < 40
      ? [0, first]
      : first < 80
        ? [1, first - 40]
        : [2, first - 80];
  return [...arcs, ...rest].join(".");
}
