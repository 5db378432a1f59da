/** Single-byte identifiers recognised by the cursor readers. */
export const Tag = {
  OctetString: 0x04,
  ObjectIdentifier: 0x06,
  Sequence: 0x30,
  Set: 0x31,
} as const;
export type Tag = (typeof Tag)[keyof typeof Tag];

// (tag & CONSTRUCTED_CONTEXT_MASK) === CONSTRUCTED_CONTEXT marks a [n] constructed element
export const CONSTRUCTED_CONTEXT_MASK = 0xe0;
export const CONSTRUCTED_CONTEXT = 0xa0;

/**
 * Width in bytes of the length word the format was designed around.
 * Long-form lengths announcing this many octets or more are rejected.
 */
export const LENGTH_WORD_BYTES = 8;

export interface DecodedLength {
  length: number;
  /** Octets the length field occupied, including the first one. */
  octets: number;
}

export interface ElementHeader {
  tag: number;
  /** Tag byte plus length octets. */
  headerLength: number;
  length: number;
}

/**
 * Zero-copy window over the content octets of a primitive element.
 * `offset` is absolute within the cursor's origin.
 */
export interface ByteRange {
  offset: number;
  length: number;
  bytes: Uint8Array;
}
