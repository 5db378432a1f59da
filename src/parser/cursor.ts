import { BerDecodeError, DecodeErrorCode, fail } from "../common/errors.js";
import type { DecodeResult } from "../common/errors.js";
import { toUint8Array } from "../common/codecs.js";
import {
  CONSTRUCTED_CONTEXT,
  CONSTRUCTED_CONTEXT_MASK,
  Tag,
} from "../common/types.js";
import type { ByteRange, ElementHeader } from "../common/types.js";
import { decodeLength } from "./length.js";

type TagPredicate = (tag: number) => boolean;

interface TagRule {
  accepts: TagPredicate;
  expected: string;
}

const hexByte = (b: number): string =>
  `0x${b.toString(16).padStart(2, "0")}`;

const ConstructedRule: TagRule = {
  accepts: (tag) => (tag & CONSTRUCTED_CONTEXT_MASK) === CONSTRUCTED_CONTEXT,
  expected: "context-specific constructed tag",
};
// The constructed bit is ignored for SEQUENCE and SET.
const SequenceRule: TagRule = {
  accepts: (tag) => (tag & 0x7f) === Tag.Sequence,
  expected: "SEQUENCE (0x30)",
};
const SetRule: TagRule = {
  accepts: (tag) => (tag & 0x7f) === Tag.Set,
  expected: "SET (0x31)",
};
const OidRule: TagRule = {
  accepts: (tag) => tag === Tag.ObjectIdentifier,
  expected: "OBJECT IDENTIFIER (0x06)",
};
const OctetStringRule: TagRule = {
  accepts: (tag) => tag === Tag.OctetString,
  expected: "OCTET STRING (0x04)",
};

/**
 * Bounded read view over a caller-owned byte array.
 *
 * Readers (`get*`, `expect*`, `peekTag`, `readHeader`) never move the cursor
 * they are called on; `next` and `skipConstructed` are the only operations
 * that advance in place. Child cursors share the backing array.
 */
export class BerCursor {
  /** Root array every cursor of one walk is carved from. */
  public readonly origin: Uint8Array;
  /** Low 5 bits of the [n] tag this cursor was opened from, if any. */
  public readonly tagContext: number | undefined;
  private offset: number;
  private left: number;
  private poisoned: boolean;

  private constructor(
    origin: Uint8Array,
    offset: number,
    left: number,
    tagContext?: number,
    poisoned = false,
  ) {
    this.origin = origin;
    this.offset = offset;
    this.left = left;
    this.tagContext = tagContext;
    this.poisoned = poisoned;
  }

  /**
   * Open a root cursor spanning the whole input. An ArrayBuffer is wrapped,
   * not copied.
   */
  public static from(input: ArrayBufferLike | Uint8Array): BerCursor {
    const origin = toUint8Array(input);
    return new BerCursor(origin, 0, origin.length);
  }

  /** Absolute read offset within `origin`. */
  public get position(): number {
    return this.offset;
  }

  public get remaining(): number {
    return this.left;
  }

  /** False once a failed `next` has poisoned the cursor. */
  public get usable(): boolean {
    return !this.poisoned;
  }

  /** Independent copy at the same position. */
  public fork(): BerCursor {
    return new BerCursor(
      this.origin,
      this.offset,
      this.left,
      this.tagContext,
      this.poisoned,
    );
  }

  /**
   * Look at the tag byte at the position without consuming it.
   * @returns The tag byte, or null at the end of the region or on a
   *   poisoned cursor.
   */
  public peekTag(): number | null {
    if (this.poisoned || this.left < 1) return null;
    return this.origin[this.offset];
  }

  /** Decode the tag byte and length field at the position, whatever the tag. */
  public readHeader(): DecodeResult<ElementHeader> {
    return this.readTagged({ accepts: () => true, expected: "any tag" });
  }

  /**
   * Open the context-specific constructed element (`[n]`) at the position.
   * The cursor itself stays where it was.
   * @returns A child scoped to the element's content with `tagContext` set to
   *   `n`, or null on a wrong tag, truncated input or a length that does not fit.
   */
  public getConstructed(): BerCursor | null {
    return orNull(this.tryChild(ConstructedRule, true));
  }

  /** As `getConstructed`, throwing `BerDecodeError` instead of returning null. */
  public expectConstructed(): BerCursor {
    return orThrow("expectConstructed", this.tryChild(ConstructedRule, true));
  }

  /**
   * Open the SEQUENCE at the position. The cursor itself stays where it was.
   * @returns A child scoped to the content, or null on failure.
   */
  public getSequence(): BerCursor | null {
    return orNull(this.tryChild(SequenceRule, false));
  }

  public expectSequence(): BerCursor {
    return orThrow("expectSequence", this.tryChild(SequenceRule, false));
  }

  /**
   * Open the SET at the position. The cursor itself stays where it was.
   * @returns A child scoped to the content, or null on failure.
   */
  public getSet(): BerCursor | null {
    return orNull(this.tryChild(SetRule, false));
  }

  public expectSet(): BerCursor {
    return orThrow("expectSet", this.tryChild(SetRule, false));
  }

  /**
   * Locate the OBJECT IDENTIFIER content at the position without decoding
   * its arcs. The cursor itself stays where it was.
   * @returns A zero-copy range over the content octets, or null on failure.
   */
  public getOid(): ByteRange | null {
    return orNull(this.tryRange(OidRule));
  }

  public expectOid(): ByteRange {
    return orThrow("expectOid", this.tryRange(OidRule));
  }

  /**
   * Locate the OCTET STRING content at the position. The cursor itself
   * stays where it was.
   * @returns A zero-copy range over the content octets, or null on failure.
   */
  public getOctetString(): ByteRange | null {
    return orNull(this.tryRange(OctetStringRule));
  }

  public expectOctetString(): ByteRange {
    return orThrow("expectOctetString", this.tryRange(OctetStringRule));
  }

  /**
   * Skip the element at the position, tag unchecked, leaving the cursor on
   * its next sibling. On failure the cursor is poisoned and every later
   * operation on it fails.
   * @returns True when the cursor moved, false when it was poisoned.
   */
  public next(): boolean {
    return this.tryNext().ok;
  }

  /** As `next`, throwing `BerDecodeError` on failure. The cursor is still poisoned. */
  public expectNext(): void {
    orThrow("expectNext", this.tryNext());
  }

  /**
   * Skip every context-specific constructed element at the position
   * (optional `[n]` fields). Returns false if one of them was malformed.
   */
  public skipConstructed(): boolean {
    let tag = this.peekTag();
    while (tag !== null && ConstructedRule.accepts(tag)) {
      if (!this.next()) return false;
      tag = this.peekTag();
    }
    return this.usable;
  }

  private advance(count: number): void {
    this.offset += count;
    this.left -= count;
  }

  private poison(): void {
    this.poisoned = true;
    this.left = 0;
  }

  private tryNext(): DecodeResult<void> {
    const header = this.readHeader();
    if (!header.ok) {
      this.poison();
      return header;
    }
    this.advance(header.value.headerLength + header.value.length);
    return { ok: true, value: undefined };
  }

  private tryChild(
    rule: TagRule,
    keepContext: boolean,
  ): DecodeResult<BerCursor> {
    const header = this.readTagged(rule);
    if (!header.ok) return header;
    const { tag, headerLength, length } = header.value;
    return {
      ok: true,
      value: new BerCursor(
        this.origin,
        this.offset + headerLength,
        length,
        keepContext ? tag & 0x1f : undefined,
      ),
    };
  }

  private tryRange(rule: TagRule): DecodeResult<ByteRange> {
    const header = this.readTagged(rule);
    if (!header.ok) return header;
    const start = this.offset + header.value.headerLength;
    const { length } = header.value;
    return {
      ok: true,
      value: {
        offset: start,
        length,
        bytes: this.origin.subarray(start, start + length),
      },
    };
  }

  /**
   * Tag check, then length decode, then fit check against what is left
   * after the header. Reads nothing past `offset + left`.
   */
  private readTagged(rule: TagRule): DecodeResult<ElementHeader> {
    if (this.poisoned) {
      return fail(
        DecodeErrorCode.UnusableCursor,
        this.offset,
        "cursor was invalidated by a failed next()",
      );
    }
    if (this.left < 1) {
      return fail(
        DecodeErrorCode.TruncatedInput,
        this.offset,
        "missing tag byte",
      );
    }
    const tag = this.origin[this.offset];
    if (!rule.accepts(tag)) {
      return fail(
        DecodeErrorCode.TagMismatch,
        this.offset,
        `expected ${rule.expected}, found ${hexByte(tag)}`,
      );
    }

    const decoded = decodeLength(this.origin, this.offset + 1, this.left - 1);
    if (!decoded.ok) return decoded;
    const { length, octets } = decoded.value;
    const headerLength = 1 + octets;
    const available = this.left - headerLength;
    if (length > available) {
      return fail(
        DecodeErrorCode.LengthOutOfBounds,
        this.offset,
        `declared length ${length} exceeds ${available} remaining bytes`,
      );
    }
    return { ok: true, value: { tag, headerLength, length } };
  }
}

function orNull<T>(result: DecodeResult<T>): T | null {
  return result.ok ? result.value : null;
}

function orThrow<T>(operation: string, result: DecodeResult<T>): T {
  if (!result.ok) throw new BerDecodeError(operation, result.failure);
  return result.value;
}
