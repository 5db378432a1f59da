// tests/unit/common/codecs.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import {
  bytesEqual,
  decodeOID,
  fromHex,
  toHex,
  toUint8Array,
} from "../../../src/common/codecs.js";

describe("codecs: buffer and hex helpers", () => {
  it("toHex works with ArrayBuffer and Uint8Array", () => {
    const u8 = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
    assert.strictEqual(toHex(u8), "deadbeef");
    assert.strictEqual(toHex(u8.buffer), "deadbeef");
    assert.strictEqual(toHex(new Uint8Array(0)), "");
  });

  it("fromHex accepts mixed case and whitespace", () => {
    assert.deepStrictEqual(Array.from(fromHex("0A ff\n10")), [0x0a, 0xff, 0x10]);
  });

  it("fromHex rejects odd lengths and non-hex characters", () => {
    assert.throws(() => fromHex("abc"), /Invalid hex string/);
    assert.throws(() => fromHex("zz"), /Invalid hex string/);
  });

  it("toUint8Array shares memory with an ArrayBuffer", () => {
    const ab = new ArrayBuffer(2);
    toUint8Array(ab)[1] = 7;
    assert.strictEqual(new Uint8Array(ab)[1], 7);
  });

  it("bytesEqual compares content, not identity", () => {
    assert.strictEqual(bytesEqual(fromHex("0102"), fromHex("0102").buffer), true);
    assert.strictEqual(bytesEqual(fromHex("0102"), fromHex("0103")), false);
    assert.strictEqual(bytesEqual(fromHex("01"), fromHex("0100")), false);
  });
});

describe("codecs: OID decode", () => {
  it("decodes arcs under the first two roots", () => {
    assert.strictEqual(decodeOID(fromHex("2a864886f70d010702")), "1.2.840.113549.1.7.2");
    assert.strictEqual(decodeOID(fromHex("0603")), "0.6.3");
    assert.strictEqual(decodeOID(fromHex("2a0304")), "1.2.3.4");
  });

  it("decodes arcs under root 2", () => {
    assert.strictEqual(decodeOID(fromHex("608648016503040201")), "2.16.840.1.101.3.4.2.1");
    assert.strictEqual(decodeOID(fromHex("8837")), "2.999");
  });

  it("throws on empty input", () => {
    assert.throws(() => decodeOID(new Uint8Array(0)), /Empty OID encoding/);
  });

  it("throws on a truncated sub-identifier", () => {
    assert.throws(() => decodeOID(fromHex("2a86")), /Truncated OID at byte index 2/);
  });

  it("throws when an arc leaves the safe integer range", () => {
    assert.throws(
      () => decodeOID(fromHex("2affffffffffffffff7f")),
      /OID arc exceeds safe integer range/,
    );
  });
});
