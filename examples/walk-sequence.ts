import { BerCursor } from "../src/parser/index.js";
import { BerDecodeError, fromHex, toHex } from "../src/common/index.js";

// SEQUENCE { OID 1.2.3.4 } followed by bytes outside the sequence
const buffer = fromHex("300606032a03043000");

const seq = BerCursor.from(buffer).expectSequence();
console.log(toHex(seq.expectOid().bytes)); // 2a0304

let siblings = 0;
while (seq.remaining > 0 && seq.next()) siblings++;
console.log(siblings, seq.usable); // 1 false

try {
  BerCursor.from(fromHex("300606032a")).expectSequence();
} catch (e) {
  if (e instanceof BerDecodeError) console.log(e.code, e.message);
  // LengthOutOfBounds expectSequence failed at offset 0: declared length 6 exceeds 3 remaining bytes
}
