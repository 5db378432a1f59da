/**
 * Print the first signer's signature from a DER-encoded PKCS#7 / CMS blob.
 *
 *   read-signature path/to/signature.p7s
 */

import { readFile } from "node:fs/promises";

import { readSignedData } from "../src/pkcs7/index.js";
import { decodeOID, toHex } from "../src/common/index.js";

async function main(): Promise<void> {
  const file = process.argv[2];
  if (!file) {
    console.error("usage: read-signature <file.p7s>");
    process.exitCode = 1;
    return;
  }

  const der = new Uint8Array(await readFile(file));
  const signed = readSignedData(der);
  if (!signed) {
    console.error(`${file}: not a SignedData structure`);
    process.exitCode = 1;
    return;
  }

  console.log("digestAlgorithm:   ", decodeOID(signed.digestAlgorithm.bytes));
  console.log("signatureAlgorithm:", decodeOID(signed.signatureAlgorithm.bytes));
  console.log(
    `signature (${signed.signature.length} bytes at offset ${signed.signature.offset}):`,
  );
  console.log(toHex(signed.signature.bytes));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
