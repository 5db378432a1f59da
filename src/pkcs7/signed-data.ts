import { bytesEqual, fromHex } from "../common/codecs.js";
import type { ByteRange } from "../common/types.js";
import { BerCursor } from "../parser/cursor.js";

/** Content octets of id-signedData, 1.2.840.113549.1.7.2, in hex. */
export const SIGNED_DATA_OID = "2a864886f70d010702";

const signedDataOid = fromHex(SIGNED_DATA_OID);

export interface SignedDataSignature {
  contentType: ByteRange;
  digestAlgorithm: ByteRange;
  signatureAlgorithm: ByteRange;
  signature: ByteRange;
}

/**
 * Locate the first signer's signature inside a CMS/PKCS#7 ContentInfo.
 *
 * ContentInfo ::= SEQUENCE {
 *   contentType   OBJECT IDENTIFIER,
 *   content   [0] EXPLICIT SignedData
 * }
 * SignedData ::= SEQUENCE {
 *   version, digestAlgorithms SET, encapContentInfo SEQUENCE,
 *   certificates [0] OPTIONAL, crls [1] OPTIONAL,
 *   signerInfos SET OF SignerInfo
 * }
 * SignerInfo ::= SEQUENCE {
 *   version, sid, digestAlgorithm AlgorithmIdentifier,
 *   signedAttrs [0] OPTIONAL, signatureAlgorithm AlgorithmIdentifier,
 *   signature OCTET STRING, unsignedAttrs [1] OPTIONAL
 * }
 *
 * Returned ranges point into `der`. Returns null when the structure does not
 * match or the content type is not id-signedData.
 */
export function readSignedData(
  der: ArrayBufferLike | Uint8Array,
): SignedDataSignature | null {
  const contentInfo = BerCursor.from(der).getSequence();
  if (!contentInfo) return null;
  const contentType = contentInfo.getOid();
  if (!contentType || !bytesEqual(contentType.bytes, signedDataOid)) {
    return null;
  }
  if (!contentInfo.next()) return null;

  const explicit = contentInfo.getConstructed();
  if (!explicit || explicit.tagContext !== 0) return null;
  const signedData = explicit.getSequence();
  if (
    !signedData ||
    !signedData.next() || // version
    !signedData.next() || // digestAlgorithms
    !signedData.next() || // encapContentInfo
    !signedData.skipConstructed() // certificates, crls
  ) {
    return null;
  }

  const signerInfo = signedData.getSet()?.getSequence();
  if (
    !signerInfo ||
    !signerInfo.next() || // version
    !signerInfo.next() // sid
  ) {
    return null;
  }

  const digestAlgorithm = readAlgorithmOid(signerInfo);
  if (!digestAlgorithm || !signerInfo.next() || !signerInfo.skipConstructed()) {
    return null;
  }
  const signatureAlgorithm = readAlgorithmOid(signerInfo);
  if (!signatureAlgorithm || !signerInfo.next()) return null;

  const signature = signerInfo.getOctetString();
  if (!signature) return null;

  return { contentType, digestAlgorithm, signatureAlgorithm, signature };
}

function readAlgorithmOid(cursor: BerCursor): ByteRange | null {
  return cursor.getSequence()?.getOid() ?? null;
}
