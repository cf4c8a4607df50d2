import { G, SECP256K1_PARAMS, curveImpl, type Point } from "../crypto/curveParams";
import { decodeScalar } from "../crypto/bytes";
import {
  DerTag,
  decodeInteger,
  decodeObjectIdentifier,
  encodeInteger,
  encodeObjectIdentifier,
  encodeOctetString,
  encodeSequence,
  expectTag,
  readChildren,
  type DerElement,
} from "../crypto/der";
import { MalformedRecordError } from "../lib/errors";
import { PointEncoding } from "./publicKey";

export const PRIME_FIELD_OID = "1.2.840.10045.1.1";
export const SECP256K1_OID = "1.3.132.0.10";

export type ParametersForm = "explicit" | "named";

/** Smallest big-endian form, with zero as a single 0x00 byte. */
function minimalOctets(value: bigint): Buffer {
  let hex = value.toString(16);
  if (hex.length & 1) hex = "0" + hex;
  return Buffer.from(hex, "hex");
}

/**
 * ECParameters for secp256k1. The explicit form is laid out the way OpenSSL
 * writes it (and Bitcoin Core hardcodes it): one-byte `a` and `b`, and the
 * base point in the same compression as the key it accompanies.
 */
export function encodeEcParameters(compressed: boolean, form: ParametersForm = "explicit"): Buffer {
  if (form === "named") {
    return encodeObjectIdentifier(SECP256K1_OID);
  }
  const { p, a, b, n, h } = SECP256K1_PARAMS;
  return encodeSequence(
    encodeInteger(1n),
    encodeSequence(encodeObjectIdentifier(PRIME_FIELD_OID), encodeInteger(p)),
    encodeSequence(encodeOctetString(minimalOctets(a)), encodeOctetString(minimalOctets(b))),
    encodeOctetString(Buffer.from(G.encode("array", compressed))),
    encodeInteger(n),
    encodeInteger(h),
  );
}

function mismatch(field: string): MalformedRecordError {
  return new MalformedRecordError(`curve parameters do not describe secp256k1 (${field})`);
}

function decodeBasePoint(bytes: Buffer): Point {
  const prefix = bytes[0];
  if (
    prefix !== PointEncoding.COMPRESSED_EVEN &&
    prefix !== PointEncoding.COMPRESSED_ODD &&
    prefix !== PointEncoding.UNCOMPRESSED
  ) {
    throw new MalformedRecordError(
      `curve parameters carry a base point with unsupported encoding 0x${(prefix ?? 0).toString(16).padStart(2, "0")}`,
    );
  }
  try {
    return curveImpl.decodePoint(bytes);
  } catch (err) {
    throw new MalformedRecordError("curve parameters carry an undecodable base point", { cause: err });
  }
}

/**
 * Accepts the named-curve OID or explicit parameters equal to secp256k1.
 * Explicit `a`/`b` may be minimal or field-width, and `G` either compressed
 * or uncompressed; the optional seed must be a BIT STRING but is otherwise
 * ignored.
 */
export function verifyEcParameters(element: DerElement): void {
  if (element.tag === DerTag.OBJECT_IDENTIFIER) {
    const oid = decodeObjectIdentifier(element.value);
    if (oid !== SECP256K1_OID) {
      throw new MalformedRecordError(`unsupported named curve ${oid}`);
    }
    return;
  }

  const fields = readChildren(expectTag(element, DerTag.SEQUENCE, "ECParameters"));
  if (fields.length < 5 || fields.length > 6) {
    throw new MalformedRecordError(`ECParameters has ${fields.length} elements, expected 5 or 6`);
  }
  const [version, fieldId, curve, base, order, cofactor] = fields;

  if (decodeInteger(expectTag(version, DerTag.INTEGER, "ECParameters.version")) !== 1n) throw mismatch("version");

  const fieldIdFields = readChildren(expectTag(fieldId, DerTag.SEQUENCE, "ECParameters.fieldID"));
  if (fieldIdFields.length !== 2) {
    throw new MalformedRecordError(`ECParameters.fieldID has ${fieldIdFields.length} elements, expected 2`);
  }
  const [fieldType, prime] = fieldIdFields;
  if (decodeObjectIdentifier(expectTag(fieldType, DerTag.OBJECT_IDENTIFIER, "fieldType")) !== PRIME_FIELD_OID) {
    throw mismatch("field type");
  }
  if (decodeInteger(expectTag(prime, DerTag.INTEGER, "prime")) !== SECP256K1_PARAMS.p) throw mismatch("p");

  const curveFields = readChildren(expectTag(curve, DerTag.SEQUENCE, "ECParameters.curve"));
  if (curveFields.length < 2 || curveFields.length > 3) {
    throw new MalformedRecordError(`ECParameters.curve has ${curveFields.length} elements, expected 2 or 3`);
  }
  const [a, b, seed] = curveFields;
  if (seed) expectTag(seed, DerTag.BIT_STRING, "ECParameters.curve.seed");
  if (decodeScalar(expectTag(a, DerTag.OCTET_STRING, "a")) !== SECP256K1_PARAMS.a) throw mismatch("a");
  if (decodeScalar(expectTag(b, DerTag.OCTET_STRING, "b")) !== SECP256K1_PARAMS.b) throw mismatch("b");

  if (!decodeBasePoint(expectTag(base, DerTag.OCTET_STRING, "ECParameters.base")).eq(G)) throw mismatch("G");

  if (decodeInteger(expectTag(order, DerTag.INTEGER, "ECParameters.order")) !== SECP256K1_PARAMS.n) throw mismatch("n");
  if (cofactor && decodeInteger(expectTag(cofactor, DerTag.INTEGER, "ECParameters.cofactor")) !== SECP256K1_PARAMS.h) {
    throw mismatch("h");
  }
}
