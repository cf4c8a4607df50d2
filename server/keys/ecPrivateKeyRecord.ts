import { COORDINATE_BYTES, SECP256K1_PARAMS } from "../crypto/curveParams";
import { decodeScalar } from "../crypto/bytes";
import {
  DerTag,
  contextTagNumber,
  decodeBitString,
  decodeInteger,
  decodeSingle,
  encodeBitString,
  encodeExplicit,
  encodeInteger,
  encodeOctetString,
  encodeSequence,
  expectTag,
  isContextTag,
  readChildren,
  type DerElement,
} from "../crypto/der";
import { defaultKeyPolicy, type KeyPolicy } from "../config/keyPolicy";
import { AppError, InvalidKeyError, KeyMismatchError, MalformedRecordError } from "../lib/errors";
import { logger } from "../lib/logger";
import { encodeEcParameters, verifyEcParameters, type ParametersForm } from "./ecParameters";
import { KeyPair } from "./keyPair";
import { COMPRESSED_LENGTH, UNCOMPRESSED_LENGTH, assertSupportedEncoding } from "./publicKey";

// ECPrivateKey as written by OpenSSL (ec_asn1.c) and stored by Bitcoin Core:
//
//   SEQUENCE {
//     version     INTEGER (1),
//     privateKey  OCTET STRING,
//     parameters  [0] EXPLICIT ECParameters,
//     publicKey   [1] EXPLICIT BIT STRING
//   }

const RECORD_VERSION = 1n;
const RECORD_FIELDS = 4;

export interface RecordOptions {
  parameters?: ParametersForm;
}

export function toRecord(keyPair: KeyPair, options: RecordOptions = {}): Buffer {
  try {
    return encodeSequence(
      encodeInteger(RECORD_VERSION),
      encodeOctetString(keyPair.getPrivKeyBytes()),
      encodeExplicit(0, encodeEcParameters(keyPair.isCompressed(), options.parameters)),
      encodeExplicit(1, encodeBitString(keyPair.getPubKey())),
    );
  } catch (err) {
    // only reachable through a bug in the writer
    throw new AppError("Failed to encode EC private key record", { cause: err });
  }
}

function explicitContent(element: DerElement, tagNumber: number, what: string): DerElement {
  if (!isContextTag(element.tag) || contextTagNumber(element.tag) !== tagNumber) {
    throw new MalformedRecordError(`'${what}' has bad tag 0x${element.tag.toString(16)}, expected [${tagNumber}]`);
  }
  return decodeSingle(element.value);
}

/**
 * Parses a record and checks that the public key it carries is the one the
 * private key derives to. Compression follows the carried key's length.
 */
export function fromRecord(bytes: Uint8Array, policy: KeyPolicy = defaultKeyPolicy): KeyPair {
  const outer = decodeSingle(Buffer.from(bytes));
  if (outer.tag !== DerTag.SEQUENCE) {
    throw new MalformedRecordError("input is not an ASN.1 SEQUENCE");
  }

  const fields = readChildren(outer.value);
  if (fields.length !== RECORD_FIELDS) {
    throw new MalformedRecordError(
      `input does not appear to be an OpenSSL EC private key: ${fields.length} elements, expected ${RECORD_FIELDS}`,
    );
  }
  const [versionField, privateKeyField, parametersField, publicKeyField] = fields;

  const version = decodeInteger(expectTag(versionField, DerTag.INTEGER, "version"));
  if (version !== RECORD_VERSION) {
    throw new MalformedRecordError(`input is of wrong version ${version}`);
  }

  const privBits = expectTag(privateKeyField, DerTag.OCTET_STRING, "privateKey");
  if (privBits.length === 0 || privBits.length > COORDINATE_BYTES) {
    throw new MalformedRecordError(`'privateKey' must be 1 to ${COORDINATE_BYTES} bytes, got ${privBits.length}`);
  }

  // stored scalars must already be in [1, n-1]
  const scalar = decodeScalar(privBits);
  if (scalar >= SECP256K1_PARAMS.n) {
    throw new InvalidKeyError("'privateKey' is not below the curve order");
  }

  verifyEcParameters(explicitContent(parametersField, 0, "parameters"));

  const pubBits = decodeBitString(
    expectTag(explicitContent(publicKeyField, 1, "publicKey"), DerTag.BIT_STRING, "publicKey"),
  );
  if (pubBits.length !== COMPRESSED_LENGTH && pubBits.length !== UNCOMPRESSED_LENGTH) {
    throw new MalformedRecordError(`'publicKey' has invalid length ${pubBits.length}`);
  }
  assertSupportedEncoding(pubBits[0]);

  const compressed = pubBits.length === COMPRESSED_LENGTH;
  const keyPair = KeyPair.fromPrivateScalar(scalar, compressed, policy);
  if (!keyPair.getPubKey().equals(pubBits)) {
    logger.warn({ compressed, publicKeyLength: pubBits.length }, "EC private key record failed public key check");
    throw new KeyMismatchError();
  }
  return keyPair;
}
