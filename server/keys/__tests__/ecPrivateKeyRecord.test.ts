import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { fromRecord, toRecord } from "../ecPrivateKeyRecord";
import { encodeEcParameters } from "../ecParameters";
import { KeyPair } from "../keyPair";
import {
  encodeBitString,
  encodeExplicit,
  encodeInteger,
  encodeObjectIdentifier,
  encodeOctetString,
  encodeSequence,
} from "../../crypto/der";
import { SECP256K1_PARAMS } from "../../crypto/curveParams";
import { encodeScalar } from "../../crypto/bytes";
import {
  InvalidKeyError,
  KeyMismatchError,
  MalformedRecordError,
  UnsupportedEncodingError,
} from "../../lib/errors";
import {
  G_COMPRESSED_HEX,
  G_UNCOMPRESSED_HEX,
  N_HEX,
  ONE_COMPRESSED_RECORD_HEX,
  ONE_PRIVATE_HEX,
  ONE_UNCOMPRESSED_RECORD_HEX,
  P_HEX,
  PERMISSIVE_POLICY,
  PROPERTY_TEST_CONFIG,
  STRICT_POLICY,
  arbitraryScalar,
} from "../../test-utils/fixtures";

const hex = (value: string) => Buffer.from(value, "hex");

interface RecordParts {
  version?: Buffer;
  privateKey?: Buffer;
  parameters?: Buffer;
  publicKey?: Buffer;
}

/** Hand-assembled record for d = 2, compressed, with any field replaced. */
function buildRecord(parts: RecordParts = {}): Buffer {
  const keyPair = KeyPair.fromPrivateScalar(2n, true);
  return encodeSequence(
    parts.version ?? encodeInteger(1n),
    parts.privateKey ?? encodeOctetString(keyPair.getPrivKeyBytes()),
    parts.parameters ?? encodeExplicit(0, encodeEcParameters(true)),
    parts.publicKey ?? encodeExplicit(1, encodeBitString(keyPair.getPubKey())),
  );
}

const publicKeyField = (bytes: Buffer) => encodeExplicit(1, encodeBitString(bytes));

interface ParameterParts {
  fieldId?: Buffer;
  curve?: Buffer;
  base?: Buffer;
}

/** Explicit secp256k1 parameters in OpenSSL's layout, with any field replaced. */
function explicitParameters(parts: ParameterParts = {}): Buffer {
  const { p, n } = SECP256K1_PARAMS;
  return encodeExplicit(
    0,
    encodeSequence(
      encodeInteger(1n),
      parts.fieldId ?? encodeSequence(encodeObjectIdentifier("1.2.840.10045.1.1"), encodeInteger(p)),
      parts.curve ?? encodeSequence(encodeOctetString(hex("00")), encodeOctetString(hex("07"))),
      parts.base ?? encodeOctetString(hex(G_COMPRESSED_HEX)),
      encodeInteger(n),
      encodeInteger(1n),
    ),
  );
}

describe("toRecord", () => {
  it("writes the compressed layout Bitcoin Core uses", () => {
    const keyPair = KeyPair.fromPrivateScalar(1n, true, PERMISSIVE_POLICY);
    expect(toRecord(keyPair).toString("hex")).toBe(ONE_COMPRESSED_RECORD_HEX);
  });

  it("writes the uncompressed layout Bitcoin Core uses", () => {
    const keyPair = KeyPair.fromPrivateScalar(1n, false, PERMISSIVE_POLICY);
    const record = toRecord(keyPair);
    expect(record.length).toBe(279);
    expect(record.toString("hex")).toBe(ONE_UNCOMPRESSED_RECORD_HEX);
  });

  it("is 214 bytes for a compressed key", () => {
    expect(toRecord(KeyPair.fromPrivateScalar(123456789n, true)).length).toBe(214);
  });

  it("can reference the curve by name", () => {
    const keyPair = KeyPair.fromPrivateScalar(1n, true, PERMISSIVE_POLICY);
    expect(toRecord(keyPair, { parameters: "named" }).toString("hex")).toBe(
      "3054" + "020101" + "0420" + ONE_PRIVATE_HEX + "a007" + "06052b8104000a" + "a124" + "032200" + G_COMPRESSED_HEX,
    );
  });
});

describe("fromRecord", () => {
  it("reads the Bitcoin Core layouts", () => {
    const compressed = fromRecord(hex(ONE_COMPRESSED_RECORD_HEX), PERMISSIVE_POLICY);
    expect(compressed.privateKey.scalar).toBe(1n);
    expect(compressed.isCompressed()).toBe(true);
    expect(compressed.getPubKey().toString("hex")).toBe(G_COMPRESSED_HEX);

    const uncompressed = fromRecord(hex(ONE_UNCOMPRESSED_RECORD_HEX), PERMISSIVE_POLICY);
    expect(uncompressed.isCompressed()).toBe(false);
    expect(uncompressed.getPubKey().toString("hex")).toBe(G_UNCOMPRESSED_HEX);
  });

  it("round-trips any key in either form", () => {
    fc.assert(
      fc.property(arbitraryScalar(), fc.boolean(), (d, compressed) => {
        const keyPair = KeyPair.fromPrivateScalar(d, compressed);
        const decoded = fromRecord(toRecord(keyPair));
        expect(decoded.equals(keyPair)).toBe(true);
        expect(decoded.isCompressed()).toBe(compressed);
      }),
      PROPERTY_TEST_CONFIG,
    );
  });

  it("round-trips records that name the curve", () => {
    const keyPair = KeyPair.fromPrivateScalar(99n, false);
    expect(fromRecord(toRecord(keyPair, { parameters: "named" })).equals(keyPair)).toBe(true);
  });

  it("accepts field-width a and b with an uncompressed base point", () => {
    const { p, n } = SECP256K1_PARAMS;
    const parameters = encodeSequence(
      encodeInteger(1n),
      encodeSequence(encodeObjectIdentifier("1.2.840.10045.1.1"), encodeInteger(p)),
      encodeSequence(encodeOctetString(Buffer.alloc(32)), encodeOctetString(hex("00".repeat(31) + "07"))),
      encodeOctetString(hex(G_UNCOMPRESSED_HEX)),
      encodeInteger(n),
      encodeInteger(1n),
    );
    const decoded = fromRecord(buildRecord({ parameters: encodeExplicit(0, parameters) }));
    expect(decoded.privateKey.scalar).toBe(2n);
  });

  it("accepts private keys shorter than 32 bytes", () => {
    const decoded = fromRecord(buildRecord({ privateKey: encodeOctetString(hex("02")) }));
    expect(decoded.equals(KeyPair.fromPrivateScalar(2n, true))).toBe(true);
  });

  it("rejects a stored scalar at or above the curve order", () => {
    const { n } = SECP256K1_PARAMS;
    const wrapped = buildRecord({ privateKey: encodeOctetString(encodeScalar(n + 2n, 32)) });
    expect(() => fromRecord(wrapped)).toThrow(InvalidKeyError);
    expect(() => fromRecord(wrapped)).toThrow("'privateKey' is not below the curve order");

    const order = buildRecord({ privateKey: encodeOctetString(encodeScalar(n, 32)) });
    expect(() => fromRecord(order)).toThrow("'privateKey' is not below the curve order");
  });

  it("accepts the hand-built parameters unchanged", () => {
    const decoded = fromRecord(buildRecord({ parameters: explicitParameters() }));
    expect(decoded.privateKey.scalar).toBe(2n);
  });

  it("accepts a curve seed", () => {
    const curve = encodeSequence(
      encodeOctetString(hex("00")),
      encodeOctetString(hex("07")),
      encodeBitString(hex("0102030405")),
    );
    const decoded = fromRecord(buildRecord({ parameters: explicitParameters({ curve }) }));
    expect(decoded.privateKey.scalar).toBe(2n);
  });

  it("applies the sentinel policy to the decoded scalar", () => {
    expect(() => fromRecord(hex(ONE_COMPRESSED_RECORD_HEX), STRICT_POLICY)).toThrow(InvalidKeyError);
  });

  describe("structural checks", () => {
    it("rejects a sequence with three elements", () => {
      const keyPair = KeyPair.fromPrivateScalar(2n, true);
      const record = encodeSequence(
        encodeInteger(1n),
        encodeOctetString(keyPair.getPrivKeyBytes()),
        encodeExplicit(0, encodeEcParameters(true)),
      );
      expect(() => fromRecord(record)).toThrow("3 elements, expected 4");
    });

    it("rejects version 2", () => {
      expect(() => fromRecord(buildRecord({ version: encodeInteger(2n) }))).toThrow("wrong version 2");
    });

    it("rejects trailing bytes after the sequence", () => {
      const record = Buffer.concat([buildRecord(), hex("00")]);
      expect(() => fromRecord(record)).toThrow(MalformedRecordError);
    });

    it("rejects a 64-byte public key", () => {
      const pub = KeyPair.fromPrivateScalar(2n, false).getPubKey().subarray(0, 64);
      expect(() => fromRecord(buildRecord({ publicKey: publicKeyField(pub) }))).toThrow("invalid length 64");
    });

    it("rejects input that is not a sequence", () => {
      expect(() => fromRecord(encodeOctetString(hex("01")))).toThrow("not an ASN.1 SEQUENCE");
    });

    it("rejects a public key under the wrong tag number", () => {
      const pub = KeyPair.fromPrivateScalar(2n, true).getPubKey();
      const record = buildRecord({ publicKey: encodeExplicit(2, encodeBitString(pub)) });
      expect(() => fromRecord(record)).toThrow("'publicKey' has bad tag 0xa2");
    });

    it("rejects parameters under the wrong tag number", () => {
      const record = buildRecord({ parameters: encodeExplicit(3, encodeEcParameters(true)) });
      expect(() => fromRecord(record)).toThrow(MalformedRecordError);
    });

    it("rejects a private key longer than 32 bytes", () => {
      const record = buildRecord({ privateKey: encodeOctetString(Buffer.concat([hex("00"), hex("02".padStart(64, "0"))])) });
      expect(() => fromRecord(record)).toThrow("1 to 32 bytes, got 33");
    });

    it("rejects a private key that is not an OCTET STRING", () => {
      expect(() => fromRecord(buildRecord({ privateKey: encodeInteger(2n) }))).toThrow(MalformedRecordError);
    });

    it("rejects another named curve", () => {
      const record = buildRecord({ parameters: encodeExplicit(0, encodeObjectIdentifier("1.2.840.10045.3.1.7")) });
      expect(() => fromRecord(record)).toThrow("unsupported named curve 1.2.840.10045.3.1.7");
    });

    it("rejects explicit parameters for another curve", () => {
      const parameters = hex(
        "308182" + "020101" + "302c" + "06072a8648ce3d0101" + "022100" + P_HEX + "3006" + "040100" + "040105" +
          "0421" + G_COMPRESSED_HEX + "022100" + N_HEX + "020101",
      );
      const record = buildRecord({ parameters: encodeExplicit(0, parameters) });
      expect(() => fromRecord(record)).toThrow("do not describe secp256k1 (b)");
    });
  });

  describe("explicit parameter checks", () => {
    it("rejects extra elements in the field id", () => {
      const fieldId = encodeSequence(
        encodeObjectIdentifier("1.2.840.10045.1.1"),
        encodeInteger(SECP256K1_PARAMS.p),
        encodeInteger(5n),
      );
      const record = buildRecord({ parameters: explicitParameters({ fieldId }) });
      expect(() => fromRecord(record)).toThrow("ECParameters.fieldID has 3 elements, expected 2");
    });

    it("rejects a field id missing the prime", () => {
      const fieldId = encodeSequence(encodeObjectIdentifier("1.2.840.10045.1.1"));
      const record = buildRecord({ parameters: explicitParameters({ fieldId }) });
      expect(() => fromRecord(record)).toThrow("ECParameters.fieldID has 1 elements, expected 2");
    });

    it("rejects a curve whose third element is not a seed", () => {
      const curve = encodeSequence(encodeOctetString(hex("00")), encodeOctetString(hex("07")), encodeInteger(5n));
      const record = buildRecord({ parameters: explicitParameters({ curve }) });
      expect(() => fromRecord(record)).toThrow("ECParameters.curve.seed: expected tag 0x3, got 0x2");
    });

    it("rejects a curve with four elements", () => {
      const curve = encodeSequence(
        encodeOctetString(hex("00")),
        encodeOctetString(hex("07")),
        encodeBitString(hex("01")),
        encodeInteger(5n),
      );
      const record = buildRecord({ parameters: explicitParameters({ curve }) });
      expect(() => fromRecord(record)).toThrow("ECParameters.curve has 4 elements, expected 2 or 3");
    });

    it("rejects a hybrid base point", () => {
      const base = encodeOctetString(hex("06" + G_UNCOMPRESSED_HEX.slice(2)));
      const record = buildRecord({ parameters: explicitParameters({ base }) });
      expect(() => fromRecord(record)).toThrow(MalformedRecordError);
      expect(() => fromRecord(record)).toThrow("base point with unsupported encoding 0x06");
    });
  });

  describe("public key encoding", () => {
    it("rejects the infinity encoding", () => {
      const pub = Buffer.concat([hex("00"), KeyPair.fromPrivateScalar(2n, true).getPubKey().subarray(1)]);
      expect(() => fromRecord(buildRecord({ publicKey: publicKeyField(pub) }))).toThrow(UnsupportedEncodingError);
    });

    it("rejects hybrid encodings", () => {
      const pub = Buffer.concat([hex("06"), KeyPair.fromPrivateScalar(2n, false).getPubKey().subarray(1)]);
      expect(() => fromRecord(buildRecord({ publicKey: publicKeyField(pub) }))).toThrow("hybrid");
    });
  });

  describe("cross-check against the private key", () => {
    it("detects a public key belonging to another private key", () => {
      const other = KeyPair.fromPrivateScalar(3n, true).getPubKey();
      expect(() => fromRecord(buildRecord({ publicKey: publicKeyField(other) }))).toThrow(
        "public key in record does not match private key",
      );
    });

    it("detects a flipped parity byte", () => {
      const record = buildRecord();
      const prefixIndex = record.length - 33;
      record[prefixIndex] = record[prefixIndex] === 0x02 ? 0x03 : 0x02;
      expect(() => fromRecord(record)).toThrow(KeyMismatchError);
    });

    it("detects an uncompressed prefix on a 33-byte key", () => {
      const pub = Buffer.concat([hex("04"), KeyPair.fromPrivateScalar(2n, true).getPubKey().subarray(1)]);
      expect(() => fromRecord(buildRecord({ publicKey: publicKeyField(pub) }))).toThrow(KeyMismatchError);
    });

    it("detects any tampered coordinate byte", () => {
      fc.assert(
        fc.property(
          arbitraryScalar(),
          fc.boolean(),
          fc.nat(),
          fc.integer({ min: 1, max: 255 }),
          (d, compressed, position, mask) => {
            const record = toRecord(KeyPair.fromPrivateScalar(d, compressed));
            const keyLength = compressed ? 33 : 65;
            const index = record.length - keyLength + 1 + (position % (keyLength - 1));
            record[index] ^= mask;
            expect(() => fromRecord(record)).toThrow(KeyMismatchError);
          },
        ),
        PROPERTY_TEST_CONFIG,
      );
    });
  });
});
