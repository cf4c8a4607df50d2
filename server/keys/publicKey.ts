import { COORDINATE_BYTES, curveImpl, fromBN, type Point } from "../crypto/curveParams";
import { InvalidKeyError, UnsupportedEncodingError } from "../lib/errors";
import { hash160 } from "./pubKeyHash";

export const PointEncoding = {
  INFINITY: 0x00,
  COMPRESSED_EVEN: 0x02,
  COMPRESSED_ODD: 0x03,
  UNCOMPRESSED: 0x04,
  HYBRID_EVEN: 0x06,
  HYBRID_ODD: 0x07,
} as const;

export const COMPRESSED_LENGTH = 1 + COORDINATE_BYTES;
export const UNCOMPRESSED_LENGTH = 1 + 2 * COORDINATE_BYTES;

/**
 * Throws unless `prefix` is one of the encodings keys are allowed to use:
 * compressed (02, 03) or uncompressed (04).
 */
export function assertSupportedEncoding(prefix: number | undefined): void {
  switch (prefix) {
    case PointEncoding.COMPRESSED_EVEN:
    case PointEncoding.COMPRESSED_ODD:
    case PointEncoding.UNCOMPRESSED:
      return;
    case PointEncoding.INFINITY:
      throw new UnsupportedEncodingError("public key encodes the point at infinity");
    case PointEncoding.HYBRID_EVEN:
    case PointEncoding.HYBRID_ODD:
      throw new UnsupportedEncodingError("hybrid public key encoding is not supported");
    default:
      throw new UnsupportedEncodingError(
        `unknown public key encoding 0x${(prefix ?? 0).toString(16).padStart(2, "0")}`,
      );
  }
}

/**
 * An affine secp256k1 point together with the form it serialises to. The
 * encoded bytes are computed once at construction; changing the compression
 * yields a new instance.
 */
export class PublicKey {
  private readonly encoded: Buffer;

  private constructor(
    private readonly point: Point,
    public readonly compressed: boolean,
  ) {
    if (point.isInfinity()) {
      throw new InvalidKeyError("public key cannot be the point at infinity");
    }
    this.encoded = Buffer.from(point.encode("array", compressed));
  }

  static fromPoint(point: Point, compressed: boolean): PublicKey {
    return new PublicKey(point, compressed);
  }

  /** Decodes a 33- or 65-byte SEC1 encoding, keeping its compression state. */
  static fromPublicOnly(bytes: Uint8Array): PublicKey {
    const buf = Buffer.from(bytes);
    if (buf.length === 0) {
      throw new InvalidKeyError("public key is empty");
    }
    assertSupportedEncoding(buf[0]);
    const compressed = buf[0] !== PointEncoding.UNCOMPRESSED;
    const expected = compressed ? COMPRESSED_LENGTH : UNCOMPRESSED_LENGTH;
    if (buf.length !== expected) {
      const prefix = buf[0].toString(16).padStart(2, "0");
      throw new InvalidKeyError(`public key with prefix 0x${prefix} must be ${expected} bytes, got ${buf.length}`);
    }

    let point: Point;
    try {
      point = curveImpl.decodePoint(buf);
    } catch (err) {
      throw new InvalidKeyError("public key is not a point on secp256k1", { cause: err });
    }
    if (!point.validate()) {
      throw new InvalidKeyError("public key is not a point on secp256k1");
    }
    const key = new PublicKey(point, compressed);
    // coordinates at or above the field prime decode, but do not re-encode to the input
    if (!key.encoded.equals(buf)) {
      throw new InvalidKeyError("public key coordinates are not canonical");
    }
    return key;
  }

  get x(): bigint {
    return fromBN(this.point.getX());
  }

  get y(): bigint {
    return fromBN(this.point.getY());
  }

  isCompressed(): boolean {
    return this.compressed;
  }

  /** The encoded point in this key's current form. */
  getPubKey(): Buffer {
    return Buffer.from(this.encoded);
  }

  toHex(): string {
    return this.encoded.toString("hex");
  }

  getPubKeyHash(): Buffer {
    return hash160(this.encoded);
  }

  withCompression(compressed: boolean): PublicKey {
    if (this.compressed === compressed) return this;
    return new PublicKey(this.point, compressed);
  }

  compress(): PublicKey {
    return this.withCompression(true);
  }

  decompress(): PublicKey {
    return this.withCompression(false);
  }

  /** Same point, regardless of compression. */
  hasSamePoint(other: PublicKey): boolean {
    return this.point.eq(other.point);
  }

  /** Same point and same encoding. */
  equals(other: PublicKey): boolean {
    return this.compressed === other.compressed && this.encoded.equals(other.encoded);
  }
}

export const withCompression = (publicKey: PublicKey, compressed: boolean): PublicKey =>
  publicKey.withCompression(compressed);

export const compressPoint = (publicKey: PublicKey): PublicKey => publicKey.compress();

export const decompressPoint = (publicKey: PublicKey): PublicKey => publicKey.decompress();
