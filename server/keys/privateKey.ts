import { COORDINATE_BYTES, SECP256K1_PARAMS } from "../crypto/curveParams";
import { decodeScalar, encodeScalar } from "../crypto/bytes";
import { defaultKeyPolicy, type KeyPolicy } from "../config/keyPolicy";
import { InvalidKeyError } from "../lib/errors";

export class PrivateKey {
  private constructor(public readonly scalar: bigint) {}

  /**
   * Scalars at or above the curve order are reduced modulo n. Zero (after
   * reduction) never has a public point; one is refused under the sentinel policy.
   */
  static fromScalar(scalar: bigint | null | undefined, policy: KeyPolicy = defaultKeyPolicy): PrivateKey {
    if (scalar === null || scalar === undefined) {
      throw new InvalidKeyError("a private key is required");
    }
    if (scalar < 0n) {
      throw new InvalidKeyError("private key must not be negative");
    }
    const d = scalar >= SECP256K1_PARAMS.n ? scalar % SECP256K1_PARAMS.n : scalar;
    if (d === 0n) {
      throw new InvalidKeyError("private key must not be zero modulo the curve order");
    }
    if (d === 1n && policy.rejectSentinelScalars) {
      throw new InvalidKeyError("private key 1 is a sentinel value and is not accepted");
    }
    return new PrivateKey(d);
  }

  /** Unsigned big-endian, at most 32 bytes. */
  static fromBytes(bytes: Uint8Array, policy: KeyPolicy = defaultKeyPolicy): PrivateKey {
    if (bytes.length === 0 || bytes.length > COORDINATE_BYTES) {
      throw new InvalidKeyError(`private key must be 1 to ${COORDINATE_BYTES} bytes, got ${bytes.length}`);
    }
    return PrivateKey.fromScalar(decodeScalar(bytes), policy);
  }

  /** 32 bytes, big-endian, zero-padded. */
  toBytes(): Buffer {
    return encodeScalar(this.scalar, COORDINATE_BYTES);
  }

  toHex(): string {
    return this.toBytes().toString("hex");
  }

  equals(other: PrivateKey): boolean {
    return this.scalar === other.scalar;
  }
}
