import { randomBytes } from "crypto";
import { COORDINATE_BYTES, fromBN, secp256k1 } from "../crypto/curveParams";
import { config } from "../config/env";
import { defaultKeyPolicy, type KeyPolicy } from "../config/keyPolicy";
import { InvalidKeyError } from "../lib/errors";
import { derivePublicPoint } from "./derivation";
import { PrivateKey } from "./privateKey";
import { PublicKey } from "./publicKey";

/** Supplies `length` bytes of entropy. */
export type RandomSource = (length: number) => Uint8Array;

export const defaultRandomSource: RandomSource = (length) => randomBytes(length);

export class KeyPair {
  private constructor(
    public readonly privateKey: PrivateKey,
    public readonly publicKey: PublicKey,
  ) {}

  /**
   * Fresh key pair with a compressed public key. The scalar is drawn uniformly
   * from [1, n-1] by elliptic's HMAC-DRBG, seeded from `entropy`.
   */
  static generate(entropy: RandomSource = defaultRandomSource, policy: KeyPolicy = defaultKeyPolicy): KeyPair {
    const seed = entropy(COORDINATE_BYTES);
    if (seed.length < COORDINATE_BYTES) {
      throw new InvalidKeyError(`entropy source returned ${seed.length} bytes, need ${COORDINATE_BYTES}`);
    }
    const generated = secp256k1.genKeyPair({ entropy: Buffer.from(seed) });
    return KeyPair.fromPrivateScalar(fromBN(generated.getPrivate()), true, policy);
  }

  static fromPrivateScalar(
    scalar: bigint | null | undefined,
    compressed: boolean,
    policy: KeyPolicy = defaultKeyPolicy,
  ): KeyPair {
    const privateKey = PrivateKey.fromScalar(scalar, policy);
    const point = derivePublicPoint(privateKey.scalar);
    return new KeyPair(privateKey, PublicKey.fromPoint(point, compressed));
  }

  /** Raw private key as unsigned big-endian bytes or an integer. */
  static fromPrivate(
    key: Uint8Array | bigint,
    compressed: boolean = config.DEFAULT_COMPRESSED,
    policy: KeyPolicy = defaultKeyPolicy,
  ): KeyPair {
    const scalar = typeof key === "bigint" ? key : PrivateKey.fromBytes(key, policy).scalar;
    return KeyPair.fromPrivateScalar(scalar, compressed, policy);
  }

  isCompressed(): boolean {
    return this.publicKey.compressed;
  }

  getPrivKeyBytes(): Buffer {
    return this.privateKey.toBytes();
  }

  getPubKey(): Buffer {
    return this.publicKey.getPubKey();
  }

  getPubKeyHash(): Buffer {
    return this.publicKey.getPubKeyHash();
  }

  withCompression(compressed: boolean): KeyPair {
    const publicKey = this.publicKey.withCompression(compressed);
    return publicKey === this.publicKey ? this : new KeyPair(this.privateKey, publicKey);
  }

  equals(other: KeyPair): boolean {
    return this.privateKey.equals(other.privateKey) && this.publicKey.equals(other.publicKey);
  }
}
