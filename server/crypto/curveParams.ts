import BN from "bn.js";
import { ec as EC, type curve } from "elliptic";

export type Point = curve.base.BasePoint;

export interface CurveParameters {
  readonly name: "secp256k1";
  readonly p: bigint;
  readonly a: bigint;
  readonly b: bigint;
  readonly Gx: bigint;
  readonly Gy: bigint;
  readonly n: bigint;
  readonly h: bigint;
}

export const SECP256K1_PARAMS: CurveParameters = Object.freeze({
  name: "secp256k1",
  p: BigInt("0xfffffffffffffffffffffffffffffffffffffffffffffffffffffffefffffc2f"),
  a: 0n,
  b: 7n,
  Gx: BigInt("0x79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798"),
  Gy: BigInt("0x483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8"),
  n: BigInt("0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141"),
  h: 1n,
});

/** Byte width of field elements and scalars. */
export const COORDINATE_BYTES = 32;

// The preset ships precomputed doubles and a NAF window table for G, so
// fixed-base multiplication never has to build them at runtime.
export const secp256k1 = new EC("secp256k1");

export const curveImpl: curve.base = secp256k1.curve;
export const G: Point = secp256k1.g;

export const bitLength = (value: bigint): number => (value === 0n ? 0 : value.toString(2).length);

export const CURVE_ORDER_BITS = bitLength(SECP256K1_PARAMS.n);

export const toBN = (value: bigint): BN => new BN(value.toString(16), 16);

export const fromBN = (value: BN): bigint => BigInt("0x" + value.toString(16));
