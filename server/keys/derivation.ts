import { CURVE_ORDER_BITS, G, SECP256K1_PARAMS, bitLength, toBN, type Point } from "../crypto/curveParams";
import { InvalidKeyError } from "../lib/errors";

/**
 * Public point for a private scalar: `scalar * G` using the precomputed
 * fixed-base tables. Scalars longer than the group order are reduced first.
 */
export function derivePublicPoint(scalar: bigint): Point {
  if (scalar < 0n) {
    throw new InvalidKeyError("private scalar must not be negative");
  }
  const k = bitLength(scalar) > CURVE_ORDER_BITS ? scalar % SECP256K1_PARAMS.n : scalar;
  const point = G.mul(toBN(k));
  if (point.isInfinity()) {
    throw new InvalidKeyError("private scalar is a multiple of the curve order");
  }
  return point;
}
