import * as fc from "fast-check";
import { SECP256K1_PARAMS } from "../crypto/curveParams";
import type { KeyPolicy } from "../config/keyPolicy";

export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 25,
};

/** Lets tests use d = 1, whose public key is G. */
export const PERMISSIVE_POLICY: KeyPolicy = { rejectSentinelScalars: false };

export const STRICT_POLICY: KeyPolicy = { rejectSentinelScalars: true };

const hex32 = (value: bigint): string => value.toString(16).padStart(64, "0");

export const GX_HEX = hex32(SECP256K1_PARAMS.Gx);
export const GY_HEX = hex32(SECP256K1_PARAMS.Gy);
export const P_HEX = hex32(SECP256K1_PARAMS.p);
export const N_HEX = hex32(SECP256K1_PARAMS.n);

export const G_COMPRESSED_HEX = "02" + GX_HEX;
export const G_UNCOMPRESSED_HEX = "04" + GX_HEX + GY_HEX;

/** RIPEMD160(SHA256(02 || Gx)) */
export const G_COMPRESSED_HASH160 = "751e76e8199196d454941c45d1b3a323f1433bd6";
/** RIPEMD160(SHA256(04 || Gx || Gy)) */
export const G_UNCOMPRESSED_HASH160 = "91b24bf9f5288532960ac687abb035127b1d28a5";

export const G_COMPRESSED_ADDRESS = "1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH";
export const G_UNCOMPRESSED_ADDRESS = "1EHNa6Q4Jz2uvNExL497mE43ikXhwF6kZm";

export const ONE_PRIVATE_HEX = "00".repeat(31) + "01";

const explicitParametersHex = (basePointHex: string, contentLength: string): string =>
  contentLength +
  "020101" +
  "302c" + "06072a8648ce3d0101" + "022100" + P_HEX +
  "3006" + "040100" + "040107" +
  basePointHex +
  "022100" + N_HEX +
  "020101";

/** Record for d = 1 with a compressed public key, byte-for-byte as Bitcoin Core writes it. */
export const ONE_COMPRESSED_RECORD_HEX =
  "3081d3" +
  "020101" +
  "0420" + ONE_PRIVATE_HEX +
  "a08185" + explicitParametersHex("0421" + G_COMPRESSED_HEX, "308182") +
  "a124" + "0322" + "00" + G_COMPRESSED_HEX;

/** Record for d = 1 with an uncompressed public key. */
export const ONE_UNCOMPRESSED_RECORD_HEX =
  "30820113" +
  "020101" +
  "0420" + ONE_PRIVATE_HEX +
  "a081a5" + explicitParametersHex("0441" + G_UNCOMPRESSED_HEX, "3081a2") +
  "a144" + "0342" + "00" + G_UNCOMPRESSED_HEX;

/** Valid private scalars that are not sentinels. */
export const arbitraryScalar = (): fc.Arbitrary<bigint> => fc.bigInt({ min: 2n, max: SECP256K1_PARAMS.n - 1n });

/** Entropy source that always returns the same bytes. */
export const fixedEntropy =
  (fill: number) =>
  (length: number): Uint8Array =>
    new Uint8Array(length).fill(fill);
