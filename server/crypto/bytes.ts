import { AppError } from "../lib/errors";

/**
 * Fixed-width big-endian encoding of a non-negative integer, zero-padded on
 * the left. Values that do not fit are a caller bug and are never truncated.
 */
export function encodeScalar(value: bigint, width: number): Buffer {
  if (value < 0n) {
    throw new AppError("encodeScalar: negative values are not allowed");
  }
  const hex = value.toString(16);
  const byteLength = Math.ceil(hex.length / 2);
  if (byteLength > width) {
    throw new AppError(`encodeScalar: value needs ${byteLength} bytes, width is ${width}`);
  }
  return Buffer.from(hex.padStart(width * 2, "0"), "hex");
}

/** Unsigned big-endian bytes to an integer. An empty input is zero. */
export function decodeScalar(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  return BigInt("0x" + Buffer.from(bytes).toString("hex"));
}

export function reverseBytes(bytes: Uint8Array): Buffer {
  const buf = Buffer.alloc(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    buf[i] = bytes[bytes.length - 1 - i];
  }
  return buf;
}

export const HEX_REGEX = /^[0-9a-fA-F]*$/;

export function hexToBuffer(hex: string): Buffer {
  const clean = hex.replace(/^0x/i, "");
  if (clean.length % 2 !== 0 || !HEX_REGEX.test(clean)) {
    throw new AppError("Invalid hex string", { statusCode: 400, code: "VALIDATION_ERROR" });
  }
  return Buffer.from(clean, "hex");
}
