import { MalformedRecordError } from "../lib/errors";

/**
 * Minimal DER tag-length-value reader and writer. Only single-byte tags and
 * definite, minimally encoded lengths are accepted, which is all the EC
 * private-key record needs.
 */

export const DerTag = {
  INTEGER: 0x02,
  BIT_STRING: 0x03,
  OCTET_STRING: 0x04,
  OBJECT_IDENTIFIER: 0x06,
  SEQUENCE: 0x30,
} as const;

const CONTEXT_CONSTRUCTED = 0xa0;

export class DerError extends MalformedRecordError {}

export interface DerElement {
  tag: number;
  /** Content octets. */
  value: Buffer;
  /** Header and content, as they appeared in the input. */
  raw: Buffer;
}

/** `[n] EXPLICIT` wrapper tag. */
export const contextTag = (tagNumber: number): number => CONTEXT_CONSTRUCTED | tagNumber;

export const isContextTag = (tag: number): boolean => (tag & 0xe0) === CONTEXT_CONSTRUCTED;

export const contextTagNumber = (tag: number): number => tag & 0x1f;

function encodeLength(length: number): Buffer {
  if (length < 0x80) return Buffer.from([length]);
  const bytes: number[] = [];
  for (let rest = length; rest > 0; rest = Math.floor(rest / 256)) {
    bytes.unshift(rest & 0xff);
  }
  return Buffer.from([0x80 | bytes.length, ...bytes]);
}

export function encodeTlv(tag: number, value: Uint8Array): Buffer {
  if (tag < 0 || tag > 0xff || (tag & 0x1f) === 0x1f) {
    throw new DerError(`tlv.encode: unsupported tag 0x${tag.toString(16)}`);
  }
  return Buffer.concat([Buffer.from([tag]), encodeLength(value.length), value]);
}

export const encodeSequence = (...elements: Uint8Array[]): Buffer => encodeTlv(DerTag.SEQUENCE, Buffer.concat(elements));

export const encodeExplicit = (tagNumber: number, inner: Uint8Array): Buffer => encodeTlv(contextTag(tagNumber), inner);

export const encodeOctetString = (bytes: Uint8Array): Buffer => encodeTlv(DerTag.OCTET_STRING, bytes);

/** BIT STRING with zero unused bits. */
export const encodeBitString = (bytes: Uint8Array): Buffer =>
  encodeTlv(DerTag.BIT_STRING, Buffer.concat([Buffer.from([0x00]), bytes]));

export function encodeInteger(value: bigint): Buffer {
  if (value < 0n) throw new DerError("integer: negative integers are not allowed");
  let hex = value.toString(16);
  if (hex.length & 1) hex = "0" + hex;
  // keep the value positive when the top bit is set
  if (Number.parseInt(hex.slice(0, 2), 16) & 0x80) hex = "00" + hex;
  return encodeTlv(DerTag.INTEGER, Buffer.from(hex, "hex"));
}

export function encodeObjectIdentifier(oid: string): Buffer {
  const arcs = oid.split(".").map((arc) => Number.parseInt(arc, 10));
  if (arcs.length < 2 || arcs.some((arc) => !Number.isSafeInteger(arc) || arc < 0)) {
    throw new DerError(`oid: invalid identifier ${oid}`);
  }
  const body: number[] = [];
  const [first, second, ...rest] = arcs;
  for (const arc of [first * 40 + second, ...rest]) {
    const chunk = [arc & 0x7f];
    for (let v = Math.floor(arc / 128); v > 0; v = Math.floor(v / 128)) {
      chunk.unshift((v & 0x7f) | 0x80);
    }
    body.push(...chunk);
  }
  return encodeTlv(DerTag.OBJECT_IDENTIFIER, Buffer.from(body));
}

/** Reads one element starting at `offset`. */
export function readTlv(data: Buffer, offset = 0): { element: DerElement; next: number } {
  let pos = offset;
  if (pos >= data.length) throw new DerError("tlv.decode: unexpected end of input");

  const tag = data[pos++];
  if ((tag & 0x1f) === 0x1f) throw new DerError("tlv.decode: multi-byte tags are not supported");
  if (pos >= data.length) throw new DerError("tlv.decode: missing length");

  const first = data[pos++];
  let length = first;
  if (first & 0x80) {
    const lenBytes = first & 0x7f;
    if (lenBytes === 0) throw new DerError("tlv.decode: indefinite length is not DER");
    if (lenBytes > 4) throw new DerError("tlv.decode: length too large");
    if (pos + lenBytes > data.length) throw new DerError("tlv.decode: truncated length");
    if (data[pos] === 0) throw new DerError("tlv.decode: length has leading zero");
    length = 0;
    for (let i = 0; i < lenBytes; i++) {
      length = length * 256 + data[pos++];
    }
    if (length < 0x80) throw new DerError("tlv.decode: length should use short form");
  }

  if (pos + length > data.length) throw new DerError("tlv.decode: value runs past end of input");

  return {
    element: {
      tag,
      value: data.subarray(pos, pos + length),
      raw: data.subarray(offset, pos + length),
    },
    next: pos + length,
  };
}

/** Reads exactly one element; anything after it is an error. */
export function decodeSingle(data: Buffer): DerElement {
  const { element, next } = readTlv(data, 0);
  if (next !== data.length) throw new DerError("tlv.decode: trailing data after element");
  return element;
}

/** Splits constructed content into its child elements. */
export function readChildren(content: Buffer): DerElement[] {
  const children: DerElement[] = [];
  let pos = 0;
  while (pos < content.length) {
    const { element, next } = readTlv(content, pos);
    children.push(element);
    pos = next;
  }
  return children;
}

export function expectTag(element: DerElement, tag: number, what: string): Buffer {
  if (element.tag !== tag) {
    throw new DerError(`${what}: expected tag 0x${tag.toString(16)}, got 0x${element.tag.toString(16)}`);
  }
  return element.value;
}

export function decodeInteger(content: Buffer): bigint {
  if (content.length === 0) throw new DerError("integer: empty");
  if (content[0] & 0x80) throw new DerError("integer: negative");
  if (content.length > 1 && content[0] === 0x00 && !(content[1] & 0x80)) {
    throw new DerError("integer: unnecessary leading zero");
  }
  return BigInt("0x" + content.toString("hex"));
}

/** Content of a BIT STRING with zero unused bits. */
export function decodeBitString(content: Buffer): Buffer {
  if (content.length === 0) throw new DerError("bit string: empty");
  if (content[0] !== 0) throw new DerError("bit string: unused bits are not supported");
  return content.subarray(1);
}

export function decodeObjectIdentifier(content: Buffer): string {
  if (content.length === 0) throw new DerError("oid: empty");
  const arcs: number[] = [];
  let value = 0;
  for (let i = 0; i < content.length; i++) {
    const byte = content[i];
    if (value === 0 && byte === 0x80) throw new DerError("oid: non-minimal arc");
    value = value * 128 + (byte & 0x7f);
    if (!(byte & 0x80)) {
      arcs.push(value);
      value = 0;
    } else if (i === content.length - 1) {
      throw new DerError("oid: truncated arc");
    }
  }
  const [head, ...rest] = arcs;
  const first = head < 80 ? Math.floor(head / 40) : 2;
  return [first, head - first * 40, ...rest].join(".");
}
