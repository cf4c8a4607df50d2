import { crypto as bitcoinCrypto, payments } from "bitcoinjs-lib";
import { getBitcoinJsNetwork, NETWORK } from "../config/network";
import type { NetworkName } from "../config/env";
import { AppError } from "../lib/errors";
import type { PublicKey } from "./publicKey";

export const PUBKEY_HASH_LENGTH = 20;

/** RIPEMD160(SHA256(data)) */
export const hash160 = (data: Uint8Array): Buffer => bitcoinCrypto.hash160(Buffer.from(data));

/** Hash of the key's currently encoded form; compressed and uncompressed keys hash differently. */
export function pubKeyHash(publicKey: PublicKey): Buffer {
  return hash160(publicKey.getPubKey());
}

/** Base58check P2PKH address for the key on the given network. */
export function toAddress(publicKey: PublicKey, network: NetworkName = NETWORK): string {
  const { address } = payments.p2pkh({
    hash: pubKeyHash(publicKey),
    network: getBitcoinJsNetwork(network),
  });
  if (!address) {
    throw new AppError("Failed to derive P2PKH address");
  }
  return address;
}
