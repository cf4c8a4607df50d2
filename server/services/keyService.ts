import { config, type NetworkName } from "../config/env";
import { NETWORK } from "../config/network";
import { defaultKeyPolicy, type KeyPolicy } from "../config/keyPolicy";
import { hexToBuffer } from "../crypto/bytes";
import { logger } from "../lib/logger";
import {
  KeyPair,
  PublicKey,
  defaultRandomSource,
  fromRecord,
  pubKeyHash,
  toAddress,
  toRecord,
  type ParametersForm,
  type RandomSource,
} from "../keys";

export interface PublicKeyMaterial {
  publicKeyHex: string;
  compressed: boolean;
  pubKeyHash: string;
  address: string;
  network: NetworkName;
}

export interface KeyMaterial extends PublicKeyMaterial {
  privateKeyHex: string;
}

export interface KeyServiceOptions {
  policy?: KeyPolicy;
  random?: RandomSource;
  network?: NetworkName;
}

export class KeyService {
  private readonly policy: KeyPolicy;
  private readonly random: RandomSource;
  private readonly network: NetworkName;

  constructor(options: KeyServiceOptions = {}) {
    this.policy = options.policy ?? defaultKeyPolicy;
    this.random = options.random ?? defaultRandomSource;
    this.network = options.network ?? NETWORK;
  }

  generate(compressed = true, network?: NetworkName): KeyMaterial {
    const keyPair = KeyPair.generate(this.random, this.policy).withCompression(compressed);
    logger.debug({ compressed }, "generated key pair");
    return this.describeKeyPair(keyPair, network);
  }

  derive(privateKeyHex: string, compressed = config.DEFAULT_COMPRESSED, network?: NetworkName): KeyMaterial {
    const keyPair = KeyPair.fromPrivate(hexToBuffer(privateKeyHex), compressed, this.policy);
    return this.describeKeyPair(keyPair, network);
  }

  exportRecord(
    privateKeyHex: string,
    compressed = config.DEFAULT_COMPRESSED,
    parameters: ParametersForm = "explicit",
  ): string {
    const keyPair = KeyPair.fromPrivate(hexToBuffer(privateKeyHex), compressed, this.policy);
    const record = toRecord(keyPair, { parameters });
    logger.debug({ compressed, parameters, bytes: record.length }, "exported EC private key record");
    return record.toString("hex");
  }

  importRecord(recordHex: string, network?: NetworkName): KeyMaterial {
    const record = hexToBuffer(recordHex);
    const keyPair = fromRecord(record, this.policy);
    logger.debug({ compressed: keyPair.isCompressed(), bytes: record.length }, "imported EC private key record");
    return this.describeKeyPair(keyPair, network);
  }

  /** Public-only key, optionally re-encoded in the other compression form. */
  describePublicKey(publicKeyHex: string, compressed?: boolean, network?: NetworkName): PublicKeyMaterial {
    const decoded = PublicKey.fromPublicOnly(hexToBuffer(publicKeyHex));
    return this.describePublic(compressed === undefined ? decoded : decoded.withCompression(compressed), network);
  }

  private describePublic(publicKey: PublicKey, network: NetworkName = this.network): PublicKeyMaterial {
    return {
      publicKeyHex: publicKey.toHex(),
      compressed: publicKey.compressed,
      pubKeyHash: pubKeyHash(publicKey).toString("hex"),
      address: toAddress(publicKey, network),
      network,
    };
  }

  private describeKeyPair(keyPair: KeyPair, network?: NetworkName): KeyMaterial {
    return {
      privateKeyHex: keyPair.privateKey.toHex(),
      ...this.describePublic(keyPair.publicKey, network),
    };
  }
}

export const keyService = new KeyService();
