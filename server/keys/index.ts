export { derivePublicPoint } from "./derivation";
export { PrivateKey } from "./privateKey";
export {
  PublicKey,
  PointEncoding,
  assertSupportedEncoding,
  withCompression,
  compressPoint,
  decompressPoint,
} from "./publicKey";
export { KeyPair, defaultRandomSource, type RandomSource } from "./keyPair";
export { toRecord, fromRecord, type RecordOptions } from "./ecPrivateKeyRecord";
export { encodeEcParameters, verifyEcParameters, type ParametersForm } from "./ecParameters";
export { hash160, pubKeyHash, toAddress, PUBKEY_HASH_LENGTH } from "./pubKeyHash";
