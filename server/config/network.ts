import { networks, type Network } from "bitcoinjs-lib";
import { config, type NetworkName } from "./env";

export const NETWORK: NetworkName = config.BITCOIN_NETWORK;

export function getBitcoinJsNetwork(name: NetworkName = NETWORK): Network {
  switch (name) {
    case "testnet":
      return networks.testnet;
    case "regtest":
      return networks.regtest;
    case "mainnet":
    default:
      return networks.bitcoin;
  }
}
