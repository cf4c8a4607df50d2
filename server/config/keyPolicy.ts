import { config, type AppConfig } from "./env";

export interface KeyPolicy {
  /** Refuse 1 as a private scalar; it usually means a boolean leaked into key material. */
  rejectSentinelScalars: boolean;
}

export const keyPolicyFromEnv = (source: AppConfig = config): KeyPolicy => ({
  rejectSentinelScalars: source.REJECT_SENTINEL_KEYS,
});

export const defaultKeyPolicy: KeyPolicy = Object.freeze(keyPolicyFromEnv());
