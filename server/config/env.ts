import { z } from "zod";
import { AppError, formatZodIssues } from "../lib/errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const networkNameSchema = z.enum(["mainnet", "testnet", "regtest"], {
  required_error: "network must be provided",
});

export type NetworkName = z.infer<typeof networkNameSchema>;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  BITCOIN_NETWORK: networkNameSchema.default("mainnet"),
  REJECT_SENTINEL_KEYS: booleanFlag.default("true"),
  DEFAULT_COMPRESSED: booleanFlag.default("true"),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new AppError("Invalid environment configuration", {
      code: "VALIDATION_ERROR",
      details: formatZodIssues(parsed.error.issues),
    });
  }
  return parsed.data;
}

export const config: AppConfig = loadConfig();
