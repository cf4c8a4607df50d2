import { z } from "zod";
import { AppError, formatZodIssues } from "./errors";
import { networkNameSchema } from "../config/env";

const HEX_REGEX = /^[0-9a-fA-F]+$/;

const hexString = (name: string, maxChars: number) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .transform((value) => value.replace(/^0x/i, ""))
    .pipe(
      z
        .string()
        .min(2, `${name} cannot be empty`)
        .max(maxChars, `${name} too large`)
        .regex(HEX_REGEX, `${name} must be hex`)
        .refine((value) => value.length % 2 === 0, "Hex length must be even"),
    );

export const privateKeyHexSchema = hexString("privateKeyHex", 64);

export const publicKeyHexSchema = hexString("publicKeyHex", 130).refine(
  (value) => value.length === 66 || value.length === 130,
  "publicKeyHex must be 33 or 65 bytes",
);

export const recordHexSchema = hexString("recordHex", 1024);

export const generateRequestSchema = z.object({
  compressed: z.boolean().default(true),
  network: networkNameSchema.optional(),
});

export const deriveRequestSchema = z.object({
  privateKeyHex: privateKeyHexSchema,
  compressed: z.boolean().optional(),
  network: networkNameSchema.optional(),
});

export const exportRequestSchema = z.object({
  privateKeyHex: privateKeyHexSchema,
  compressed: z.boolean().optional(),
  parameters: z.enum(["explicit", "named"]).default("explicit"),
});

export const importRequestSchema = z.object({
  recordHex: recordHexSchema,
  network: networkNameSchema.optional(),
});

export const publicKeyRequestSchema = z.object({
  publicKeyHex: publicKeyHexSchema,
  compressed: z.boolean().optional(),
  network: networkNameSchema.optional(),
});

export const parseSchema = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError("Invalid request payload", {
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: formatZodIssues(parsed.error.issues),
    });
  }
  return parsed.data;
};

export const parseBody = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T =>
  parseSchema(schema, body);
