// packages/shared/src/schemas/config.zod.ts
import { z } from "zod";

export const PROVIDERS = ["gemini", "anthropic"] as const;

export const DEFAULT_OUTPUT_DIR = "output";
export const DEFAULT_TIMEOUT_MS = 120_000;

export const ProviderSchema = z.enum(PROVIDERS);

export const ConfigSchema = z.object({
  apiKey: z.string().min(1, "API key is required"),
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  provider: ProviderSchema.default("gemini"),
  model: z.string().min(1).optional(),
  /** 0 disables the deadline */
  timeoutMs: z.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
  verbose: z.boolean().default(false),
});

/** Timeout as typed on the command line: digits only, no sign, exponent or hex */
export const TimeoutFlagSchema = z
  .string()
  .regex(/^\d+$/, "Expected a whole number of milliseconds")
  .transform(Number);

/** ConfigSchema fed from flag and environment strings */
export const ConfigInputSchema = ConfigSchema.extend({
  timeoutMs: TimeoutFlagSchema.optional().transform((ms) => ms ?? DEFAULT_TIMEOUT_MS),
});

export type Config = z.infer<typeof ConfigSchema>;
