import { ConfigInputSchema } from "@filesmith/shared";
import type { Config } from "@filesmith/shared";
import { ConfigError } from "../lib/errors.js";

/** Raw option values as commander hands them over. */
export type CliFlags = {
  key?: string;
  output?: string;
  provider?: string;
  model?: string;
  timeout?: string;
  verbose?: boolean;
};

const PROVIDER_KEY_ENV: Record<string, string> = {
  gemini: "GEMINI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

/** Exported-but-empty variables count as unset. */
function envValue(env: NodeJS.ProcessEnv, name: string | undefined): string | undefined {
  if (name === undefined) return undefined;
  return env[name] || undefined;
}

/**
 * Merges flags over environment fallbacks and validates the result.
 * An explicit empty `-key ""` is not replaced by the environment.
 */
export function resolveConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): Config {
  const provider = flags.provider ?? envValue(env, "FILESMITH_PROVIDER") ?? "gemini";
  const apiKey =
    flags.key ??
    envValue(env, "FILESMITH_API_KEY") ??
    envValue(env, PROVIDER_KEY_ENV[provider]) ??
    "";

  const result = ConfigInputSchema.safeParse({
    apiKey,
    outputDir: flags.output ?? envValue(env, "FILESMITH_OUTPUT_DIR"),
    provider,
    model: flags.model ?? envValue(env, "FILESMITH_MODEL"),
    timeoutMs: flags.timeout,
    verbose: flags.verbose,
  });

  if (!result.success) {
    const message = result.error.issues
      .map((issue) =>
        issue.path[0] === "apiKey"
          ? issue.message
          : `Invalid ${issue.path.join(".")}: ${issue.message}`
      )
      .join("; ");
    throw new ConfigError(message);
  }

  return result.data;
}
