import type { Config, GenerationRequest, RawResponse } from "@filesmith/shared";
import { GenerationError } from "../lib/errors.js";
import { AnthropicGenerator } from "./anthropic-generator.js";
import { GeminiGenerator } from "./gemini-generator.js";

export interface GenerateOptions {
  signal?: AbortSignal;
}

/** The remote model: one structured request in, one text part out. */
export interface FileGenerator {
  readonly provider: string;
  readonly model: string;
  generate(request: GenerationRequest, options?: GenerateOptions): Promise<RawResponse>;
}

export function createGenerator(config: Config): FileGenerator {
  switch (config.provider) {
    case "gemini":
      return new GeminiGenerator({ apiKey: config.apiKey, model: config.model });
    case "anthropic":
      return new AnthropicGenerator({ apiKey: config.apiKey, model: config.model });
  }
}

/**
 * Runs one generation under a deadline. timeoutMs of 0 waits indefinitely.
 */
export async function generateWithDeadline(
  generator: FileGenerator,
  request: GenerationRequest,
  timeoutMs: number
): Promise<RawResponse> {
  if (timeoutMs <= 0) return generator.generate(request);

  const abortController = new AbortController();
  const timer = setTimeout(() => abortController.abort(), timeoutMs);
  try {
    return await generator.generate(request, { signal: abortController.signal });
  } catch (err) {
    if (abortController.signal.aborted) {
      throw new GenerationError(
        "timeout",
        `Error generating content: no response within ${timeoutMs}ms`,
        { cause: err }
      );
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
