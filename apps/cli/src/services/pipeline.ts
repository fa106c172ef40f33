import type { Config, FileFailureReason, MaterializeResult } from "@filesmith/shared";
import { buildGenerationRequest } from "./prompt-builder.js";
import { generateWithDeadline } from "./generator.js";
import type { FileGenerator } from "./generator.js";
import { readPrompt } from "./input-collector.js";
import type { TextSink } from "./input-collector.js";
import { materializeResponse } from "./materializer.js";

export interface PipelineDeps {
  generator: FileGenerator;
  input: NodeJS.ReadableStream;
  output: TextSink;
}

/**
 * Prompt → request → remote generation → files on disk.
 * Generation failures throw; parse and output-dir failures come back in the result.
 */
export async function runPipeline(
  config: Config,
  deps: PipelineDeps
): Promise<MaterializeResult> {
  const { generator, input, output } = deps;

  const prompt = await readPrompt(input, output);
  const request = buildGenerationRequest(prompt);

  if (config.verbose) {
    console.error(`[pipeline] Calling ${generator.provider} (${generator.model})...`);
  }
  const startedAt = Date.now();
  const response = await generateWithDeadline(generator, request, config.timeoutMs);
  if (config.verbose) {
    console.error(`[pipeline] Response received in ${Date.now() - startedAt}ms`);
  }

  output.write("\nAPI Response:\n");
  output.write(`${JSON.stringify(response.raw, null, 2)}\n`);

  const result = await materializeResponse(response.text, config.outputDir);
  reportResult(result, output);
  return result;
}

export function reportResult(result: MaterializeResult, output: TextSink): void {
  switch (result.status) {
    case "parse-error":
      output.write(`Error parsing response: ${result.message}\n`);
      return;

    case "output-dir-error":
      output.write(`\nSuccessfully parsed ${result.parsed} file(s)\n`);
      output.write(`Error creating output directory: ${result.message}\n`);
      return;

    case "materialized": {
      output.write(`\nSuccessfully parsed ${result.attempted} file(s)\n`);

      // Written files and failures interleaved back into response order
      const lines = [
        ...result.written.map((file) => ({
          index: file.index,
          text: `\nFile ${file.index + 1}: ${file.name} written to ${file.path}\n`,
        })),
        ...result.failures.map((failure) => ({
          index: failure.index,
          text: `${describeFailure(failure.reason, failure.name, failure.message)}\n`,
        })),
      ].sort((a, b) => a.index - b.index);

      for (const line of lines) output.write(line.text);

      if (result.failures.length === 0) {
        output.write(`\nAll files have been written to the '${result.outputDir}' directory\n`);
      } else {
        output.write(
          `\nWrote ${result.written.length} of ${result.attempted} file(s) to the '${result.outputDir}' directory\n`
        );
      }
      return;
    }
  }
}

function describeFailure(
  reason: FileFailureReason,
  name: string,
  message: string
): string {
  switch (reason) {
    case "unsafe-path":
      return `Refusing to write ${name}: ${message}`;
    case "mkdir":
      return `Error creating directory for ${name}: ${message}`;
    case "write":
      return `Error writing file ${name}: ${message}`;
  }
}
