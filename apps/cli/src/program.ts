import { Command, CommanderError } from "commander";
import type { Config } from "@filesmith/shared";
import { DEFAULT_OUTPUT_DIR, PROVIDERS } from "@filesmith/shared";
import { ConfigError, GenerationError, errorMessage } from "./lib/errors.js";
import { resolveConfig } from "./services/config-service.js";
import type { CliFlags } from "./services/config-service.js";
import { createGenerator } from "./services/generator.js";
import type { FileGenerator } from "./services/generator.js";
import type { TextSink } from "./services/input-collector.js";
import { runPipeline } from "./services/pipeline.js";

export interface CliDeps {
  input: NodeJS.ReadableStream;
  output: TextSink;
  env: NodeJS.ProcessEnv;
  createGenerator: (config: Config) => FileGenerator;
}

const LONG_FLAGS = ["key", "output", "provider", "model", "timeout", "verbose"];
const SINGLE_DASH_LONG = new RegExp(`^-(${LONG_FLAGS.join("|")})(=.*)?$`);

/** Accepts `-key value` and `-key=value` alongside the `--key` forms. */
export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map((arg) => (SINGLE_DASH_LONG.test(arg) ? `-${arg}` : arg));
}

export function buildProgram(output: TextSink): Command {
  return new Command()
    .name("filesmith")
    .description("Generate code files from a natural-language prompt")
    .option("-k, --key <key>", "API key for the generative AI service")
    .option("-o, --output <dir>", `Output directory for generated files (default: "${DEFAULT_OUTPUT_DIR}")`)
    .option("--provider <name>", `Generation provider: ${PROVIDERS.join(", ")} (default: "gemini")`)
    .option("--model <name>", "Model name, overriding the provider's default")
    .option("--timeout <ms>", "Deadline for the generation call in ms, 0 to wait indefinitely")
    .option("-v, --verbose", "Print request diagnostics to stderr")
    .configureOutput({ writeOut: (text) => output.write(text) })
    .exitOverride();
}

/** Runs one invocation and returns the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { output } = deps;
  const program = buildProgram(output);
  try {
    program.parse(normalizeArgv(argv), { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  try {
    const config = resolveConfig(program.opts<CliFlags>(), deps.env);

    let generator: FileGenerator;
    try {
      generator = deps.createGenerator(config);
    } catch (err) {
      throw new GenerationError("request", `Error creating client: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const result = await runPipeline(config, {
      generator,
      input: deps.input,
      output,
    });
    return result.status === "materialized" ? 0 : 1;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof GenerationError) {
      output.write(`${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

export function defaultCliDeps(): CliDeps {
  return {
    input: process.stdin,
    output: process.stdout,
    env: process.env,
    createGenerator,
  };
}
