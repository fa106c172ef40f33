import Anthropic from "@anthropic-ai/sdk";
import type { GenerationRequest, RawResponse } from "@filesmith/shared";
import { GenerationError, errorMessage } from "../lib/errors.js";
import type { FileGenerator, GenerateOptions } from "./generator.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-sonnet-4-20250514";
const MAX_TOKENS = 8192;
const TOOL_NAME = "write_files";

/** The part of a reply this adapter reads: its content blocks. */
export interface ToolCallReply {
  content: ReadonlyArray<{ type: string; input?: unknown }>;
}

/** The slice of the SDK's `messages` surface this adapter calls. */
export interface AnthropicMessagesClient {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<ToolCallReply>;
}

export interface AnthropicGeneratorOptions {
  apiKey: string;
  model?: string;
  client?: AnthropicMessagesClient;
}

/**
 * Structured output through a forced tool call: the tool's input schema wraps
 * the requested array, and the tool input's `files` becomes the response text.
 */
export class AnthropicGenerator implements FileGenerator {
  readonly provider = "anthropic";
  readonly model: string;
  private readonly client: AnthropicMessagesClient;

  constructor(options: AnthropicGeneratorOptions) {
    this.model = options.model ?? ANTHROPIC_DEFAULT_MODEL;
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey }).messages;
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<RawResponse> {
    const tool: Anthropic.Tool = {
      name: TOOL_NAME,
      description: "Write the generated code files to disk.",
      input_schema: {
        type: "object",
        properties: { files: request.schema },
        required: ["files"],
      },
    };

    let message: ToolCallReply;
    try {
      message = await this.client.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          tools: [tool],
          tool_choice: { type: "tool", name: TOOL_NAME },
          messages: [{ role: "user", content: request.instruction }],
        },
        { signal: options.signal }
      );
    } catch (err) {
      throw new GenerationError("request", `Error generating content: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (message.content.length === 0) {
      throw new GenerationError("empty-response", "No response received");
    }

    const toolUse = message.content.find((block) => block.type === "tool_use");
    if (!toolUse) {
      throw new GenerationError("no-parts", `No response received: model did not call ${TOOL_NAME}`);
    }

    const input = toolUse.input;
    if (typeof input !== "object" || input === null || !("files" in input)) {
      throw new GenerationError("no-parts", `No response received: ${TOOL_NAME} input has no files`);
    }

    return { text: JSON.stringify(input.files), raw: toolUse };
  }
}
