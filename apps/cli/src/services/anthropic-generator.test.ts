import type Anthropic from "@anthropic-ai/sdk";
import { describe, expect, it, vi } from "vitest";
import { GenerationError } from "../lib/errors.js";
import { buildGenerationRequest } from "./prompt-builder.js";
import { AnthropicGenerator } from "./anthropic-generator.js";
import type { ToolCallReply } from "./anthropic-generator.js";

function fakeClient(reply: ToolCallReply | Error) {
  return {
    create: vi.fn(
      async (_body: Anthropic.MessageCreateParamsNonStreaming, _options?: { signal?: AbortSignal }) => {
        if (reply instanceof Error) throw reply;
        return reply;
      }
    ),
  };
}

describe("AnthropicGenerator", () => {
  const request = buildGenerationRequest("a hello world in Go");
  const files = [{ file_name: "main.go", source_code: "package main" }];

  it("forces the write_files tool with the file list as its input schema", async () => {
    const client = fakeClient({ content: [{ type: "tool_use", input: { files } }] });
    const generator = new AnthropicGenerator({ apiKey: "test-key", client });
    const controller = new AbortController();

    await generator.generate(request, { signal: controller.signal });

    const call = client.create.mock.calls[0];
    const body = call?.[0];
    const options = call?.[1];
    expect(body?.model).toBe("claude-sonnet-4-20250514");
    expect(body?.tool_choice).toEqual({ type: "tool", name: "write_files" });
    expect(body?.tools).toEqual([
      {
        name: "write_files",
        description: "Write the generated code files to disk.",
        input_schema: {
          type: "object",
          properties: { files: request.schema },
          required: ["files"],
        },
      },
    ]);
    expect(body?.messages).toEqual([{ role: "user", content: request.instruction }]);
    expect(options?.signal).toBe(controller.signal);
  });

  it("serializes the tool input's files as the response text", async () => {
    const toolUse = { type: "tool_use", input: { files } };
    const generator = new AnthropicGenerator({
      apiKey: "test-key",
      client: fakeClient({ content: [{ type: "text" }, toolUse] }),
    });

    await expect(generator.generate(request)).resolves.toEqual({
      text: '[{"file_name":"main.go","source_code":"package main"}]',
      raw: toolUse,
    });
  });

  it("wraps SDK failures as request errors", async () => {
    const generator = new AnthropicGenerator({
      apiKey: "test-key",
      client: fakeClient(new Error("401 invalid x-api-key")),
    });

    const err = await generator.generate(request).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({ kind: "request", message: "Error generating content: 401 invalid x-api-key" });
  });

  it("reports an empty reply", async () => {
    const generator = new AnthropicGenerator({ apiKey: "test-key", client: fakeClient({ content: [] }) });

    await expect(generator.generate(request)).rejects.toMatchObject({
      kind: "empty-response",
      message: "No response received",
    });
  });

  it("reports a reply without the tool call", async () => {
    const generator = new AnthropicGenerator({
      apiKey: "test-key",
      client: fakeClient({ content: [{ type: "text" }] }),
    });

    await expect(generator.generate(request)).rejects.toMatchObject({
      kind: "no-parts",
      message: "No response received: model did not call write_files",
    });
  });

  it("reports a tool call without files", async () => {
    const generator = new AnthropicGenerator({
      apiKey: "test-key",
      client: fakeClient({ content: [{ type: "tool_use", input: {} }] }),
    });

    await expect(generator.generate(request)).rejects.toMatchObject({
      kind: "no-parts",
      message: "No response received: write_files input has no files",
    });
  });
});
