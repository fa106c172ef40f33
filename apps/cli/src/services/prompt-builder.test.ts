import { describe, expect, it } from "vitest";
import {
  FILES_RESPONSE_SCHEMA,
  buildGenerationRequest,
  buildInstruction,
} from "./prompt-builder.js";

describe("buildInstruction", () => {
  it("prefixes the prompt with the framing text", () => {
    expect(buildInstruction("a todo CLI in Go")).toBe(
      "Based on the following request, generate the necessary code files:\n\na todo CLI in Go"
    );
  });

  it("forwards an empty prompt as-is", () => {
    expect(buildInstruction("")).toBe(
      "Based on the following request, generate the necessary code files:\n\n"
    );
  });
});

describe("buildGenerationRequest", () => {
  it("pairs the instruction with the static file list schema", () => {
    const request = buildGenerationRequest("hello");

    expect(request.responseMimeType).toBe("application/json");
    expect(request.schema).toBe(FILES_RESPONSE_SCHEMA);
    expect(buildGenerationRequest("something else").schema).toBe(request.schema);
  });

  it("declares an array of objects with two required string fields", () => {
    const schema = FILES_RESPONSE_SCHEMA;
    expect(schema.type).toBe("array");
    if (schema.type !== "array") return;

    const items = schema.items;
    expect(items.type).toBe("object");
    if (items.type !== "object") return;

    expect(Object.keys(items.properties)).toEqual(["file_name", "source_code"]);
    expect(items.properties.file_name?.type).toBe("string");
    expect(items.properties.source_code?.type).toBe("string");
    expect(items.required).toEqual(["file_name", "source_code"]);
  });
});
