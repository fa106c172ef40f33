import { describe, expect, it } from "vitest";
import { ResponseParseError } from "../lib/errors.js";
import { parseGeneratedFiles } from "./response-parser.js";

function parseError(text: string): ResponseParseError {
  try {
    parseGeneratedFiles(text);
  } catch (err) {
    if (err instanceof ResponseParseError) return err;
    throw err;
  }
  throw new Error("expected parseGeneratedFiles to throw");
}

describe("parseGeneratedFiles", () => {
  it("maps wire fields onto file records in array order", () => {
    const text = JSON.stringify([
      { file_name: "main.go", source_code: "package main\n" },
      { file_name: "go.mod", source_code: "module demo\n" },
    ]);

    expect(parseGeneratedFiles(text)).toEqual([
      { name: "main.go", code: "package main\n" },
      { name: "go.mod", code: "module demo\n" },
    ]);
  });

  it("accepts an empty array", () => {
    expect(parseGeneratedFiles("[]")).toEqual([]);
  });

  it("ignores surrounding whitespace", () => {
    const body = '[{"file_name":"a.txt","source_code":"A"}]';
    expect(parseGeneratedFiles(`\n  ${body}\t\n`)).toEqual(parseGeneratedFiles(body));
  });

  it("drops fields outside the schema", () => {
    const text = '[{"file_name":"a.txt","source_code":"A","language":"text"}]';
    expect(parseGeneratedFiles(text)).toEqual([{ name: "a.txt", code: "A" }]);
  });

  it("rejects truncated JSON", () => {
    const err = parseError('[{"file_name":"a.txt","source_code":"A"}');
    expect(err.stage).toBe("json");
    expect(err.message.startsWith("Response is not valid JSON: ")).toBe(true);
  });

  it("rejects the whole response when one record misses a field", () => {
    const err = parseError(
      '[{"file_name":"a.txt","source_code":"A"},{"file_name":"b.txt"}]'
    );
    expect(err.stage).toBe("schema");
    expect(err.message).toBe(
      "Response does not match the file list schema: 1.source_code: Required"
    );
  });

  it("rejects non-string content", () => {
    const err = parseError('[{"file_name":"a.txt","source_code":42}]');
    expect(err.message).toBe(
      "Response does not match the file list schema: 0.source_code: Expected string, received number"
    );
  });

  it("rejects a bare object", () => {
    const err = parseError('{"file_name":"a.txt","source_code":"A"}');
    expect(err.message).toBe(
      "Response does not match the file list schema: (root): Expected array, received object"
    );
  });
});
