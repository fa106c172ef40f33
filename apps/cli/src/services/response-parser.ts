import { GeneratedFilesSchema } from "@filesmith/shared";
import type { FileRecord } from "@filesmith/shared";
import { ResponseParseError } from "../lib/errors.js";

/**
 * Parses the model's structured response into file records.
 *
 * Expected format (surrounding whitespace allowed):
 *   [
 *     { "file_name": "src/main.ts", "source_code": "..." }
 *   ]
 *
 * All-or-nothing: a single malformed record rejects the whole response.
 */
export function parseGeneratedFiles(responseText: string): FileRecord[] {
  const text = responseText.trim();

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ResponseParseError("json", `Response is not valid JSON: ${detail}`);
  }

  const result = GeneratedFilesSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      })
      .join("; ");
    throw new ResponseParseError(
      "schema",
      `Response does not match the file list schema: ${issues}`
    );
  }

  return result.data.map((file) => ({
    name: file.file_name,
    code: file.source_code,
  }));
}
