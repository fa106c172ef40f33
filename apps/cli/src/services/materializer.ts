import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type {
  FileFailure,
  FileRecord,
  MaterializeResult,
  WrittenFile,
} from "@filesmith/shared";
import { ResponseParseError, errorMessage } from "../lib/errors.js";
import { resolveInside } from "../lib/paths.js";
import { parseGeneratedFiles } from "./response-parser.js";

const DIR_MODE = 0o755;
const FILE_MODE = 0o644;

/**
 * Writes parsed records under outputDir in array order. A failing record is
 * reported and skipped; the rest of the batch still runs.
 */
export async function writeFileRecords(
  outputDir: string,
  files: readonly FileRecord[]
): Promise<MaterializeResult> {
  try {
    await mkdir(outputDir, { recursive: true, mode: DIR_MODE });
  } catch (err) {
    return {
      status: "output-dir-error",
      outputDir,
      parsed: files.length,
      message: errorMessage(err),
    };
  }

  const written: WrittenFile[] = [];
  const failures: FileFailure[] = [];

  for (const [index, file] of files.entries()) {
    const fullPath = resolveInside(outputDir, file.name);
    if (fullPath === null) {
      failures.push({
        index,
        name: file.name,
        reason: "unsafe-path",
        message: "path escapes output directory",
      });
      continue;
    }

    try {
      await mkdir(dirname(fullPath), { recursive: true, mode: DIR_MODE });
    } catch (err) {
      failures.push({ index, name: file.name, reason: "mkdir", message: errorMessage(err) });
      continue;
    }

    try {
      await writeFile(fullPath, file.code, { encoding: "utf-8", mode: FILE_MODE });
    } catch (err) {
      failures.push({ index, name: file.name, reason: "write", message: errorMessage(err) });
      continue;
    }

    written.push({ index, name: file.name, path: fullPath });
  }

  return { status: "materialized", outputDir, attempted: files.length, written, failures };
}

/** Parses the raw response text and writes every record it holds. */
export async function materializeResponse(
  responseText: string,
  outputDir: string
): Promise<MaterializeResult> {
  let files: FileRecord[];
  try {
    files = parseGeneratedFiles(responseText);
  } catch (err) {
    if (err instanceof ResponseParseError) {
      return { status: "parse-error", stage: err.stage, message: err.message };
    }
    throw err;
  }

  return writeFileRecords(outputDir, files);
}
