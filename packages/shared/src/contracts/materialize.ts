// packages/shared/src/contracts/materialize.ts

/** One generated artifact, as parsed from the response */
export interface FileRecord {
  /** relative_path/file_name.ext */
  readonly name: string;
  readonly code: string;
}

export type FileFailureReason = "unsafe-path" | "mkdir" | "write";

export interface WrittenFile {
  /** Position in the response array, 0-based */
  index: number;
  name: string;
  path: string;
}

export interface FileFailure {
  index: number;
  name: string;
  reason: FileFailureReason;
  message: string;
}

export type MaterializeResult =
  | { status: "parse-error"; stage: "json" | "schema"; message: string }
  | { status: "output-dir-error"; outputDir: string; parsed: number; message: string }
  | {
      status: "materialized";
      outputDir: string;
      attempted: number;
      written: WrittenFile[];
      failures: FileFailure[];
    };
