/** Invalid or missing configuration; aborts before any request is made. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type GenerationErrorKind =
  | "request"
  | "timeout"
  | "empty-response"
  | "no-parts";

/** Terminal failure of the remote generation call. */
export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
    this.kind = kind;
  }
}

/** The response text was not a JSON array of file records. */
export class ResponseParseError extends Error {
  readonly stage: "json" | "schema";

  constructor(stage: "json" | "schema", message: string) {
    super(message);
    this.name = "ResponseParseError";
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
