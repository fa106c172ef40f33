// packages/shared/src/contracts/generation.ts

/**
 * Provider-neutral subset of JSON Schema used to declare the structured
 * response shape. Each generator adapter maps it onto its SDK's schema type.
 */
export type SchemaNode =
  | { type: "string"; description?: string }
  | {
      type: "object";
      description?: string;
      properties: Record<string, SchemaNode>;
      required: string[];
    }
  | { type: "array"; description?: string; items: SchemaNode };

export interface GenerationRequest {
  instruction: string;
  schema: SchemaNode;
  /** MIME type the model is asked to answer in */
  responseMimeType: "application/json";
}

export interface RawResponse {
  /** The single text part expected to hold the JSON array */
  text: string;
  /** Provider's first content part, kept for the debug print */
  raw: unknown;
}
