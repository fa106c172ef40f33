import type { GenerationRequest, SchemaNode } from "@filesmith/shared";

export const INSTRUCTION_PREFIX =
  "Based on the following request, generate the necessary code files:";

/** Static response shape: a list of { file_name, source_code } objects. */
export const FILES_RESPONSE_SCHEMA: SchemaNode = {
  type: "array",
  description: "List of all of the filenames and source code in the files.",
  items: {
    type: "object",
    description: "Object representing file.",
    properties: {
      file_name: {
        type: "string",
        description: "Name of the file: relative_path/file_name.file_extension",
      },
      source_code: {
        type: "string",
        description: "Source code located in the file.",
      },
    },
    required: ["file_name", "source_code"],
  },
};

export function buildInstruction(prompt: string): string {
  return `${INSTRUCTION_PREFIX}\n\n${prompt}`;
}

export function buildGenerationRequest(prompt: string): GenerationRequest {
  return {
    instruction: buildInstruction(prompt),
    schema: FILES_RESPONSE_SCHEMA,
    responseMimeType: "application/json",
  };
}
