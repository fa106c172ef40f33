import { GoogleGenAI, Type } from "@google/genai";
import type {
  GenerateContentParameters,
  GenerateContentResponse,
  Schema,
} from "@google/genai";
import type { GenerationRequest, RawResponse, SchemaNode } from "@filesmith/shared";
import { GenerationError, errorMessage } from "../lib/errors.js";
import type { FileGenerator, GenerateOptions } from "./generator.js";

export const GEMINI_DEFAULT_MODEL = "gemini-2.0-flash";

/** The slice of the SDK's `models` surface this adapter calls. */
export interface GeminiModelsClient {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
}

export interface GeminiGeneratorOptions {
  apiKey: string;
  model?: string;
  client?: GeminiModelsClient;
}

export function toGeminiSchema(node: SchemaNode): Schema {
  switch (node.type) {
    case "string":
      return { type: Type.STRING, description: node.description };
    case "array":
      return {
        type: Type.ARRAY,
        description: node.description,
        items: toGeminiSchema(node.items),
      };
    case "object":
      return {
        type: Type.OBJECT,
        description: node.description,
        properties: Object.fromEntries(
          Object.entries(node.properties).map(([key, value]): [string, Schema] => [key, toGeminiSchema(value)])
        ),
        propertyOrdering: Object.keys(node.properties),
        required: node.required,
      };
  }
}

export class GeminiGenerator implements FileGenerator {
  readonly provider = "gemini";
  readonly model: string;
  private readonly client: GeminiModelsClient;

  constructor(options: GeminiGeneratorOptions) {
    this.model = options.model ?? GEMINI_DEFAULT_MODEL;
    this.client = options.client ?? new GoogleGenAI({ apiKey: options.apiKey }).models;
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<RawResponse> {
    let response: GenerateContentResponse;
    try {
      response = await this.client.generateContent({
        model: this.model,
        contents: request.instruction,
        config: {
          responseMimeType: request.responseMimeType,
          responseSchema: toGeminiSchema(request.schema),
          abortSignal: options.signal,
        },
      });
    } catch (err) {
      throw new GenerationError("request", `Error generating content: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const candidate = response.candidates?.[0];
    if (!candidate) {
      throw new GenerationError("empty-response", "No response received");
    }

    const part = candidate.content?.parts?.[0];
    if (!part) {
      throw new GenerationError("no-parts", "No response received: candidate has no content parts");
    }
    if (typeof part.text !== "string") {
      throw new GenerationError("no-parts", "No response received: first part holds no text");
    }

    return { text: part.text, raw: part };
  }
}
