// packages/shared/src/index.ts — barrel export

// Zod schemas
export { GeneratedFilesSchema } from "./schemas/file-record.zod.js";

export {
  ConfigInputSchema,
  PROVIDERS,
  DEFAULT_OUTPUT_DIR,
} from "./schemas/config.zod.js";

export type { Config } from "./schemas/config.zod.js";

// Types — generation
export type {
  SchemaNode,
  GenerationRequest,
  RawResponse,
} from "./contracts/generation.js";

// Types — materialization
export type {
  FileRecord,
  FileFailureReason,
  WrittenFile,
  FileFailure,
  MaterializeResult,
} from "./contracts/materialize.js";
