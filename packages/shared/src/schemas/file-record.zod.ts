// packages/shared/src/schemas/file-record.zod.ts
import { z } from "zod";

export const FileRecordSchema = z.object({
  file_name: z.string(),
  source_code: z.string(),
});

export const GeneratedFilesSchema = z.array(FileRecordSchema);
