import { z } from "zod";
import { VIEW_KINDS } from "../../types/view";

export const viewPreferenceSchema = z.object({
  viewKind: z.enum(VIEW_KINDS).catch("table"),
  slideNumber: z.number().int().catch(1),
  selectedColumns: z
    .array(z.string())
    .catch([])
    .transform((columns) => Array.from(new Set(columns)))
});

export const preferenceMapSchema = z.record(viewPreferenceSchema);

export const storedConfigSchema = z.object({
  filePath: z.string(),
  fileName: z.string(),
  createdAt: z.string(),
  config: preferenceMapSchema
});

export type StoredConfig = z.infer<typeof storedConfigSchema>;
