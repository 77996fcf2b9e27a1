import { z } from "zod";
import { NightfarerSchema } from "./enums.js";

/**
 * Interchange shape of one relic. Every key is present only when it carries a
 * value; internal bookkeeping (`id`, `levelGroupId`) is never part of it.
 */
export const ExportRecordSchema = z
  .object({
    ids: z.array(z.number().int().min(0)).min(1).optional(),
    name: z.string().min(1).optional(),
    category: z.string().min(1).optional(),
    displayGroup: z.string().min(1).optional(),
    levelGroup: z.string().min(1).optional(),
    level: z.union([z.number().int(), z.string().min(1)]).optional(),
    nightfarer: NightfarerSchema.optional(),
    deep: z.boolean().optional(),
    debuff: z.boolean().optional(),
    stacks: z.boolean().optional()
  })
  .strict();
export type ExportRecord = z.infer<typeof ExportRecordSchema>;

export const ExportFileSchema = z.array(ExportRecordSchema);
