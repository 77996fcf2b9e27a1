import { z } from "zod";
import { SortColumnSchema } from "./enums.js";
import { RelicRecordSchema } from "./relic.js";

export const PROJECT_SNAPSHOT_VERSION = "1.0";

const UsedValuesSchema = z.array(z.string()).default([]);

// Sort state is view-only; a column this version does not know falls back to none.
function camelizeColumn(value: unknown): unknown {
  return typeof value === "string" ? value.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase()) : value;
}

export const ProjectSnapshotSchema = z
  .object({
    version: z.string().min(1).default(PROJECT_SNAPSHOT_VERSION),
    data: z.array(RelicRecordSchema),
    nextId: z.number().int().positive(),
    usedCategories: UsedValuesSchema,
    usedDisplayGroups: UsedValuesSchema,
    usedLevelGroups: UsedValuesSchema,
    usedLevels: UsedValuesSchema,
    usedStacks: UsedValuesSchema,
    sortColumn: z.preprocess(camelizeColumn, SortColumnSchema.nullable()).catch(null),
    sortReverse: z.boolean().catch(false)
  })
  .superRefine((snapshot, context) => {
    const seen = new Set<number>();
    for (const [index, record] of snapshot.data.entries()) {
      if (seen.has(record.id)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["data", index, "id"],
          message: `Duplicate record id ${record.id}`
        });
      }
      seen.add(record.id);
    }
  });
export type ProjectSnapshot = z.infer<typeof ProjectSnapshotSchema>;
