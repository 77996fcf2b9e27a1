import { z } from "zod";
import { NightfarerSchema } from "./enums.js";

function blankToNull(value: unknown): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "string" && value.trim().length === 0) {
    return null;
  }
  return value;
}

// Older project files stored gameIds as a "1, 2, 3" string.
function coerceGameIds(value: unknown): unknown {
  if (value === undefined || value === null) {
    return [];
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map((part) => Number(part));
  }
  return value;
}

export const GameIdsSchema = z
  .preprocess(coerceGameIds, z.array(z.number().int().min(0)))
  .transform((ids) => Array.from(new Set(ids)).sort((left, right) => left - right));

export const OptionalTextSchema = z.preprocess(blankToNull, z.string().nullable());

export const LevelValueSchema = z.preprocess(blankToNull, z.union([z.number().int(), z.string()]).nullable());
export type LevelValue = NonNullable<z.infer<typeof LevelValueSchema>>;

/**
 * One relic as held in a working dataset.
 *
 * `null` marks a field the operator has not set yet. `levelGroupId` only
 * partitions records for auto-fill and never leaves the project file.
 */
export const RelicRecordSchema = z.object({
  id: z.number().int().positive(),
  gameIds: GameIdsSchema,
  name: z.string().min(1),
  category: OptionalTextSchema,
  displayGroup: OptionalTextSchema,
  levelGroup: OptionalTextSchema,
  level: LevelValueSchema,
  stacks: OptionalTextSchema,
  levelGroupId: z.number().int().default(0),
  nightfarer: z.preprocess(blankToNull, NightfarerSchema.nullable()),
  deep: z.boolean().default(false),
  debuff: z.boolean().default(false)
});
export type RelicRecord = z.infer<typeof RelicRecordSchema>;
