import { z } from "zod";

export const NightfarerSchema = z.enum([
  "Wylder",
  "Guardian",
  "Ironeye",
  "Duchess",
  "Raider",
  "Revenant",
  "Recluse",
  "Executor"
]);
export type Nightfarer = z.infer<typeof NightfarerSchema>;

export const EditableFieldSchema = z.enum(["category", "displayGroup", "levelGroup", "level", "stacks"]);
export type EditableField = z.infer<typeof EditableFieldSchema>;

export const SortColumnSchema = z.enum([
  "id",
  "gameIds",
  "name",
  "debuff",
  "deep",
  "stacks",
  "levelGroup",
  "levelGroupId",
  "nightfarer",
  "category",
  "displayGroup",
  "level"
]);
export type SortColumn = z.infer<typeof SortColumnSchema>;

export const StacksSentinelSchema = z.enum(["Yes", "No"]);
export type StacksSentinel = z.infer<typeof StacksSentinelSchema>;
