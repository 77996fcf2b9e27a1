import { NightfarerSchema, type Nightfarer } from "@relic-curator/schema";

export const ALL_NIGHTFARERS: readonly Nightfarer[] = NightfarerSchema.options;

export const CHARACTER_RELIC_PREFIX = "Character Relic: ";
export const RELIC_PREFIX = "Relic: ";
export const RELIC_NAME_PREFIXES = [CHARACTER_RELIC_PREFIX, RELIC_PREFIX] as const;

export const NAME_COLUMN = "Name";
export const GAME_ID_COLUMNS = ["ID", "passiveSpEffectId_1", "passiveSpEffectId_2", "passiveSpEffectId_3"] as const;
export const DEBUFF_COLUMN = "isDebuff";
export const DEEP_COLUMN = "isNumericEffect";
export const LEVEL_GROUP_ID_COLUMN = "attachFilterParamId";

export const NIGHTFARER_COLUMNS: Record<string, Nightfarer> = {
  allowWylder: "Wylder",
  allowGuardian: "Guardian",
  allowIroneye: "Ironeye",
  allowDuchess: "Duchess",
  allowRaider: "Raider",
  allowRevenant: "Revenant",
  allowRecluse: "Recluse",
  allowExecutor: "Executor"
};

export const TRUTHY_TOKENS = new Set(["true", "1", "yes", "on", "t", "y"]);

export const DEBUFF_CATEGORY = "Debuff";

export const PROJECT_FILE_EXTENSION = ".rproj";
export const DEFAULT_PROJECT_PATH = "data/relics.rproj";
export const DEFAULT_EXPORT_PATH = "data/relics.json";
export const DEFAULT_EXPORT_SCHEMA_PATH = "data/relics.schema.json";
export const DEFAULT_CSV_DELIMITER = ",";
