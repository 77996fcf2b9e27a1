type JsonObject = Record<string, unknown>;

// Later entries win when an old file carries both spellings of a key.
const ROOT_KEY_RENAMES: ReadonlyArray<readonly [string, string]> = [
  ["next_id", "nextId"],
  ["used_categories", "usedCategories"],
  ["used_display_groups", "usedDisplayGroups"],
  ["used_level_groups", "usedLevelGroups"],
  ["used_levels", "usedLevels"],
  ["used_stacks", "usedStacks"],
  ["sort_column", "sortColumn"],
  ["sort_reverse", "sortReverse"],
  ["used_stack_groups", "usedLevelGroups"]
];

const RECORD_KEY_RENAMES: ReadonlyArray<readonly [string, string]> = [
  ["display_group", "displayGroup"],
  ["level_group_id", "levelGroupId"],
  ["level_group", "levelGroup"],
  ["stack_id", "levelGroupId"],
  ["stack_group", "levelGroup"]
];

export interface MigrationResult {
  payload: unknown;
  migrated: boolean;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function renameKeys(source: JsonObject, renames: ReadonlyArray<readonly [string, string]>): {
  value: JsonObject;
  changed: boolean;
} {
  if (!renames.some(([from]) => from in source)) {
    return { value: source, changed: false };
  }

  const next: JsonObject = { ...source };
  for (const [from, to] of renames) {
    if (from in next) {
      next[to] = next[from];
      delete next[from];
    }
  }
  return { value: next, changed: true };
}

/**
 * Renames keys written by earlier versions of the project format. Values are
 * never touched, the input is not mutated, and a migrated payload migrates to
 * itself.
 */
export function migrateProjectPayload(payload: unknown): MigrationResult {
  if (!isJsonObject(payload)) {
    return { payload, migrated: false };
  }

  const root = renameKeys(payload, ROOT_KEY_RENAMES);
  let migrated = root.changed;
  const data = root.value.data;
  if (!Array.isArray(data)) {
    return { payload: root.value, migrated };
  }

  const records = data.map((entry: unknown) => {
    if (!isJsonObject(entry)) {
      return entry;
    }
    const record = renameKeys(entry, RECORD_KEY_RENAMES);
    migrated ||= record.changed;
    return record.value;
  });

  if (!migrated) {
    return { payload, migrated: false };
  }
  return { payload: { ...root.value, data: records }, migrated: true };
}
