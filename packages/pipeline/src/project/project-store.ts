import { readFileSync } from "node:fs";
import { PROJECT_SNAPSHOT_VERSION, ProjectSnapshotSchema, type ProjectSnapshot } from "@relic-curator/schema";
import { createDataset, replaceDataset } from "../dataset/dataset.js";
import { describeError, FormatError, ParseError } from "../errors.js";
import { writeJsonFile } from "../io/write-json.js";
import type { Dataset, LoadProjectResult } from "../types.js";
import { isJsonObject, migrateProjectPayload } from "./migrate-project.js";

function sortedValues(values: Set<string>): string[] {
  return Array.from(values).sort((left, right) => left.localeCompare(right));
}

export function serializeProject(dataset: Dataset): ProjectSnapshot {
  return {
    version: PROJECT_SNAPSHOT_VERSION,
    data: dataset.records,
    nextId: dataset.nextId,
    usedCategories: sortedValues(dataset.used.category),
    usedDisplayGroups: sortedValues(dataset.used.displayGroup),
    usedLevelGroups: sortedValues(dataset.used.levelGroup),
    usedLevels: sortedValues(dataset.used.level),
    usedStacks: sortedValues(dataset.used.stacks),
    sortColumn: dataset.sort.column,
    sortReverse: dataset.sort.reverse
  };
}

export function saveProject(dataset: Dataset, filePath: string): ProjectSnapshot {
  const snapshot = serializeProject(dataset);
  writeJsonFile(filePath, snapshot);
  return snapshot;
}

export function parseProjectSnapshot(
  payload: unknown,
  filePath?: string
): { snapshot: ProjectSnapshot; migrated: boolean } {
  const migration = migrateProjectPayload(payload);
  const migrated = migration.payload;
  const location = filePath ? ` in ${filePath}` : "";

  if (!isJsonObject(migrated) || !("data" in migrated) || !("nextId" in migrated)) {
    throw new FormatError(`Not a project file${location}: expected "data" and "nextId"`, { filePath });
  }

  const parsed = ProjectSnapshotSchema.safeParse(migrated);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new FormatError(
      `Invalid project file${location}: ${issue?.path.join(".") || "<root>"} ${issue?.message ?? "unknown error"}`,
      { filePath, cause: parsed.error }
    );
  }

  return { snapshot: parsed.data, migrated: migration.migrated };
}

export function datasetFromSnapshot(snapshot: ProjectSnapshot): Dataset {
  const dataset = createDataset(snapshot.data, snapshot.nextId);
  dataset.used = {
    category: new Set(snapshot.usedCategories),
    displayGroup: new Set(snapshot.usedDisplayGroups),
    levelGroup: new Set(snapshot.usedLevelGroups),
    level: new Set(snapshot.usedLevels),
    stacks: new Set(snapshot.usedStacks)
  };
  dataset.sort = { column: snapshot.sortColumn, reverse: snapshot.sortReverse };
  return dataset;
}

function readJson(filePath: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ParseError(`Cannot read ${filePath}: ${describeError(error)}`, { filePath, cause: error });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Project file ${filePath} is not valid JSON: ${describeError(error)}`, {
      filePath,
      cause: error
    });
  }
}

export function loadProject(filePath: string): LoadProjectResult {
  const { snapshot, migrated } = parseProjectSnapshot(readJson(filePath), filePath);
  return { dataset: datasetFromSnapshot(snapshot), migrated };
}

/** Loads a project file and swaps it into `dataset` only after it validated. */
export function loadProjectInto(dataset: Dataset, filePath: string): boolean {
  const loaded = loadProject(filePath);
  replaceDataset(dataset, loaded.dataset);
  return loaded.migrated;
}
