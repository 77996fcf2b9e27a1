import { ExportFileSchema, type ExportRecord, type RelicRecord } from "@relic-curator/schema";
import { zodToJsonSchema } from "zod-to-json-schema";
import { writeJsonFile } from "../io/write-json.js";
import type { Dataset } from "../types.js";

function presentText(value: string | null): string | undefined {
  return value === null || value === "" ? undefined : value;
}

function stacksToBoolean(value: string | null): boolean | undefined {
  if (value === "Yes") {
    return true;
  }
  if (value === "No") {
    return false;
  }
  return undefined;
}

/**
 * Maps a record to the interchange shape: unset and empty values are left
 * out, `id` and `levelGroupId` never appear, gameIds become `ids` and the
 * Yes/No stacks markers become booleans.
 */
export function toExportRecord(record: RelicRecord): ExportRecord {
  const name = presentText(record.name);
  const category = presentText(record.category);
  const displayGroup = presentText(record.displayGroup);
  const levelGroup = presentText(record.levelGroup);
  const level = typeof record.level === "number" ? record.level : presentText(record.level);
  const stacks = stacksToBoolean(record.stacks);

  return {
    ...(record.gameIds.length > 0 ? { ids: [...record.gameIds].sort((left, right) => left - right) } : {}),
    ...(name !== undefined ? { name } : {}),
    ...(category !== undefined ? { category } : {}),
    ...(displayGroup !== undefined ? { displayGroup } : {}),
    ...(levelGroup !== undefined ? { levelGroup } : {}),
    ...(level !== undefined ? { level } : {}),
    ...(record.nightfarer ? { nightfarer: record.nightfarer } : {}),
    deep: record.deep,
    debuff: record.debuff,
    ...(stacks !== undefined ? { stacks } : {})
  };
}

export function exportRecords(dataset: Dataset): ExportRecord[] {
  return dataset.records.map(toExportRecord);
}

export function writeExportFile(dataset: Dataset, outputPath: string): number {
  const exported = exportRecords(dataset);
  writeJsonFile(outputPath, exported);
  return exported.length;
}

export function buildExportJsonSchema(): object {
  return zodToJsonSchema(ExportFileSchema, {
    name: "RelicExport",
    target: "jsonSchema7",
    $refStrategy: "none"
  });
}
