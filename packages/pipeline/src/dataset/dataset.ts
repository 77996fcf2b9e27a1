import type { EditableField, RelicRecord, SortColumn } from "@relic-curator/schema";
import type { Dataset, UsedValues } from "../types.js";

export function createUsedValues(): UsedValues {
  return {
    category: new Set(),
    displayGroup: new Set(),
    levelGroup: new Set(),
    level: new Set(),
    stacks: new Set()
  };
}

export function createDataset(records: RelicRecord[] = [], nextId = 1): Dataset {
  return {
    records,
    nextId,
    used: createUsedValues(),
    sort: { column: null, reverse: false }
  };
}

/** Moves the whole state of `source` into `target` in one step. */
export function replaceDataset(target: Dataset, source: Dataset): void {
  target.records = source.records;
  target.nextId = source.nextId;
  target.used = source.used;
  target.sort = source.sort;
}

export function clearDataset(dataset: Dataset): void {
  replaceDataset(dataset, createDataset());
}

export function getRecords(dataset: Dataset): readonly RelicRecord[] {
  return dataset.records;
}

function selectRecords(dataset: Dataset, ids: Iterable<number>): RelicRecord[] {
  const wanted = new Set(ids);
  return dataset.records.filter((record) => wanted.has(record.id));
}

export interface SetFieldOptions {
  /** Record the value for later suggestions. Off for preset picks such as Yes/No. */
  remember?: boolean;
}

/**
 * Writes a trimmed value into one editable field of the selected records.
 * Blank values change nothing.
 */
export function setField(
  dataset: Dataset,
  ids: Iterable<number>,
  field: EditableField,
  value: string,
  options: SetFieldOptions = {}
): number {
  const trimmed = value.trim();
  if (!trimmed) {
    return 0;
  }

  const selected = selectRecords(dataset, ids);
  for (const record of selected) {
    record[field] = trimmed;
  }
  if (options.remember ?? true) {
    dataset.used[field].add(trimmed);
  }
  return selected.length;
}

export function clearField(dataset: Dataset, ids: Iterable<number>, field: EditableField): number {
  const selected = selectRecords(dataset, ids);
  for (const record of selected) {
    record[field] = null;
  }
  return selected.length;
}

/**
 * Copies the level group into the display group when every selected record
 * that has a level group agrees on it.
 */
export function applyLevelGroupToDisplayGroup(dataset: Dataset, ids: Iterable<number>): number {
  const selected = selectRecords(dataset, ids);
  const levelGroups = new Set(
    selected.map((record) => record.levelGroup?.trim() ?? "").filter((levelGroup) => levelGroup.length > 0)
  );
  if (levelGroups.size !== 1) {
    return 0;
  }

  const [levelGroup] = levelGroups;
  for (const record of selected) {
    record.displayGroup = levelGroup;
  }
  return selected.length;
}

export function getUsedValues(dataset: Dataset, field: EditableField): string[] {
  return Array.from(dataset.used[field]).sort((left, right) => left.localeCompare(right));
}

type SortKey = number | string;

function toIntegerKey(value: unknown): number {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return 0;
}

export function sortKeyFor(record: RelicRecord, column: SortColumn): SortKey {
  switch (column) {
    case "id":
      return record.id;
    case "gameIds":
      return record.gameIds[0] ?? 0;
    case "level":
      return toIntegerKey(record.level);
    case "levelGroupId":
      return record.levelGroupId;
    case "debuff":
      return record.debuff ? 1 : 0;
    case "deep":
      return record.deep ? 1 : 0;
    case "stacks":
      return record.stacks ? 1 : 0;
    default:
      return (record[column] ?? "").toLowerCase();
  }
}

function compareKeys(left: SortKey, right: SortKey): number {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  const leftText = String(left);
  const rightText = String(right);
  if (leftText === rightText) {
    return 0;
  }
  return leftText < rightText ? -1 : 1;
}

/**
 * Reorders the records by one column. Sorting the same column again flips the
 * direction; a new column starts ascending. Equal keys keep their order.
 */
export function sortBy(dataset: Dataset, column: SortColumn): readonly RelicRecord[] {
  if (dataset.sort.column === column) {
    dataset.sort = { column, reverse: !dataset.sort.reverse };
  } else {
    dataset.sort = { column, reverse: false };
  }

  const direction = dataset.sort.reverse ? -1 : 1;
  dataset.records = [...dataset.records].sort(
    (left, right) => direction * compareKeys(sortKeyFor(left, column), sortKeyFor(right, column))
  );
  return dataset.records;
}
