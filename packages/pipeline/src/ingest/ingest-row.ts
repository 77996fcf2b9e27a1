import type { Nightfarer, RelicRecord } from "@relic-curator/schema";
import {
  DEBUFF_COLUMN,
  DEEP_COLUMN,
  GAME_ID_COLUMNS,
  LEVEL_GROUP_ID_COLUMN,
  NAME_COLUMN,
  NIGHTFARER_COLUMNS,
  RELIC_NAME_PREFIXES,
  TRUTHY_TOKENS
} from "../constants.js";
import type { RawRow } from "../types.js";

export function parseLenientBoolean(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  return TRUTHY_TOKENS.has(value.trim().toLowerCase());
}

function parseInteger(value: string | undefined): number | null {
  const trimmed = value?.trim() ?? "";
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

export function collectGameIds(row: RawRow): number[] {
  const ids = new Set<number>();
  for (const column of GAME_ID_COLUMNS) {
    const parsed = parseInteger(row[column]);
    if (parsed !== null && parsed > 0) {
      ids.add(parsed);
    }
  }
  return Array.from(ids).sort((left, right) => left - right);
}

export function extractRelicName(rawName: string | undefined): string | null {
  const name = rawName?.trim() ?? "";
  const prefix = RELIC_NAME_PREFIXES.find((candidate) => name.startsWith(candidate));
  if (!prefix) {
    return null;
  }
  const stripped = name.slice(prefix.length).trim();
  return stripped.length > 0 ? stripped : null;
}

export function detectNightfarer(row: RawRow): Nightfarer | null {
  const allowed = Object.entries(NIGHTFARER_COLUMNS)
    .filter(([column]) => parseLenientBoolean(row[column]))
    .map(([, nightfarer]) => nightfarer);
  return allowed.length === 1 ? allowed[0] : null;
}

/**
 * Derives a record from one source row, or `null` when the row does not name a
 * relic. Malformed numbers and flags fall back to 0 and false.
 */
export function ingestRow(row: RawRow, id: number): RelicRecord | null {
  const name = extractRelicName(row[NAME_COLUMN]);
  if (name === null) {
    return null;
  }

  return {
    id,
    gameIds: collectGameIds(row),
    name,
    category: null,
    displayGroup: null,
    levelGroup: null,
    level: null,
    stacks: null,
    levelGroupId: parseInteger(row[LEVEL_GROUP_ID_COLUMN]) ?? 0,
    nightfarer: detectNightfarer(row),
    // The source flags numeric effects; a "0" there marks a deep relic.
    deep: row[DEEP_COLUMN]?.trim() === "0",
    debuff: parseLenientBoolean(row[DEBUFF_COLUMN])
  };
}
