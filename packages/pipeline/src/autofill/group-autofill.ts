import type { RelicRecord } from "@relic-curator/schema";
import { stripFactionTag } from "../normalize/standardize-name.js";
import {
  capitalizeFirst,
  findCommonPrefix,
  findCommonSuffix,
  findCommonWords,
  findLongestCommonSubstring
} from "../text/similarity.js";
import type { AutofillResult } from "../types.js";

const LEVEL_SUFFIX_PATTERN = / \+(\d+)$/;

export function extractLevelFromName(name: string): number | null {
  const match = name.trim().match(LEVEL_SUFFIX_PATTERN);
  return match ? Number(match[1]) : null;
}

/**
 * Picks the longest of the common prefix, suffix, leading words and substring
 * of the names, ignoring faction brackets. Returns "" when nothing is shared.
 */
export function findCommonText(names: readonly string[]): string {
  const cleaned = names.map((name) => stripFactionTag(name.trim()).trim()).filter((name) => name.length > 0);
  if (cleaned.length < 2) {
    return "";
  }

  const candidates = [
    findCommonPrefix(cleaned),
    findCommonSuffix(cleaned),
    findCommonWords(cleaned),
    findLongestCommonSubstring(cleaned)
  ].filter((candidate) => candidate.trim().length > 0);
  if (candidates.length === 0) {
    return "";
  }

  const longest = candidates.reduce((best, candidate) => (candidate.length > best.length ? candidate : best));
  return capitalizeFirst(longest.trim());
}

/**
 * Mixed groups count the bare name as level 1 and "+n" as n + 1; fully
 * suffixed groups take n as is. Groups without any suffix are left alone.
 */
export function assignLevels(records: readonly RelicRecord[]): number {
  const levels = records.map((record) => extractLevelFromName(record.name));
  const hasBare = levels.some((level) => level === null);
  const hasSuffixed = levels.some((level) => level !== null);
  if (!hasSuffixed) {
    return 0;
  }

  let assigned = 0;
  records.forEach((record, index) => {
    const level = levels[index];
    if (hasBare) {
      record.level = level === null ? 1 : level + 1;
    } else if (level !== null) {
      record.level = level;
    }
    assigned += 1;
  });
  return assigned;
}

export function groupByLevelGroupId(records: readonly RelicRecord[]): Map<number, RelicRecord[]> {
  const groups = new Map<number, RelicRecord[]>();
  for (const record of records) {
    const group = groups.get(record.levelGroupId) ?? [];
    group.push(record);
    groups.set(record.levelGroupId, group);
  }
  return groups;
}

export function autofillLevelGroups(records: readonly RelicRecord[]): AutofillResult {
  let groupsLabelled = 0;
  let levelsAssigned = 0;

  for (const group of groupByLevelGroupId(records).values()) {
    if (group.length < 2) {
      continue;
    }

    const label = findCommonText(group.map((record) => record.name));
    if (label) {
      for (const record of group) {
        record.levelGroup = label;
      }
      groupsLabelled += 1;
    }

    levelsAssigned += assignLevels(group);
  }

  return { groupsLabelled, levelsAssigned };
}
