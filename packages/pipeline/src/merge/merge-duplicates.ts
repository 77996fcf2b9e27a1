import type { RelicRecord } from "@relic-curator/schema";
import { findFactionTag, standardizeName, stripFactionTag } from "../normalize/standardize-name.js";
import { splitWords } from "../text/similarity.js";
import type { MergeResult } from "../types.js";
import { isTruncatedVariant, shareGameIds, unionGameIds } from "./variants.js";

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string | null): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) {
      continue;
    }
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function variantGroupKey(name: string): string | null {
  const words = splitWords(stripFactionTag(name.trim()));
  return words.length >= 2 ? words.slice(0, 2).join(" ") : null;
}

function mergeExactDuplicates(records: readonly RelicRecord[], removed: Set<number>): number {
  let merges = 0;
  const groups = groupBy(records, (record) => record.name.trim() || null);

  for (const group of groups.values()) {
    if (group.length < 2) {
      continue;
    }
    const [keep, ...rest] = [...group].sort((left, right) => left.id - right.id);
    keep.gameIds = unionGameIds(...group.map((record) => record.gameIds));
    for (const record of rest) {
      removed.add(record.id);
      merges += 1;
    }
  }

  return merges;
}

function nameWeight(name: string): number {
  return stripFactionTag(name.trim()).length;
}

function mergeVariantPair(left: RelicRecord, right: RelicRecord, removed: Set<number>): void {
  const [keep, drop] = left.id < right.id ? [left, right] : [right, left];
  const longer = nameWeight(drop.name) > nameWeight(keep.name) ? drop.name : keep.name;

  const name = longer.trim();
  const tag = findFactionTag(name);
  // The surviving name must not carry another nightfarer's bracket.
  keep.name = keep.nightfarer && tag && tag !== keep.nightfarer ? standardizeName(name, keep.nightfarer) : name;
  keep.gameIds = unionGameIds(keep.gameIds, drop.gameIds);
  removed.add(drop.id);
}

function mergeVariantPass(records: readonly RelicRecord[], removed: Set<number>): number {
  let merges = 0;
  const survivors = records.filter((record) => !removed.has(record.id));
  const groups = groupBy(survivors, (record) => variantGroupKey(record.name));

  for (const group of groups.values()) {
    for (let leftIndex = 0; leftIndex < group.length; leftIndex += 1) {
      for (let rightIndex = leftIndex + 1; rightIndex < group.length; rightIndex += 1) {
        const left = group[leftIndex];
        const right = group[rightIndex];
        if (removed.has(left.id) || removed.has(right.id)) {
          continue;
        }
        if (!isTruncatedVariant(left.name.trim(), right.name.trim())) {
          continue;
        }
        if (!shareGameIds(left.gameIds, right.gameIds)) {
          continue;
        }
        mergeVariantPair(left, right, removed);
        merges += 1;
      }
    }
  }

  return merges;
}

/**
 * Collapses exact duplicates and truncated name variants into one record per
 * relic. The lowest id survives and collects every gameId of the records folded
 * into it. Surviving records are updated in place; the returned list is a
 * filtered copy in the original order.
 *
 * Variant merging repeats until a pass finds nothing, so running the merge on
 * its own output is a no-op.
 */
export function mergeDuplicateRecords(records: readonly RelicRecord[]): MergeResult {
  const removed = new Set<number>();
  const exactMerges = mergeExactDuplicates(records, removed);

  let variantMerges = 0;
  while (true) {
    const merges = mergeVariantPass(records, removed);
    if (merges === 0) {
      break;
    }
    variantMerges += merges;
  }

  return {
    records: records.filter((record) => !removed.has(record.id)),
    removedIds: Array.from(removed).sort((left, right) => left - right),
    exactMerges,
    variantMerges
  };
}
