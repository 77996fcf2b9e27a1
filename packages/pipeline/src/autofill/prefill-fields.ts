import type { RelicRecord } from "@relic-curator/schema";
import { DEBUFF_CATEGORY } from "../constants.js";

/** Reads a leading "[Tag]" from a name, whatever the tag says. */
export function extractBracketLabel(name: string): string | null {
  const trimmed = name.trim();
  if (!trimmed.startsWith("[")) {
    return null;
  }
  const end = trimmed.indexOf("]");
  if (end <= 1) {
    return null;
  }
  const label = trimmed.slice(1, end).trim();
  return label.length > 0 ? label : null;
}

export function prefillDerivedFields(records: RelicRecord[]): number {
  let updated = 0;
  for (const record of records) {
    const label = extractBracketLabel(record.name);
    if (label && record.displayGroup !== label) {
      record.displayGroup = label;
      updated += 1;
    }
    if (record.debuff && !record.category?.trim()) {
      record.category = DEBUFF_CATEGORY;
      updated += 1;
    }
  }
  return updated;
}
