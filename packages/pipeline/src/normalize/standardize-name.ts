import type { Nightfarer, RelicRecord } from "@relic-curator/schema";
import { ALL_NIGHTFARERS } from "../constants.js";

function bracketTag(nightfarer: Nightfarer): string {
  return `[${nightfarer}] `;
}

export function findFactionTag(name: string): Nightfarer | null {
  return ALL_NIGHTFARERS.find((nightfarer) => name.startsWith(bracketTag(nightfarer))) ?? null;
}

export function hasFactionTag(name: string): boolean {
  return findFactionTag(name) !== null;
}

export function stripFactionTag(name: string): string {
  const tag = findFactionTag(name);
  return tag ? name.slice(bracketTag(tag).length) : name;
}

/**
 * Rewrites "Wylder: Name" and "Wylder Name" into "[Wylder] Name" and turns
 * "- " separators into ", ".
 *
 * With an explicit nightfarer only that tag is considered, and a name that does
 * not mention it gets the bracket prepended. Without one, the eight known tags
 * are tried in order and the first matching pattern wins.
 */
export function standardizeName(name: string, nightfarer?: Nightfarer | null): string {
  let standardized = name;
  const candidates = nightfarer ? [nightfarer] : ALL_NIGHTFARERS;

  for (const candidate of candidates) {
    if (standardized.startsWith(bracketTag(candidate))) {
      break;
    }
    if (standardized.startsWith(`${candidate}: `)) {
      standardized = bracketTag(candidate) + standardized.slice(candidate.length + 2);
      break;
    }
    if (standardized.startsWith(`${candidate} `)) {
      standardized = bracketTag(candidate) + standardized.slice(candidate.length + 1);
      break;
    }
  }

  if (nightfarer && !standardized.startsWith(bracketTag(nightfarer))) {
    standardized = bracketTag(nightfarer) + stripFactionTag(standardized);
  }

  return standardized.replaceAll("- ", ", ");
}

/**
 * Two passes over the records: names of records with a nightfarer are targeted
 * at it, then every name still without a bracket tag gets an untargeted scan.
 * Returns how many names changed.
 */
export function standardizeRecordNames(records: RelicRecord[]): number {
  let changed = 0;

  for (const record of records) {
    const name = record.name.trim();
    if (!record.nightfarer || !name) {
      continue;
    }
    const next = standardizeName(name, record.nightfarer);
    if (next !== record.name) {
      record.name = next;
      changed += 1;
    }
  }

  for (const record of records) {
    const name = record.name.trim();
    if (!name || hasFactionTag(name)) {
      continue;
    }
    const next = standardizeName(name);
    if (next !== record.name) {
      record.name = next;
      changed += 1;
    }
  }

  return changed;
}
