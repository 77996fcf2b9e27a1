import { stripFactionTag } from "../normalize/standardize-name.js";
import { splitWords } from "../text/similarity.js";

const TRUNCATION_LENGTH_RATIO = 1.5;

/** True when the shorter word list appears in order inside the longer one. */
export function isWordSubsequence(shorter: readonly string[], longer: readonly string[]): boolean {
  let matched = 0;
  for (const word of longer) {
    if (matched < shorter.length && word === shorter[matched]) {
      matched += 1;
    }
  }
  return matched === shorter.length;
}

/** True when `longer` is `shorter` with exactly one word inserted somewhere. */
export function hasSingleWordInsertion(shorter: readonly string[], longer: readonly string[]): boolean {
  if (longer.length !== shorter.length + 1) {
    return false;
  }

  let shortIndex = 0;
  let longIndex = 0;
  let extraWords = 0;
  while (shortIndex < shorter.length && longIndex < longer.length) {
    if (shorter[shortIndex] === longer[longIndex]) {
      shortIndex += 1;
      longIndex += 1;
      continue;
    }
    longIndex += 1;
    extraWords += 1;
    if (extraWords > 1) {
      return false;
    }
  }
  return shortIndex === shorter.length;
}

export function areWordVariants(left: string, right: string): boolean {
  const leftWords = splitWords(left);
  const rightWords = splitWords(right);
  const [shorter, longer] = leftWords.length <= rightWords.length ? [leftWords, rightWords] : [rightWords, leftWords];
  const difference = longer.length - shorter.length;

  if (difference >= 2) {
    return isWordSubsequence(shorter, longer);
  }
  if (difference === 1) {
    return hasSingleWordInsertion(shorter, longer);
  }
  return false;
}

function isLongTruncation(longer: string, shorter: string): boolean {
  return (
    shorter.length > 0 && longer.length >= shorter.length * TRUNCATION_LENGTH_RATIO && longer.startsWith(shorter)
  );
}

/**
 * Whether two names denote the same relic, one of them cut short or missing a
 * word. Faction brackets are ignored.
 */
export function isTruncatedVariant(leftName: string, rightName: string): boolean {
  const left = stripFactionTag(leftName);
  const right = stripFactionTag(rightName);

  if (left === right) {
    return true;
  }
  if (left.startsWith(`${right} `) || right.startsWith(`${left} `)) {
    return true;
  }
  if (isLongTruncation(left, right) || isLongTruncation(right, left)) {
    return true;
  }
  return areWordVariants(left, right);
}

export function shareGameIds(left: readonly number[], right: readonly number[]): boolean {
  const rightIds = new Set(right);
  return left.some((id) => rightIds.has(id));
}

export function unionGameIds(...lists: ReadonlyArray<readonly number[]>): number[] {
  const union = new Set<number>();
  for (const list of lists) {
    for (const id of list) {
      union.add(id);
    }
  }
  return Array.from(union).sort((left, right) => left - right);
}
