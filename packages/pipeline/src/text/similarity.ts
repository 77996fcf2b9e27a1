const SEPARATORS = [" ", "-", ","];
const MIN_AFFIX_LENGTH = 4;
const MIN_SUBSTRING_LENGTH = 3;
const SUBSTANTIAL_SUBSTRING_LENGTH = 10;

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function capitalizeFirst(text: string): string {
  const first = text.charAt(0);
  if (first.length === 0 || first === first.toUpperCase()) {
    return text;
  }
  return first.toUpperCase() + text.slice(1);
}

function endsWithSeparator(text: string): boolean {
  return SEPARATORS.some((separator) => text.endsWith(separator));
}

function startsWithSeparator(text: string): boolean {
  return SEPARATORS.some((separator) => text.startsWith(separator));
}

function shortestOf(names: readonly string[]): string {
  return names.reduce((shortest, name) => (name.length < shortest.length ? name : shortest));
}

/** Shared leading characters, kept only when they stop on a word boundary. */
export function findCommonPrefix(names: readonly string[]): string {
  if (names.length === 0) {
    return "";
  }

  const shortest = shortestOf(names);
  let length = 0;
  while (length < shortest.length && names.every((name) => name[length] === shortest[length])) {
    length += 1;
  }

  const prefix = shortest.slice(0, length);
  if (prefix.length >= MIN_AFFIX_LENGTH && endsWithSeparator(prefix)) {
    return prefix.trimEnd();
  }
  return "";
}

export function findCommonSuffix(names: readonly string[]): string {
  if (names.length === 0) {
    return "";
  }

  const shortest = shortestOf(names);
  let length = 0;
  while (
    length < shortest.length &&
    names.every((name) => name[name.length - 1 - length] === shortest[shortest.length - 1 - length])
  ) {
    length += 1;
  }

  const suffix = shortest.slice(shortest.length - length);
  if (suffix.length >= MIN_AFFIX_LENGTH && startsWithSeparator(suffix)) {
    return suffix.trimStart();
  }
  return "";
}

export function findCommonWords(names: readonly string[]): string {
  if (names.length === 0) {
    return "";
  }

  const wordLists = names.map(splitWords);
  const [first] = wordLists;
  const minWords = Math.min(...wordLists.map((words) => words.length));
  const common: string[] = [];
  for (let index = 0; index < minWords; index += 1) {
    const word = first[index];
    if (!wordLists.every((words) => words[index] === word)) {
      break;
    }
    common.push(word);
  }

  return common.join(" ");
}

function mostFrequentCasing(names: readonly string[], lowered: string): string {
  const counts = new Map<string, number>();
  for (const name of names) {
    const position = name.toLowerCase().indexOf(lowered);
    if (position === -1) {
      continue;
    }
    const version = name.slice(position, position + lowered.length);
    counts.set(version, (counts.get(version) ?? 0) + 1);
  }

  let best = "";
  let bestCount = 0;
  for (const [version, count] of counts) {
    if (count > bestCount) {
      best = version;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Longest case-insensitive substring shared by every name. Short matches only
 * count when they end on a separator.
 */
export function findLongestCommonSubstring(names: readonly string[]): string {
  if (names.length < 2) {
    return "";
  }

  const shortest = shortestOf(names);
  if (shortest.length < MIN_SUBSTRING_LENGTH) {
    return "";
  }

  const loweredNames = names.map((name) => name.toLowerCase());
  let longest = "";
  let longestCasing = "";
  for (let start = 0; start < shortest.length; start += 1) {
    for (let end = start + MIN_SUBSTRING_LENGTH; end <= shortest.length; end += 1) {
      const substring = shortest.slice(start, end);
      if (substring.length <= longest.length) {
        continue;
      }
      if (!endsWithSeparator(substring) && substring.length < SUBSTANTIAL_SUBSTRING_LENGTH) {
        continue;
      }
      const lowered = substring.toLowerCase();
      if (!loweredNames.every((name) => name.includes(lowered))) {
        continue;
      }
      longest = substring;
      longestCasing = mostFrequentCasing(names, lowered);
    }
  }

  if (!longestCasing) {
    return "";
  }

  let cleaned = longestCasing;
  if (cleaned.trimEnd().endsWith("+")) {
    cleaned = cleaned.trimEnd().replace(/\++$/, "").trimEnd();
  }
  cleaned = cleaned.trim();
  return capitalizeFirst(cleaned).trimEnd();
}
