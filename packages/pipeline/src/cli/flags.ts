export type Flags = Map<string, string | boolean>;

export function parseFlags(args: string[]): Flags {
  const flags: Flags = new Map();

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === "--" || !token.startsWith("--")) {
      continue;
    }

    const maybeValue = args[index + 1];
    if (maybeValue === undefined || maybeValue.startsWith("--")) {
      flags.set(token, true);
      continue;
    }

    flags.set(token, maybeValue);
    index += 1;
  }

  return flags;
}

export function getStringFlag(flags: Flags, key: string): string | undefined {
  const value = flags.get(key);
  return typeof value === "string" ? value : undefined;
}

export function requireStringFlag(flags: Flags, key: string, usage: string): string {
  const value = getStringFlag(flags, key);
  if (!value) {
    throw new Error(`${usage} requires ${key} <value>`);
  }
  return value;
}

export function getBooleanFlag(flags: Flags, key: string): boolean {
  return flags.get(key) === true;
}

export function parseIdList(value: string, key: string): number[] {
  const ids = value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number(part));
  if (ids.length === 0 || ids.some((id) => !Number.isInteger(id) || id < 1)) {
    throw new Error(`${key} must be a comma-separated list of integers >= 1`);
  }
  return ids;
}
