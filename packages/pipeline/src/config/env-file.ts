import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

const SETTING_LINE_PATTERN = /^(?:export\s+)?(RELIC_[A-Z0-9_]+)\s*=\s*(.*)$/;
const QUOTED_VALUE_PATTERN = /^(["'])(.*)\1$/;

/** Picks the `RELIC_*` assignments out of an env file; other lines are ignored. */
export function parseEnvFile(contents: string): Record<string, string> {
  const settings: Record<string, string> = {};
  for (const line of contents.split(/\r?\n/)) {
    const match = SETTING_LINE_PATTERN.exec(line.trim());
    if (match) {
      settings[match[1]] = readSettingValue(match[2]);
    }
  }
  return settings;
}

function readSettingValue(rawValue: string): string {
  const quoted = QUOTED_VALUE_PATTERN.exec(rawValue);
  return quoted ? quoted[2] : rawValue.replace(/\s+#.*$/, "");
}

/**
 * Copies the settings in `.env.local` at the repository root into `env`.
 * Variables that are already set win. Returns the file that was read, if any.
 */
export function loadEnvLocal(repoRoot: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const envLocalPath = path.join(repoRoot, ".env.local");
  if (!existsSync(envLocalPath)) {
    return null;
  }

  for (const [key, value] of Object.entries(parseEnvFile(readFileSync(envLocalPath, "utf8")))) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return envLocalPath;
}
