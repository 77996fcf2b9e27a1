#!/usr/bin/env node

import { runCommand } from "./cli/commands.js";
import { parseFlags } from "./cli/flags.js";
import { loadEnvLocal } from "./config/env-file.js";
import { resolveSettings } from "./config/settings.js";
import { findRepoRoot } from "./io/repo-paths.js";

function main(): void {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  loadEnvLocal(repoRoot);

  const [command, ...args] = process.argv.slice(2);
  runCommand(command, parseFlags(args), {
    cwd,
    repoRoot,
    settings: resolveSettings(),
    log: (message) => console.log(message)
  });
}

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
