import { EditableFieldSchema, SortColumnSchema, StacksSentinelSchema } from "@relic-curator/schema";
import type { PipelineSettings } from "../config/settings.js";
import { clearField, createDataset, setField, sortBy } from "../dataset/dataset.js";
import { buildExportJsonSchema, writeExportFile } from "../export/export-records.js";
import { importCsvFile } from "../ingest/import-rows.js";
import { resolveUserPath } from "../io/repo-paths.js";
import { writeJsonFile } from "../io/write-json.js";
import { loadProject, saveProject } from "../project/project-store.js";
import { getBooleanFlag, getStringFlag, parseIdList, requireStringFlag, type Flags } from "./flags.js";

export interface CommandContext {
  cwd: string;
  repoRoot: string;
  settings: PipelineSettings;
  log: (message: string) => void;
}

type CommandHandler = (flags: Flags, context: CommandContext) => void;

function projectPathFrom(flags: Flags, context: CommandContext): string {
  return resolveUserPath(getStringFlag(flags, "--project"), context.settings.projectPath, context.cwd, context.repoRoot);
}

function runImport(flags: Flags, context: CommandContext): void {
  const csvPath = resolveUserPath(requireStringFlag(flags, "--csv", "import"), "", context.cwd, context.repoRoot);
  const projectPath = projectPathFrom(flags, context);
  const exportFlag = getStringFlag(flags, "--export");
  const quiet = getBooleanFlag(flags, "--quiet");

  const dataset = createDataset();
  const summary = importCsvFile(dataset, csvPath, {
    delimiter: getStringFlag(flags, "--delimiter") ?? context.settings.csvDelimiter,
    onProgress: quiet ? undefined : context.log
  });
  saveProject(dataset, projectPath);

  context.log(`Imported ${summary.importedCount} relics, skipped ${summary.skippedCount} rows`);
  context.log(`Merged duplicates: ${summary.mergedCount}`);
  context.log(`Records: ${dataset.records.length}`);
  context.log(`Project output: ${projectPath}`);

  if (exportFlag) {
    const exportPath = resolveUserPath(exportFlag, context.settings.exportPath, context.cwd, context.repoRoot);
    writeExportFile(dataset, exportPath);
    context.log(`Export output: ${exportPath}`);
  }
}

function runExport(flags: Flags, context: CommandContext): void {
  const projectPath = projectPathFrom(flags, context);
  const outPath = resolveUserPath(getStringFlag(flags, "--out"), context.settings.exportPath, context.cwd, context.repoRoot);

  const { dataset } = loadProject(projectPath);
  const count = writeExportFile(dataset, outPath);
  context.log(`Exported ${count} relics to ${outPath}`);
}

function runMigrateProject(flags: Flags, context: CommandContext): void {
  const projectPath = projectPathFrom(flags, context);
  const dryRun = getBooleanFlag(flags, "--dry-run");

  const { dataset, migrated } = loadProject(projectPath);
  if (migrated && !dryRun) {
    saveProject(dataset, projectPath);
  }
  context.log(
    `[migrate:project] records=${dataset.records.length} migrated=${String(migrated)} dryRun=${String(dryRun)} path=${projectPath}`
  );
}

function runSetField(flags: Flags, context: CommandContext): void {
  const projectPath = projectPathFrom(flags, context);
  const ids = parseIdList(requireStringFlag(flags, "--ids", "set-field"), "--ids");
  const rawField = requireStringFlag(flags, "--field", "set-field");
  const field = EditableFieldSchema.safeParse(rawField);
  if (!field.success) {
    throw new Error(`Invalid --field value: ${rawField} (expected ${EditableFieldSchema.options.join(" | ")})`);
  }

  const { dataset } = loadProject(projectPath);
  let updated: number;
  if (getBooleanFlag(flags, "--clear")) {
    updated = clearField(dataset, ids, field.data);
  } else {
    const value = requireStringFlag(flags, "--value", "set-field");
    const preset = field.data === "stacks" && StacksSentinelSchema.safeParse(value.trim()).success;
    updated = setField(dataset, ids, field.data, value, { remember: !preset });
  }
  saveProject(dataset, projectPath);
  context.log(`Updated ${field.data} on ${updated} records`);
}

function runSort(flags: Flags, context: CommandContext): void {
  const projectPath = projectPathFrom(flags, context);
  const rawColumn = requireStringFlag(flags, "--column", "sort");
  const column = SortColumnSchema.safeParse(rawColumn);
  if (!column.success) {
    throw new Error(`Invalid --column value: ${rawColumn}`);
  }

  const { dataset } = loadProject(projectPath);
  sortBy(dataset, column.data);
  saveProject(dataset, projectPath);
  context.log(`Sorted ${dataset.records.length} records by ${column.data} (${dataset.sort.reverse ? "descending" : "ascending"})`);
}

function runExportSchema(flags: Flags, context: CommandContext): void {
  const outPath = resolveUserPath(
    getStringFlag(flags, "--out"),
    context.settings.exportSchemaPath,
    context.cwd,
    context.repoRoot
  );
  writeJsonFile(outPath, buildExportJsonSchema());
  context.log(`Export schema: ${outPath}`);
}

const COMMANDS = new Map<string, CommandHandler>([
  ["import", runImport],
  ["export", runExport],
  ["migrate-project", runMigrateProject],
  ["set-field", runSetField],
  ["sort", runSort],
  ["export-schema", runExportSchema]
]);

export function runCommand(command: string | undefined, flags: Flags, context: CommandContext): void {
  if (!command || command === "help" || command === "--help" || command === "-h") {
    context.log(USAGE);
    return;
  }

  const handler = COMMANDS.get(command);
  if (!handler) {
    throw new Error(`Unknown command: ${command}`);
  }
  handler(flags, context);
}

export const USAGE = `
Usage:
  npm run relics -- <command> [options]

Commands:
  import             Ingest a relic CSV, reconcile it and save the project
  export             Write the interchange JSON of a project
  migrate-project    Rewrite an older project file with current key names
  set-field          Set or clear an editable field on some records
  sort               Reorder the project records by a column
  export-schema      Write the JSON Schema of the interchange format

Import options:
  --csv <file>             Source rows (required)
  --project <file>         Default: data/relics.rproj
  --export <file>          Also write the interchange JSON
  --delimiter <char>       Default: ,
  --quiet                  Only print the summary

Export options:
  --project <file>
  --out <file>             Default: data/relics.json

Migrate options:
  --project <file>
  --dry-run

Set-field options:
  --ids <1,2,...>          Record ids (required)
  --field <name>           category | displayGroup | levelGroup | level | stacks
  --value <text>           New value (stacks Yes/No are not kept as suggestions)
  --clear                  Unset the field instead

Sort options:
  --column <name>          Sorting the current column again reverses it

Environment overrides (also read from .env.local):
  RELIC_PROJECT_PATH        Default project file
  RELIC_EXPORT_PATH         Default export file
  RELIC_EXPORT_SCHEMA_PATH  Default schema file
  RELIC_CSV_DELIMITER       Default CSV delimiter
`;
