import { z } from "zod";
import { DEFAULT_CSV_DELIMITER, DEFAULT_EXPORT_PATH, DEFAULT_EXPORT_SCHEMA_PATH, DEFAULT_PROJECT_PATH } from "../constants.js";

const SettingsEnvSchema = z.object({
  RELIC_PROJECT_PATH: z.string().min(1).default(DEFAULT_PROJECT_PATH),
  RELIC_EXPORT_PATH: z.string().min(1).default(DEFAULT_EXPORT_PATH),
  RELIC_EXPORT_SCHEMA_PATH: z.string().min(1).default(DEFAULT_EXPORT_SCHEMA_PATH),
  RELIC_CSV_DELIMITER: z.string().length(1, "RELIC_CSV_DELIMITER must be a single character").default(DEFAULT_CSV_DELIMITER)
});

export interface PipelineSettings {
  projectPath: string;
  exportPath: string;
  exportSchemaPath: string;
  csvDelimiter: string;
}

export function resolveSettings(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
  const parsed = SettingsEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment: ${issue?.path.join(".") || "<root>"} ${issue?.message ?? "unknown error"}`);
  }

  return {
    projectPath: parsed.data.RELIC_PROJECT_PATH,
    exportPath: parsed.data.RELIC_EXPORT_PATH,
    exportSchemaPath: parsed.data.RELIC_EXPORT_SCHEMA_PATH,
    csvDelimiter: parsed.data.RELIC_CSV_DELIMITER
  };
}
