import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { DEFAULT_CSV_DELIMITER } from "../constants.js";
import { describeError, ParseError } from "../errors.js";
import type { RawRow } from "../types.js";

const RawRowsSchema = z.array(z.record(z.string()));

export interface ParseRelicCsvOptions {
  delimiter?: string;
  filePath?: string;
}

export function parseRelicCsv(text: string, options: ParseRelicCsvOptions = {}): RawRow[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      columns: true,
      bom: true,
      delimiter: options.delimiter ?? DEFAULT_CSV_DELIMITER,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (error) {
    throw new ParseError(`Failed to parse CSV${formatLocation(options.filePath)}: ${describeError(error)}`, {
      filePath: options.filePath,
      cause: error
    });
  }

  const rows = RawRowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new ParseError(`Unexpected CSV row shape${formatLocation(options.filePath)}`, {
      filePath: options.filePath,
      cause: rows.error
    });
  }
  return rows.data;
}

export function decodeUtf8(bytes: Uint8Array, filePath?: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new ParseError(`File is not valid UTF-8${formatLocation(filePath)}`, { filePath, cause: error });
  }
}

/** Reads and decodes the whole file before any row is handed to the caller. */
export function readRelicCsv(filePath: string, options: Omit<ParseRelicCsvOptions, "filePath"> = {}): RawRow[] {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error) {
    throw new ParseError(`Cannot read ${filePath}: ${describeError(error)}`, { filePath, cause: error });
  }
  return parseRelicCsv(decodeUtf8(bytes, filePath), { ...options, filePath });
}

function formatLocation(filePath: string | undefined): string {
  return filePath ? ` (${filePath})` : "";
}
