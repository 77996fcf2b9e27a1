import type { RelicRecord } from "@relic-curator/schema";
import { autofillLevelGroups } from "../autofill/group-autofill.js";
import { prefillDerivedFields } from "../autofill/prefill-fields.js";
import { createDataset, replaceDataset } from "../dataset/dataset.js";
import { mergeDuplicateRecords } from "../merge/merge-duplicates.js";
import { standardizeRecordNames } from "../normalize/standardize-name.js";
import type { Dataset, ImportSummary, ProgressReporter, RawRow } from "../types.js";
import { readRelicCsv } from "./parse-csv.js";
import { ingestRow } from "./ingest-row.js";

export interface ImportRowsOptions {
  onProgress?: ProgressReporter;
}

export interface ImportCsvOptions extends ImportRowsOptions {
  delimiter?: string;
}

/**
 * Runs the reconciliation pipeline over freshly ingested records: names are
 * standardized before merging because the merge keys depend on them, and the
 * level groups are filled from the merged set so no relic is counted twice.
 */
export function reconcileRecords(records: RelicRecord[], onProgress?: ProgressReporter): {
  records: RelicRecord[];
  mergedCount: number;
} {
  const renamed = standardizeRecordNames(records);
  onProgress?.(`[import] standardized names=${renamed}`);

  const merge = mergeDuplicateRecords(records);
  onProgress?.(`[import] merged exact=${merge.exactMerges} variants=${merge.variantMerges}`);

  const prefilled = prefillDerivedFields(merge.records);
  const autofill = autofillLevelGroups(merge.records);
  onProgress?.(
    `[import] prefilled=${prefilled} levelGroups=${autofill.groupsLabelled} levels=${autofill.levelsAssigned}`
  );

  return { records: merge.records, mergedCount: merge.exactMerges + merge.variantMerges };
}

/**
 * Replaces the dataset with the relics found in `rows`. Every row consumes an
 * id whether or not it yields a record. The dataset is only touched once the
 * whole import has succeeded.
 */
export function importRows(dataset: Dataset, rows: readonly RawRow[], options: ImportRowsOptions = {}): ImportSummary {
  const ingested: RelicRecord[] = [];
  let nextId = 1;
  let skippedCount = 0;

  for (const row of rows) {
    const record = ingestRow(row, nextId);
    if (record) {
      ingested.push(record);
    } else {
      skippedCount += 1;
    }
    nextId += 1;
  }
  options.onProgress?.(`[import] rows=${rows.length} imported=${ingested.length} skipped=${skippedCount}`);

  const { records, mergedCount } =
    ingested.length > 0 ? reconcileRecords(ingested, options.onProgress) : { records: ingested, mergedCount: 0 };

  replaceDataset(dataset, createDataset(records, nextId));
  return { importedCount: ingested.length, skippedCount, mergedCount };
}

export function importCsvFile(dataset: Dataset, filePath: string, options: ImportCsvOptions = {}): ImportSummary {
  const rows = readRelicCsv(filePath, { delimiter: options.delimiter });
  return importRows(dataset, rows, { onProgress: options.onProgress });
}
