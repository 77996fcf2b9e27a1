import type { EditableField, RelicRecord, SortColumn } from "@relic-curator/schema";

/** One delimited source row keyed by header name. */
export type RawRow = Record<string, string | undefined>;

export type UsedValues = Record<EditableField, Set<string>>;

export interface SortState {
  column: SortColumn | null;
  reverse: boolean;
}

/**
 * The working collection of one operator session. Every operation receives it
 * explicitly; nothing in the pipeline keeps module-level session state.
 */
export interface Dataset {
  records: RelicRecord[];
  nextId: number;
  used: UsedValues;
  sort: SortState;
}

export type ProgressReporter = (message: string) => void;

export interface ImportSummary {
  importedCount: number;
  skippedCount: number;
  mergedCount: number;
}

export interface MergeResult {
  records: RelicRecord[];
  removedIds: number[];
  exactMerges: number;
  variantMerges: number;
}

export interface AutofillResult {
  groupsLabelled: number;
  levelsAssigned: number;
}

export interface LoadProjectResult {
  dataset: Dataset;
  migrated: boolean;
}
