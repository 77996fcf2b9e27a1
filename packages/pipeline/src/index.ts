export * from "./constants.js";
export * from "./errors.js";
export type * from "./types.js";
export * from "./text/similarity.js";
export * from "./normalize/standardize-name.js";
export * from "./ingest/ingest-row.js";
export * from "./ingest/parse-csv.js";
export * from "./ingest/import-rows.js";
export * from "./merge/variants.js";
export * from "./merge/merge-duplicates.js";
export * from "./autofill/prefill-fields.js";
export * from "./autofill/group-autofill.js";
export * from "./dataset/dataset.js";
export * from "./export/export-records.js";
export * from "./project/migrate-project.js";
export * from "./project/project-store.js";
