export * from "./enums.js";
export * from "./relic.js";
export * from "./snapshot.js";
export * from "./export-record.js";
