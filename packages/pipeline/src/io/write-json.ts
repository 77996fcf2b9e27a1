import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";

export function writeJsonFile(outputPath: string, payload: unknown): void {
  mkdirSync(path.dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}
