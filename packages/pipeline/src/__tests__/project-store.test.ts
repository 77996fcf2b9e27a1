import { readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createDataset, setField, sortBy } from "../dataset/dataset.js";
import { FormatError, ParseError } from "../errors.js";
import { migrateProjectPayload } from "../project/migrate-project.js";
import { loadProject, loadProjectInto, parseProjectSnapshot, saveProject } from "../project/project-store.js";
import { makeRecord, makeTempDir } from "./helpers/records.js";

function legacyPayload(): Record<string, unknown> {
  return {
    next_id: 5,
    used_categories: ["Attack"],
    used_stack_groups: ["Vigor"],
    sort_column: "display_group",
    sort_reverse: true,
    data: [
      {
        id: 1,
        gameIds: "200, 100",
        name: "Vigor",
        category: "",
        display_group: "Stats",
        stack_id: 9,
        stack_group: "Vigor",
        level: "",
        stacks: "",
        nightfarer: "",
        deep: false,
        debuff: false
      }
    ]
  };
}

describe("saveProject and loadProject", () => {
  it("round-trips records, used values and sort state", () => {
    const dataset = createDataset(
      [
        makeRecord({ id: 1, name: "Vigor", gameIds: [1], levelGroupId: 9, level: 1 }),
        makeRecord({ id: 3, name: "[Wylder] Power Strike", nightfarer: "Wylder", stacks: "Yes" })
      ],
      4
    );
    setField(dataset, [1], "category", "Stats");
    sortBy(dataset, "name");
    const filePath = path.join(makeTempDir(), "relics.rproj");

    saveProject(dataset, filePath);
    const loaded = loadProject(filePath);

    expect(loaded.migrated).toBe(false);
    expect(loaded.dataset.records).toEqual(dataset.records);
    expect(loaded.dataset.nextId).toBe(4);
    expect(Array.from(loaded.dataset.used.category)).toEqual(["Stats"]);
    expect(loaded.dataset.sort).toEqual({ column: "name", reverse: false });
    expect(JSON.parse(readFileSync(filePath, "utf8"))).toMatchObject({ version: "1.0", nextId: 4 });
  });
});

describe("migrateProjectPayload", () => {
  it("renames old keys without touching the input", () => {
    const input = legacyPayload();
    const first = migrateProjectPayload(input);

    expect(first.migrated).toBe(true);
    expect(first.payload).toMatchObject({
      nextId: 5,
      usedLevelGroups: ["Vigor"],
      sortColumn: "display_group",
      data: [{ displayGroup: "Stats", levelGroupId: 9, levelGroup: "Vigor" }]
    });
    expect(input).toHaveProperty("next_id", 5);
    expect(input).not.toHaveProperty("nextId");
  });

  it("is a no-op on an already migrated payload", () => {
    const first = migrateProjectPayload(legacyPayload());
    const second = migrateProjectPayload(first.payload);
    expect(second.migrated).toBe(false);
    expect(second.payload).toBe(first.payload);
  });
});

describe("parseProjectSnapshot", () => {
  it("reads a legacy payload into the current shape", () => {
    const { snapshot, migrated } = parseProjectSnapshot(legacyPayload());

    expect(migrated).toBe(true);
    expect(snapshot.version).toBe("1.0");
    expect(snapshot.nextId).toBe(5);
    expect(snapshot.usedCategories).toEqual(["Attack"]);
    expect(snapshot.usedLevelGroups).toEqual(["Vigor"]);
    expect(snapshot.usedStacks).toEqual([]);
    expect(snapshot.sortColumn).toBe("displayGroup");
    expect(snapshot.sortReverse).toBe(true);
    expect(snapshot.data).toEqual([
      {
        id: 1,
        gameIds: [100, 200],
        name: "Vigor",
        category: null,
        displayGroup: "Stats",
        levelGroup: "Vigor",
        level: null,
        stacks: null,
        levelGroupId: 9,
        nightfarer: null,
        deep: false,
        debuff: false
      }
    ]);
  });

  it("reads a legacy payload exactly like its current spelling", () => {
    const current = {
      nextId: 5,
      usedCategories: ["Attack"],
      usedLevelGroups: ["Vigor"],
      sortColumn: "displayGroup",
      sortReverse: true,
      data: [{ id: 1, gameIds: [100, 200], name: "Vigor", displayGroup: "Stats", levelGroupId: 9, levelGroup: "Vigor" }]
    };
    expect(parseProjectSnapshot(legacyPayload()).snapshot).toEqual(parseProjectSnapshot(current).snapshot);
  });

  it("drops an unknown sort column", () => {
    const { snapshot } = parseProjectSnapshot({ data: [], nextId: 1, sortColumn: "bogus", sortReverse: "yes" });
    expect(snapshot.sortColumn).toBeNull();
    expect(snapshot.sortReverse).toBe(false);
  });

  it("requires data and nextId", () => {
    expect(() => parseProjectSnapshot({ data: [] })).toThrow(
      new FormatError('Not a project file: expected "data" and "nextId"')
    );
    expect(() => parseProjectSnapshot([1, 2])).toThrow(FormatError);
  });

  it("rejects duplicate record ids", () => {
    const payload = {
      nextId: 5,
      data: [
        { id: 4, gameIds: [1], name: "Vigor" },
        { id: 4, gameIds: [2], name: "Arcane" }
      ]
    };
    expect(() => parseProjectSnapshot(payload)).toThrow("Invalid project file: data.1.id Duplicate record id 4");
  });
});

describe("loading from disk", () => {
  it("reports unreadable and malformed files as parse errors", () => {
    const directory = makeTempDir();
    const brokenPath = path.join(directory, "broken.rproj");
    writeFileSync(brokenPath, "{ not json", "utf8");

    expect(() => loadProject(path.join(directory, "missing.rproj"))).toThrow(ParseError);
    expect(() => loadProject(brokenPath)).toThrow(`Project file ${brokenPath} is not valid JSON`);
  });

  it("leaves the dataset alone when loading fails", () => {
    const directory = makeTempDir();
    const invalidPath = path.join(directory, "invalid.rproj");
    writeFileSync(invalidPath, JSON.stringify({ data: [{ id: 0, name: "Vigor" }], nextId: 1 }), "utf8");
    const existing = makeRecord({ id: 2, name: "Keep Me" });
    const dataset = createDataset([existing], 3);

    expect(() => loadProjectInto(dataset, invalidPath)).toThrow(FormatError);
    expect(dataset.records).toEqual([existing]);
    expect(dataset.nextId).toBe(3);
  });

  it("swaps a valid file into the dataset and reports migration", () => {
    const filePath = path.join(makeTempDir(), "legacy.rproj");
    writeFileSync(filePath, JSON.stringify(legacyPayload()), "utf8");
    const dataset = createDataset();

    expect(loadProjectInto(dataset, filePath)).toBe(true);
    expect(dataset.records.map((record) => record.name)).toEqual(["Vigor"]);
    expect(dataset.nextId).toBe(5);
    expect(dataset.sort).toEqual({ column: "displayGroup", reverse: true });
  });
});
