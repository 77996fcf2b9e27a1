import { describe, expect, it } from "vitest";
import {
  collectGameIds,
  detectNightfarer,
  extractRelicName,
  ingestRow,
  parseLenientBoolean
} from "../ingest/ingest-row.js";

describe("parseLenientBoolean", () => {
  it("accepts the usual truthy spellings in any case", () => {
    for (const value of ["true", "TRUE", "1", "Yes", "on", "T", "y"]) {
      expect(parseLenientBoolean(value)).toBe(true);
    }
  });

  it("treats anything else as false", () => {
    for (const value of ["false", "0", "", "no", "2", undefined]) {
      expect(parseLenientBoolean(value)).toBe(false);
    }
  });
});

describe("extractRelicName", () => {
  it("strips either relic prefix", () => {
    expect(extractRelicName("Relic: Burn Resistance")).toBe("Burn Resistance");
    expect(extractRelicName("Character Relic: Wylder's Crest")).toBe("Wylder's Crest");
  });

  it("rejects names without a relic prefix or with nothing after it", () => {
    expect(extractRelicName("Talisman: Burn Resistance")).toBeNull();
    expect(extractRelicName("relic: lowercase")).toBeNull();
    expect(extractRelicName("Relic: ")).toBeNull();
    expect(extractRelicName(undefined)).toBeNull();
  });
});

describe("collectGameIds", () => {
  it("keeps positive integers from the id columns, sorted and unique", () => {
    expect(
      collectGameIds({
        ID: "300",
        passiveSpEffectId_1: " 200 ",
        passiveSpEffectId_2: "0",
        passiveSpEffectId_3: "300"
      })
    ).toEqual([200, 300]);
  });

  it("drops negative, fractional and non-numeric values", () => {
    expect(collectGameIds({ ID: "-5", passiveSpEffectId_1: "1.5", passiveSpEffectId_2: "abc" })).toEqual([]);
  });
});

describe("detectNightfarer", () => {
  it("assigns the only allowed nightfarer", () => {
    expect(detectNightfarer({ allowWylder: "TRUE", allowGuardian: "false" })).toBe("Wylder");
  });

  it("leaves shared and unrestricted relics unassigned", () => {
    expect(detectNightfarer({ allowWylder: "1", allowExecutor: "1" })).toBeNull();
    expect(detectNightfarer({})).toBeNull();
  });
});

describe("ingestRow", () => {
  it("derives a debuff relic from its row", () => {
    expect(ingestRow({ ID: "7001", Name: "Relic: Burn Resistance", isDebuff: "true" }, 1)).toEqual({
      id: 1,
      gameIds: [7001],
      name: "Burn Resistance",
      category: null,
      displayGroup: null,
      levelGroup: null,
      level: null,
      stacks: null,
      levelGroupId: 0,
      nightfarer: null,
      deep: false,
      debuff: true
    });
  });

  it("marks a relic deep only when the numeric-effect flag is 0", () => {
    expect(ingestRow({ Name: "Relic: A", isNumericEffect: " 0 " }, 1)?.deep).toBe(true);
    expect(ingestRow({ Name: "Relic: A", isNumericEffect: "1" }, 1)?.deep).toBe(false);
    expect(ingestRow({ Name: "Relic: A", isNumericEffect: "" }, 1)?.deep).toBe(false);
  });

  it("reads the level group id and falls back to 0", () => {
    expect(ingestRow({ Name: "Relic: A", attachFilterParamId: "42" }, 1)?.levelGroupId).toBe(42);
    expect(ingestRow({ Name: "Relic: A", attachFilterParamId: "x" }, 1)?.levelGroupId).toBe(0);
  });

  it("skips rows that do not name a relic", () => {
    expect(ingestRow({ ID: "1", Name: "Weapon: Sword" }, 4)).toBeNull();
  });
});
