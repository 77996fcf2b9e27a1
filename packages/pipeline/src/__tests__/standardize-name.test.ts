import { describe, expect, it } from "vitest";
import {
  findFactionTag,
  hasFactionTag,
  standardizeName,
  standardizeRecordNames,
  stripFactionTag
} from "../normalize/standardize-name.js";
import { makeRecord } from "./helpers/records.js";

describe("standardizeName", () => {
  it("prepends the given nightfarer when the name does not mention it", () => {
    expect(standardizeName("Power Strike", "Wylder")).toBe("[Wylder] Power Strike");
  });

  it("rewrites colon and bare prefixes into brackets", () => {
    expect(standardizeName("Wylder: Power Strike", "Wylder")).toBe("[Wylder] Power Strike");
    expect(standardizeName("Wylder Power Strike", "Wylder")).toBe("[Wylder] Power Strike");
  });

  it("leaves an already bracketed name alone", () => {
    expect(standardizeName("[Wylder] Power Strike", "Wylder")).toBe("[Wylder] Power Strike");
  });

  it("replaces a bracket tag that belongs to another nightfarer", () => {
    expect(standardizeName("[Guardian] Shield Bash", "Wylder")).toBe("[Wylder] Shield Bash");
  });

  it("finds embedded tags when no nightfarer is given", () => {
    expect(standardizeName("Guardian: Shield Bash")).toBe("[Guardian] Shield Bash");
    expect(standardizeName("Ironeye Arrow- Poison")).toBe("[Ironeye] Arrow, Poison");
  });

  it("does not invent a tag without a match", () => {
    expect(standardizeName("Shield Bash")).toBe("Shield Bash");
  });

  it("turns hyphen-space separators into commas but keeps plain hyphens", () => {
    expect(standardizeName("Attack Power Up- Low HP")).toBe("Attack Power Up, Low HP");
    expect(standardizeName("Attack Power Up - Low HP")).toBe("Attack Power Up , Low HP");
    expect(standardizeName("Self-Heal")).toBe("Self-Heal");
  });
});

describe("faction tag helpers", () => {
  it("reads, detects and strips a leading bracket tag", () => {
    expect(findFactionTag("[Recluse] Spell Echo")).toBe("Recluse");
    expect(hasFactionTag("[Recluse] Spell Echo")).toBe(true);
    expect(stripFactionTag("[Recluse] Spell Echo")).toBe("Spell Echo");
  });

  it("ignores unknown tags", () => {
    expect(findFactionTag("[Nobody] Spell Echo")).toBeNull();
    expect(stripFactionTag("[Nobody] Spell Echo")).toBe("[Nobody] Spell Echo");
  });
});

describe("standardizeRecordNames", () => {
  it("targets records with a nightfarer first, then scans the rest", () => {
    const records = [
      makeRecord({ id: 1, name: "Power Strike", nightfarer: "Wylder" }),
      makeRecord({ id: 2, name: "Duchess: Dagger Dance" }),
      makeRecord({ id: 3, name: "Plain Relic" })
    ];

    expect(standardizeRecordNames(records)).toBe(2);
    expect(records.map((record) => record.name)).toEqual([
      "[Wylder] Power Strike",
      "[Duchess] Dagger Dance",
      "Plain Relic"
    ]);
  });

  it("changes nothing on a second run", () => {
    const records = [makeRecord({ id: 1, name: "Raider Fury- Rising", nightfarer: "Raider" })];
    standardizeRecordNames(records);
    expect(records[0].name).toBe("[Raider] Fury, Rising");
    expect(standardizeRecordNames(records)).toBe(0);
  });
});
