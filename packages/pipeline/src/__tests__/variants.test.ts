import { describe, expect, it } from "vitest";
import {
  areWordVariants,
  hasSingleWordInsertion,
  isTruncatedVariant,
  isWordSubsequence,
  shareGameIds,
  unionGameIds
} from "../merge/variants.js";

describe("word comparisons", () => {
  it("finds the shorter list in order inside the longer one", () => {
    expect(isWordSubsequence(["Guard", "Boost"], ["Guard", "Big", "Boost", "Extra"])).toBe(true);
    expect(isWordSubsequence(["Boost", "Guard"], ["Guard", "Big", "Boost"])).toBe(false);
  });

  it("allows exactly one inserted word", () => {
    expect(hasSingleWordInsertion(["Rune", "Shield"], ["Rune", "Great", "Shield"])).toBe(true);
    expect(hasSingleWordInsertion(["Rune", "Shield"], ["Rune", "Great", "Tall", "Shield"])).toBe(false);
    expect(hasSingleWordInsertion(["Rune", "Shield"], ["Great", "Rune", "Sword"])).toBe(false);
  });

  it("never treats names of the same word count as word variants", () => {
    expect(areWordVariants("Burn Resist", "Burn Resistance")).toBe(false);
    expect(areWordVariants("Guard Boost", "Guard Boost Plus Extra")).toBe(true);
  });
});

describe("isTruncatedVariant", () => {
  it("matches a name extended by whole words", () => {
    expect(isTruncatedVariant("Power Strike", "Power Strike +1")).toBe(true);
    expect(isTruncatedVariant("Power Strike +1", "Power Strike")).toBe(true);
  });

  it("ignores faction brackets", () => {
    expect(isTruncatedVariant("[Wylder] Power Strike", "Power Strike +1")).toBe(true);
  });

  it("matches a prefix at least half again as long", () => {
    expect(isTruncatedVariant("Fire", "Fireball")).toBe(true);
    expect(isTruncatedVariant("Burn Resist", "Burn Resistance")).toBe(false);
  });

  it("matches a single missing word", () => {
    expect(isTruncatedVariant("Rune Shield", "Rune Great Shield")).toBe(true);
  });

  it("rejects unrelated names", () => {
    expect(isTruncatedVariant("Rune Shield", "Shield Rune Great")).toBe(false);
    expect(isTruncatedVariant("Power Strike", "Power Slash")).toBe(false);
  });
});

describe("game ids", () => {
  it("detects an overlap", () => {
    expect(shareGameIds([1, 2], [2, 3])).toBe(true);
    expect(shareGameIds([1], [3])).toBe(false);
    expect(shareGameIds([], [])).toBe(false);
  });

  it("unions into a sorted list without duplicates", () => {
    expect(unionGameIds([30, 10], [20, 10], [])).toEqual([10, 20, 30]);
  });
});
