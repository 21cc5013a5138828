import { describe, expect, it } from "vitest";
import { extractiveSummary, extractTopics } from "./frequency";

const batteryText =
  "Battery output rose. The weather was mild. Battery output and battery demand rose again.";

describe("extractiveSummary", () => {
  it("keeps the highest scoring sentences in original order", () => {
    expect(extractiveSummary(batteryText, 2, 400)).toBe(
      "Battery output rose. Battery output and battery demand rose again.",
    );
  });

  it("drops the weakest selected sentence until the summary fits", () => {
    expect(extractiveSummary(batteryText, 2, 40)).toBe("Battery output rose.");
  });

  it("returns short unpunctuated text unchanged", () => {
    expect(extractiveSummary("Shares flat", 3, 400)).toBe("Shares flat");
  });

  it("is empty only for empty input", () => {
    expect(extractiveSummary("", 3, 400)).toBe("");
  });
});

describe("extractTopics", () => {
  it("prefers repeated bigrams and lets them absorb their words", () => {
    const text =
      "Battery supply improved. Battery supply costs fell. Tesla expanded battery supply in Texas.";

    expect(extractTopics(text, 4, ["Tesla"])).toEqual([
      "battery supply",
      "improved",
      "costs",
      "fell",
    ]);
  });

  it("skips numbers and tokens shorter than three characters", () => {
    expect(extractTopics("Q3 revenue hit 2024 highs as EV demand grew", 5)).toEqual([
      "revenue",
      "hit",
      "highs",
      "demand",
      "grew",
    ]);
  });

  it("returns the same topics for the same text", () => {
    expect(extractTopics(batteryText, 5)).toEqual(extractTopics(batteryText, 5));
  });
});
