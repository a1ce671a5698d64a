import { describe, expect, it } from "vitest";

import {
  abbreviateApiKey,
  compactDateLabel,
  displayKeyName,
  formatChange,
  formatCost,
  formatDateLabel,
  formatLegendCost,
  formatSpan,
  formatTokens,
  formatWholeCost,
} from "./format";

describe("format", () => {
  it("formats token counts with k and M suffixes", () => {
    expect(formatTokens(999)).toBe("999");
    expect(formatTokens(1500)).toBe("1k");
    expect(formatTokens(2_500_000)).toBe("2.5M");
  });

  it("formats costs", () => {
    expect(formatCost(3.5)).toBe("$3.50");
    expect(formatWholeCost(41.6)).toBe("$42");
  });

  it("trims trailing zeros from legend costs above the threshold", () => {
    expect(formatLegendCost(42.5, 1)).toBe("$42.5");
    expect(formatLegendCost(100, 1)).toBe("$100");
    expect(formatLegendCost(0.5, 1)).toBe("$0.50");
  });

  it("abbreviates long key ids unless a name is known", () => {
    expect(abbreviateApiKey("key_short")).toBe("key_short");
    expect(abbreviateApiKey("sk-admin-1234567890abcd")).toBe("sk-admin...abcd");
    expect(displayKeyName("sk-admin-1234567890abcd", new Map([["sk-admin-1234567890abcd", "CI"]]))).toBe(
      "CI",
    );
  });

  it("shortens date labels to fit the bar", () => {
    expect(formatDateLabel("2025-01-10")).toBe("01/10");
    expect(compactDateLabel("01/10", 5)).toBe("01/10");
    expect(compactDateLabel("01/10", 3)).toBe("10");
    expect(compactDateLabel("01/10", 1)).toBe("1");
  });

  it("formats period changes and spans", () => {
    expect(formatChange({ ratio: -0.25, direction: "down" })).toBe("↓ 25.0%");
    expect(formatChange({ ratio: 0.5, direction: "up" })).toBe("↑ 50.0%");
    expect(formatSpan(null)).toBe("No data in selected range");
    expect(formatSpan({ from: "2025-01-04", to: "2025-01-10" })).toBe("01/04 - 01/10");
  });
});
