import type { CostRecord, UsageRecord } from "@spendtop/shared";
import { describe, expect, it } from "vitest";

import {
  availableCategories,
  costGroupKey,
  costValue,
  filterByCategory,
  groupKey,
  groupTotals,
  recordsInRange,
  sumBy,
  usageGroupKey,
} from "./time-series";

const cost = (date: string, amount: number, category: string | null): CostRecord => ({
  date,
  amount,
  category,
});

const tenDaysOfCosts = Array.from({ length: 10 }, (_, index) => {
  const date = `2025-01-${String(index + 1).padStart(2, "0")}`;
  return [cost(date, 5, "gpt-4"), cost(date, 1, "gpt-3.5")];
}).flat();

const usage = (overrides: Partial<UsageRecord>): UsageRecord => ({
  date: "2025-01-01",
  inputTokens: 10,
  outputTokens: 5,
  model: null,
  apiKeyId: null,
  cacheReadTokens: null,
  uncachedTokens: null,
  requestCount: null,
  ...overrides,
});

describe("groupKey", () => {
  it("trims values and maps blanks to unknown", () => {
    expect(groupKey(" gpt-4 ")).toBe("gpt-4");
    expect(groupKey("   ")).toBe("unknown");
    expect(groupKey(null)).toBe("unknown");
    expect(groupKey(undefined)).toBe("unknown");
  });

  it("selects the usage key by grouping", () => {
    const record = usage({ model: "gpt-4o", apiKeyId: "key_a" });

    expect(usageGroupKey("model")(record)).toBe("gpt-4o");
    expect(usageGroupKey("apiKey")(record)).toBe("key_a");
    expect(usageGroupKey("apiKey")(usage({}))).toBe("unknown");
  });
});

describe("recordsInRange", () => {
  it("keeps the seven days ending on the newest record", () => {
    const inRange = recordsInRange(tenDaysOfCosts, "7d");

    expect(inRange).toHaveLength(14);
    expect(inRange[0]?.date).toBe("2025-01-04");
    expect(sumBy(inRange, costValue)).toBe(42);
  });

  it("returns the same records when applied twice", () => {
    const once = recordsInRange(tenDaysOfCosts, "7d");

    expect(recordsInRange(once, "7d")).toEqual(once);
  });

  it("keeps everything inside a 30 day window", () => {
    expect(recordsInRange(tenDaysOfCosts, "30d")).toHaveLength(20);
  });

  it("returns nothing for no records", () => {
    expect(recordsInRange([], "7d")).toEqual([]);
  });
});

describe("filterByCategory", () => {
  it("narrows to one normalized category", () => {
    const filtered = filterByCategory(recordsInRange(tenDaysOfCosts, "7d"), costGroupKey, "gpt-4");

    expect(sumBy(filtered, costValue)).toBe(35);
  });

  it("matches records without a category under unknown", () => {
    const records = [cost("2025-01-01", 2, null), cost("2025-01-01", 3, " ")];

    expect(filterByCategory(records, costGroupKey, "unknown")).toHaveLength(2);
    expect(filterByCategory(records, costGroupKey, null)).toHaveLength(2);
  });
});

describe("availableCategories", () => {
  it("lists sorted distinct keys", () => {
    const records = [
      cost("2025-01-01", 1, "b-model"),
      cost("2025-01-01", 1, null),
      cost("2025-01-02", 1, "a-model"),
      cost("2025-01-02", 1, "b-model"),
    ];

    expect(availableCategories(records, costGroupKey)).toEqual(["a-model", "b-model", "unknown"]);
  });
});

describe("groupTotals", () => {
  it("sums per day and category in date order", () => {
    const totals = groupTotals(
      [
        cost("2025-01-02", 1, "a"),
        cost("2025-01-01", 2, "a"),
        cost("2025-01-01", 3, "a"),
        cost("2025-01-01", 4, "b"),
      ],
      costGroupKey,
      costValue,
    );

    expect([...totals.keys()]).toEqual(["2025-01-01", "2025-01-02"]);
    expect([...(totals.get("2025-01-01") ?? [])]).toEqual([
      ["a", 5],
      ["b", 4],
    ]);
  });

  it("drops zero categories but keeps the day", () => {
    const totals = groupTotals([cost("2025-01-01", 0, "a")], costGroupKey, costValue);

    expect(totals.get("2025-01-01")?.size).toBe(0);
  });
});
