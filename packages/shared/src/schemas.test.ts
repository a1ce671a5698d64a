import { describe, expect, it } from "vitest";

import { configDefaults } from "./runtime-defaults";
import { configOverrideSchema, configSchema, rangeIdSchema } from "./schemas";

describe("configSchema", () => {
  it("accepts the built-in defaults", () => {
    expect(configSchema.safeParse(configDefaults).success).toBe(true);
  });

  it("rejects unknown keys", () => {
    const result = configSchema.safeParse({ ...configDefaults, extra: true });
    expect(result.success).toBe(false);
  });

  it("rejects a minimum bar width above the maximum", () => {
    const result = configSchema.safeParse({
      ...configDefaults,
      chart: { ...configDefaults.chart, minBarWidth: 30, maxBarWidth: 20 },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["chart", "minBarWidth"]);
    }
  });
});

describe("configOverrideSchema", () => {
  it("accepts a partial override", () => {
    const result = configOverrideSchema.safeParse({
      ui: { defaultProvider: "anthropic" },
      chart: { outlierRatio: 4 },
    });

    expect(result.success).toBe(true);
  });

  it("rejects an unknown provider", () => {
    const result = configOverrideSchema.safeParse({ ui: { defaultProvider: "other" } });
    expect(result.success).toBe(false);
  });

  it("rejects a non-url base url", () => {
    const result = configOverrideSchema.safeParse({
      providers: { openai: { baseUrl: "not a url" } },
    });
    expect(result.success).toBe(false);
  });
});

describe("rangeIdSchema", () => {
  it("accepts only the two supported ranges", () => {
    expect(rangeIdSchema.safeParse("7d").success).toBe(true);
    expect(rangeIdSchema.safeParse("30d").success).toBe(true);
    expect(rangeIdSchema.safeParse("90d").success).toBe(false);
  });
});
