import type { ResolvedConfig } from "./types";

export const configDefaults: ResolvedConfig = {
  providers: {
    openai: {
      baseUrl: "https://api.openai.com/v1/organization",
    },
    anthropic: {
      baseUrl: "https://api.anthropic.com/v1/organizations",
      version: "2023-06-01",
    },
  },
  fetch: {
    timeoutMs: 15_000,
    maxPages: 30,
    lookbackDays: 30,
    costPageLimit: 180,
  },
  chart: {
    minBarWidth: 5,
    maxBarWidth: 20,
    barSpacing: 1,
    outlierRatio: 3,
    compressedScaleMultiplier: 2,
    legendWidth: 50,
    legendCostThreshold: 1,
  },
  ui: {
    tickMs: 50,
    defaultProvider: "openai",
    defaultMetric: "usage",
    defaultRange: "7d",
  },
  logging: {
    level: "info",
    maxBytes: 1_000_000,
    retainRotations: 3,
  },
};
