export type ProviderId = "openai" | "anthropic";

export type Metric = "usage" | "cost";

export type GroupBy = "model" | "apiKey";

export type RangeId = "7d" | "30d";

export type OptionsColumn = "provider" | "metric" | "groupBy" | "range";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * One cost line for one UTC calendar day.
 * `date` is always `YYYY-MM-DD`.
 */
export type CostRecord = {
  date: string;
  amount: number;
  category: string | null;
};

export type UsageRecord = {
  date: string;
  inputTokens: number;
  outputTokens: number;
  model: string | null;
  apiKeyId: string | null;
  cacheReadTokens: number | null;
  uncachedTokens: number | null;
  requestCount: number | null;
};

export type ProviderConfig = {
  baseUrl: string;
};

export type AnthropicProviderConfig = ProviderConfig & {
  version: string;
};

export type FetchConfig = {
  timeoutMs: number;
  maxPages: number;
  lookbackDays: number;
  costPageLimit: number;
};

export type ChartConfig = {
  minBarWidth: number;
  maxBarWidth: number;
  barSpacing: number;
  outlierRatio: number;
  compressedScaleMultiplier: number;
  legendWidth: number;
  legendCostThreshold: number;
};

export type UiConfig = {
  tickMs: number;
  defaultProvider: ProviderId;
  defaultMetric: Metric;
  defaultRange: RangeId;
};

export type LoggingConfig = {
  level: LogLevel;
  maxBytes: number;
  retainRotations: number;
};

export type ResolvedConfig = {
  providers: {
    openai: ProviderConfig;
    anthropic: AnthropicProviderConfig;
  };
  fetch: FetchConfig;
  chart: ChartConfig;
  ui: UiConfig;
  logging: LoggingConfig;
};
