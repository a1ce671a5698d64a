import { z } from "zod";

export const providerIdSchema = z.enum(["openai", "anthropic"]);
export const metricSchema = z.enum(["usage", "cost"]);
export const rangeIdSchema = z.enum(["7d", "30d"]);
export const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const positiveInt = z.number().int().positive();

const providerConfigSchema = z
  .object({
    baseUrl: z.string().url(),
  })
  .strict();

const anthropicProviderConfigSchema = z
  .object({
    baseUrl: z.string().url(),
    version: z.string().min(1),
  })
  .strict();

const fetchConfigSchema = z
  .object({
    timeoutMs: positiveInt,
    maxPages: positiveInt.max(1000),
    lookbackDays: positiveInt.max(180),
    costPageLimit: positiveInt.max(180),
  })
  .strict();

const chartConfigObjectSchema = z
  .object({
    minBarWidth: positiveInt,
    maxBarWidth: positiveInt,
    barSpacing: z.number().int().nonnegative(),
    outlierRatio: z.number().positive(),
    compressedScaleMultiplier: z.number().positive(),
    legendWidth: positiveInt,
    legendCostThreshold: z.number().nonnegative(),
  })
  .strict();

const chartConfigSchema = chartConfigObjectSchema.refine(
  (chart) => chart.minBarWidth <= chart.maxBarWidth,
  {
    message: "chart.minBarWidth must not exceed chart.maxBarWidth",
    path: ["minBarWidth"],
  },
);

const uiConfigSchema = z
  .object({
    tickMs: positiveInt,
    defaultProvider: providerIdSchema,
    defaultMetric: metricSchema,
    defaultRange: rangeIdSchema,
  })
  .strict();

const loggingConfigSchema = z
  .object({
    level: logLevelSchema,
    maxBytes: positiveInt,
    retainRotations: z.number().int().nonnegative(),
  })
  .strict();

export const configSchema = z
  .object({
    providers: z
      .object({
        openai: providerConfigSchema,
        anthropic: anthropicProviderConfigSchema,
      })
      .strict(),
    fetch: fetchConfigSchema,
    chart: chartConfigSchema,
    ui: uiConfigSchema,
    logging: loggingConfigSchema,
  })
  .strict();

export const configOverrideSchema = z
  .object({
    providers: z
      .object({
        openai: providerConfigSchema.partial().optional(),
        anthropic: anthropicProviderConfigSchema.partial().optional(),
      })
      .strict()
      .optional(),
    fetch: fetchConfigSchema.partial().optional(),
    chart: chartConfigObjectSchema.partial().optional(),
    ui: uiConfigSchema.partial().optional(),
    logging: loggingConfigSchema.partial().optional(),
  })
  .strict();

export type ConfigOverride = z.infer<typeof configOverrideSchema>;
