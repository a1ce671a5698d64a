import type { CostRecord, UsageRecord } from "@spendtop/shared";
import { toUtcDay } from "@spendtop/shared";
import { z } from "zod";

import { type JsonRequest, type Page, paginate, requestJson } from "./http-client";
import {
  type ProviderClient,
  type ProviderClientOptions,
  sortByDate,
  type UsageSource,
} from "./provider-client";

export const OPENAI_USAGE_SOURCES = ["completions", "embeddings", "images"] as const;

const costPageSchema = z.object({
  data: z.array(
    z.object({
      start_time: z.number(),
      results: z.array(
        z.object({
          amount: z.object({ value: z.coerce.number() }),
          line_item: z.string().nullish(),
        }),
      ),
    }),
  ),
  has_more: z.boolean().optional(),
  next_page: z.string().nullish(),
});

const usagePageSchema = z.object({
  data: z.array(
    z.object({
      start_time: z.number(),
      results: z.array(
        z.object({
          input_tokens: z.number().nullish(),
          output_tokens: z.number().nullish(),
          input_cached_tokens: z.number().nullish(),
          num_model_requests: z.number().nullish(),
          model: z.string().nullish(),
          api_key_id: z.string().nullish(),
        }),
      ),
    }),
  ),
  has_more: z.boolean().optional(),
  next_page: z.string().nullish(),
});

const listPageSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      name: z.string().nullish(),
    }),
  ),
  has_more: z.boolean().optional(),
  last_id: z.string().nullish(),
});

type OpenAiClientOptions = ProviderClientOptions & {
  costPageLimit: number;
};

const toDay = (startTimeSeconds: number) => toUtcDay(new Date(startTimeSeconds * 1000));

const toStartTime = (startDay: string) => Math.floor(Date.parse(`${startDay}T00:00:00Z`) / 1000);

export const createOpenAiClient = ({
  apiKey,
  baseUrl,
  timeoutMs,
  maxPages,
  costPageLimit,
  fetchImpl,
}: OpenAiClientOptions): ProviderClient => {
  const request = <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    path: string,
    query: JsonRequest["query"],
  ) =>
    requestJson(schema, {
      label,
      url: `${baseUrl}${path}`,
      query,
      headers: { Authorization: `Bearer ${apiKey}` },
      timeoutMs,
      fetchImpl,
    });

  const fetchCosts = async (startDay: string): Promise<CostRecord[]> => {
    const buckets = await paginate(async (cursor) => {
      const page = await request(costPageSchema, "costs", "/costs", {
        start_time: toStartTime(startDay),
        group_by: "line_item",
        limit: costPageLimit,
        page: cursor ?? undefined,
      });
      return { items: page.data, hasMore: page.has_more ?? false, nextCursor: page.next_page ?? null };
    }, maxPages);

    const records = buckets.flatMap((bucket) =>
      bucket.results.map((result) => ({
        date: toDay(bucket.start_time),
        amount: result.amount.value,
        category: result.line_item ?? null,
      })),
    );
    return sortByDate(records);
  };

  const fetchUsageSource = async (source: string, startDay: string): Promise<UsageRecord[]> => {
    const buckets = await paginate(async (cursor) => {
      const page = await request(usagePageSchema, source, `/usage/${source}`, {
        start_time: toStartTime(startDay),
        interval: "1d",
        group_by: ["model", "api_key_id"],
        page: cursor ?? undefined,
      });
      return { items: page.data, hasMore: page.has_more ?? false, nextCursor: page.next_page ?? null };
    }, maxPages);

    const records: UsageRecord[] = [];
    buckets.forEach((bucket) => {
      bucket.results.forEach((result) => {
        const inputTokens = result.input_tokens ?? 0;
        const outputTokens = result.output_tokens ?? 0;
        if (inputTokens === 0 && outputTokens === 0) {
          return;
        }
        const cacheReadTokens = result.input_cached_tokens ?? null;
        records.push({
          date: toDay(bucket.start_time),
          inputTokens,
          outputTokens,
          model: result.model ?? null,
          apiKeyId: result.api_key_id ?? null,
          cacheReadTokens,
          uncachedTokens: cacheReadTokens == null ? null : Math.max(0, inputTokens - cacheReadTokens),
          requestCount: result.num_model_requests ?? null,
        });
      });
    });
    return sortByDate(records);
  };

  const listPaged = (label: string, path: string) =>
    paginate(async (cursor): Promise<Page<z.infer<typeof listPageSchema>["data"][number]>> => {
      const page = await request(listPageSchema, label, path, { after: cursor ?? undefined });
      return { items: page.data, hasMore: page.has_more ?? false, nextCursor: page.last_id ?? null };
    }, maxPages);

  const resolveKeyNames = async (ids: readonly string[]) => {
    const wanted = new Set(ids);
    const names = new Map<string, string>();
    if (wanted.size === 0) {
      return names;
    }
    const projects = await listPaged("projects", "/projects");
    const projectKeys = await Promise.allSettled(
      projects.map((project) =>
        listPaged(`api keys of ${project.id}`, `/projects/${encodeURIComponent(project.id)}/api_keys`),
      ),
    );
    projectKeys.forEach((result) => {
      if (result.status !== "fulfilled") {
        return;
      }
      result.value.forEach((key) => {
        const name = key.name?.trim();
        if (wanted.has(key.id) && name) {
          names.set(key.id, name);
        }
      });
    });
    return names;
  };

  const usageSources: UsageSource[] = OPENAI_USAGE_SOURCES.map((source) => ({
    name: source,
    fetch: (startDay: string) => fetchUsageSource(source, startDay),
  }));

  return {
    provider: "openai",
    fetchCosts,
    usageSources,
    resolveKeyNames,
  };
};
