import type { CostRecord, UsageRecord } from "@spendtop/shared";
import { toUtcDay } from "@spendtop/shared";
import { z } from "zod";

import { type JsonRequest, paginate, requestJson } from "./http-client";
import { type ProviderClient, type ProviderClientOptions, sortByDate } from "./provider-client";

const costReportPageSchema = z.object({
  data: z.array(
    z.object({
      starting_at: z.string(),
      results: z.array(
        z.object({
          amount: z.string(),
          currency: z.string().nullish(),
          description: z.string().nullish(),
          model: z.string().nullish(),
        }),
      ),
    }),
  ),
  has_more: z.boolean().optional(),
  next_page: z.string().nullish(),
});

const messagesUsagePageSchema = z.object({
  data: z.array(
    z.object({
      starting_at: z.string(),
      results: z.array(
        z.object({
          uncached_input_tokens: z.number().nullish(),
          cache_read_input_tokens: z.number().nullish(),
          cache_creation: z
            .object({
              ephemeral_1h_input_tokens: z.number().nullish(),
              ephemeral_5m_input_tokens: z.number().nullish(),
            })
            .nullish(),
          output_tokens: z.number().nullish(),
          model: z.string().nullish(),
          api_key_id: z.string().nullish(),
        }),
      ),
    }),
  ),
  has_more: z.boolean().optional(),
  next_page: z.string().nullish(),
});

const apiKeySchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
});

type AnthropicClientOptions = ProviderClientOptions & {
  version: string;
};

const parseBucketDay = (startingAt: string) => {
  const parsed = Date.parse(startingAt);
  return Number.isNaN(parsed) ? null : toUtcDay(new Date(parsed));
};

// Cost report amounts are decimal strings in cents.
const parseCents = (amount: string) => {
  const cents = Number.parseFloat(amount);
  return Number.isFinite(cents) ? cents / 100 : null;
};

export const createAnthropicClient = ({
  apiKey,
  baseUrl,
  version,
  timeoutMs,
  maxPages,
  fetchImpl,
}: AnthropicClientOptions): ProviderClient => {
  const request = <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    path: string,
    query: JsonRequest["query"] = {},
  ) =>
    requestJson(schema, {
      label,
      url: `${baseUrl}${path}`,
      query,
      headers: { "x-api-key": apiKey, "anthropic-version": version },
      timeoutMs,
      fetchImpl,
    });

  const fetchCosts = async (startDay: string): Promise<CostRecord[]> => {
    const buckets = await paginate(async (cursor) => {
      const page = await request(costReportPageSchema, "cost_report", "/cost_report", {
        starting_at: `${startDay}T00:00:00Z`,
        "group_by[]": "description",
        page: cursor ?? undefined,
      });
      return { items: page.data, hasMore: page.has_more ?? false, nextCursor: page.next_page ?? null };
    }, maxPages);

    const records: CostRecord[] = [];
    buckets.forEach((bucket) => {
      const date = parseBucketDay(bucket.starting_at);
      if (!date) {
        return;
      }
      bucket.results.forEach((result) => {
        const amount = parseCents(result.amount);
        if (amount == null || amount <= 0) {
          return;
        }
        records.push({ date, amount, category: result.model ?? result.description ?? null });
      });
    });
    return sortByDate(records);
  };

  const fetchMessagesUsage = async (startDay: string): Promise<UsageRecord[]> => {
    const buckets = await paginate(async (cursor) => {
      const page = await request(messagesUsagePageSchema, "messages", "/usage_report/messages", {
        starting_at: `${startDay}T00:00:00Z`,
        "group_by[]": ["model", "api_key_id"],
        bucket_width: "1d",
        page: cursor ?? undefined,
      });
      return { items: page.data, hasMore: page.has_more ?? false, nextCursor: page.next_page ?? null };
    }, maxPages);

    const records: UsageRecord[] = [];
    buckets.forEach((bucket) => {
      const date = parseBucketDay(bucket.starting_at);
      if (!date) {
        return;
      }
      bucket.results.forEach((result) => {
        const uncachedTokens = result.uncached_input_tokens ?? 0;
        const cacheReadTokens = result.cache_read_input_tokens ?? 0;
        const cacheCreationTokens =
          (result.cache_creation?.ephemeral_1h_input_tokens ?? 0) +
          (result.cache_creation?.ephemeral_5m_input_tokens ?? 0);
        const inputTokens = uncachedTokens + cacheCreationTokens + cacheReadTokens;
        const outputTokens = result.output_tokens ?? 0;
        if (inputTokens === 0 && outputTokens === 0) {
          return;
        }
        records.push({
          date,
          inputTokens,
          outputTokens,
          model: result.model ?? null,
          apiKeyId: result.api_key_id ?? null,
          cacheReadTokens,
          uncachedTokens,
          requestCount: null,
        });
      });
    });
    return sortByDate(records);
  };

  const resolveKeyNames = async (ids: readonly string[]) => {
    const lookups = await Promise.allSettled(
      ids.map((id) => request(apiKeySchema, `api key ${id}`, `/api_keys/${encodeURIComponent(id)}`)),
    );
    const names = new Map<string, string>();
    lookups.forEach((result, index) => {
      const id = ids[index];
      if (result.status !== "fulfilled" || id === undefined) {
        return;
      }
      const name = result.value.name?.trim();
      if (name) {
        names.set(id, name);
      }
    });
    return names;
  };

  return {
    provider: "anthropic",
    fetchCosts,
    usageSources: [{ name: "messages", fetch: fetchMessagesUsage }],
    resolveKeyNames,
  };
};
