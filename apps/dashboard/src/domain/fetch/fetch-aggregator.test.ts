import type { UsageRecord } from "@spendtop/shared";
import { beforeEach, describe, expect, it, vi } from "vitest";

import type { ProviderClient } from "../providers/provider-client";
import { collectKeyIds, fetchUsage, runProviderFetch } from "./fetch-aggregator";

const logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const usage = (date: string, overrides: Partial<UsageRecord> = {}): UsageRecord => ({
  date,
  inputTokens: 10,
  outputTokens: 5,
  model: "gpt-4o",
  apiKeyId: null,
  cacheReadTokens: null,
  uncachedTokens: null,
  requestCount: null,
  ...overrides,
});

const createClient = (overrides: Partial<ProviderClient> = {}): ProviderClient => ({
  provider: "openai",
  fetchCosts: vi.fn(async () => []),
  usageSources: [],
  resolveKeyNames: vi.fn(async () => new Map<string, string>()),
  ...overrides,
});

const options = { startDay: "2025-01-01", logger };

beforeEach(() => {
  vi.clearAllMocks();
});

describe("fetchUsage", () => {
  it("merges the sources that succeed and warns about the rest", async () => {
    const client = createClient({
      usageSources: [
        { name: "completions", fetch: async () => [usage("2025-01-03")] },
        { name: "embeddings", fetch: async () => Promise.reject(new Error("boom")) },
        { name: "images", fetch: async () => [usage("2025-01-02")] },
      ],
    });

    const records = await fetchUsage(client, options);

    expect(records.map((record) => record.date)).toEqual(["2025-01-02", "2025-01-03"]);
    expect(logger.warn).toHaveBeenCalledWith("usage fetch partially failed", {
      provider: "openai",
      code: "PARTIAL_FETCH",
      failures: "embeddings: boom",
    });
  });

  it("fails when every source fails", async () => {
    const client = createClient({
      usageSources: [
        { name: "completions", fetch: async () => Promise.reject(new Error("x")) },
        { name: "embeddings", fetch: async () => Promise.reject(new Error("y")) },
      ],
    });

    await expect(fetchUsage(client, options)).rejects.toMatchObject({
      code: "ALL_SOURCES_FAILED",
      message: "Failed to fetch usage from any endpoint: completions: x; embeddings: y",
    });
  });

  it("passes the start day to each source", async () => {
    const fetchSource = vi.fn(async () => []);
    const client = createClient({ usageSources: [{ name: "messages", fetch: fetchSource }] });

    await fetchUsage(client, options);

    expect(fetchSource).toHaveBeenCalledWith("2025-01-01");
  });
});

describe("collectKeyIds", () => {
  it("trims, dedupes and drops placeholder ids", () => {
    const records = [" k1 ", "k1", null, "", "unknown", "k2"].map((apiKeyId) =>
      usage("2025-01-01", { apiKeyId }),
    );

    expect(collectKeyIds(records)).toEqual(["k1", "k2"]);
  });
});

describe("runProviderFetch", () => {
  it("keeps usage when costs fail and resolves key names", async () => {
    const resolveKeyNames = vi.fn(async () => new Map([["key_a", "CI"]]));
    const client = createClient({
      fetchCosts: async () => Promise.reject(new Error("costs: HTTP 500 - oops")),
      usageSources: [
        {
          name: "completions",
          fetch: async () => [
            usage("2025-01-01", { apiKeyId: "key_a" }),
            usage("2025-01-02", { apiKeyId: "key_a" }),
            usage("2025-01-02"),
          ],
        },
      ],
      resolveKeyNames,
    });

    const outcome = await runProviderFetch(client, options);

    expect(outcome.costError).toBe("costs: HTTP 500 - oops");
    expect(outcome.costRecords).toEqual([]);
    expect(outcome.usageError).toBeNull();
    expect(outcome.usageRecords).toHaveLength(3);
    expect(resolveKeyNames).toHaveBeenCalledWith(["key_a"]);
    expect(outcome.keyNames.get("key_a")).toBe("CI");
    expect(logger.error).toHaveBeenCalledWith("cost fetch failed", {
      provider: "openai",
      error: "costs: HTTP 500 - oops",
    });
  });

  it("reports a usage failure and keeps costs", async () => {
    const client = createClient({
      fetchCosts: async () => [{ date: "2025-01-01", amount: 2, category: "gpt-4o" }],
      usageSources: [{ name: "completions", fetch: async () => Promise.reject(new Error("down")) }],
    });

    const outcome = await runProviderFetch(client, options);

    expect(outcome.costRecords).toEqual([{ date: "2025-01-01", amount: 2, category: "gpt-4o" }]);
    expect(outcome.costError).toBeNull();
    expect(outcome.usageError).toBe(
      "Usage fetch failed: Failed to fetch usage from any endpoint: completions: down",
    );
    expect(client.resolveKeyNames).not.toHaveBeenCalled();
  });

  it("keeps usage records when key names cannot be resolved", async () => {
    const client = createClient({
      usageSources: [
        { name: "completions", fetch: async () => [usage("2025-01-01", { apiKeyId: "key_a" })] },
      ],
      resolveKeyNames: async () => Promise.reject(new Error("nope")),
    });

    const outcome = await runProviderFetch(client, options);

    expect(outcome.usageRecords).toHaveLength(1);
    expect(outcome.keyNames.size).toBe(0);
    expect(outcome.usageError).toBe("API key name fetch failed: nope");
  });

  it("skips key resolution when no record carries a key id", async () => {
    const client = createClient({
      usageSources: [{ name: "completions", fetch: async () => [usage("2025-01-01")] }],
    });

    await runProviderFetch(client, options);

    expect(client.resolveKeyNames).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith("fetch started", {
      provider: "openai",
      startDay: "2025-01-01",
    });
  });
});
