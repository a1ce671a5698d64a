import type { CostRecord, ProviderId, UsageRecord } from "@spendtop/shared";
import { dedupeStrings } from "@spendtop/shared";

import type { Logger } from "../../logs";
import {
  describeError,
  ProviderFetchError,
  type ProviderFetchErrorCode,
} from "../providers/provider-error";
import { type ProviderClient, sortByDate } from "../providers/provider-client";

export type FetchOutcome = {
  provider: ProviderId;
  costRecords: CostRecord[];
  usageRecords: UsageRecord[];
  keyNames: Map<string, string>;
  costError: string | null;
  usageError: string | null;
};

type FetchRunOptions = {
  startDay: string;
  logger: Logger;
};

const appendError = (current: string | null, message: string) =>
  current == null ? message : `${current}; ${message}`;

/**
 * Fetches every usage source concurrently. Succeeds when at least one source
 * does; fails with ALL_SOURCES_FAILED when none does.
 */
export const fetchUsage = async (
  client: ProviderClient,
  { startDay, logger }: FetchRunOptions,
): Promise<UsageRecord[]> => {
  const settled = await Promise.allSettled(
    client.usageSources.map((source) => source.fetch(startDay)),
  );

  const records: UsageRecord[] = [];
  const failures: string[] = [];
  settled.forEach((result, index) => {
    const name = client.usageSources[index]?.name ?? `source ${index}`;
    if (result.status === "fulfilled") {
      records.push(...result.value);
      return;
    }
    failures.push(`${name}: ${describeError(result.reason)}`);
  });

  if (failures.length > 0 && failures.length === settled.length) {
    throw new ProviderFetchError(
      "ALL_SOURCES_FAILED",
      `Failed to fetch usage from any endpoint: ${failures.join("; ")}`,
    );
  }
  if (failures.length > 0) {
    logger.warn("usage fetch partially failed", {
      provider: client.provider,
      code: "PARTIAL_FETCH" satisfies ProviderFetchErrorCode,
      failures: failures.join("; "),
    });
  }
  return sortByDate(records);
};

export const collectKeyIds = (records: readonly UsageRecord[]) =>
  dedupeStrings(
    records
      .map((record) => record.apiKeyId?.trim() ?? "")
      .filter((id) => id.length > 0 && id !== "unknown"),
  );

/**
 * One complete refresh for one provider: costs and usage concurrently, then
 * key-name resolution for the usage records. Never rejects; failures land in
 * `costError` / `usageError`.
 */
export const runProviderFetch = async (
  client: ProviderClient,
  options: FetchRunOptions,
): Promise<FetchOutcome> => {
  const { logger } = options;
  const startedAt = Date.now();
  logger.info("fetch started", { provider: client.provider, startDay: options.startDay });

  const [costResult, usageResult] = await Promise.allSettled([
    client.fetchCosts(options.startDay),
    fetchUsage(client, options),
  ]);

  let costError: string | null = null;
  let costRecords: CostRecord[] = [];
  if (costResult.status === "fulfilled") {
    costRecords = costResult.value;
  } else {
    costError = describeError(costResult.reason);
    logger.error("cost fetch failed", { provider: client.provider, error: costError });
  }

  let usageError: string | null = null;
  let usageRecords: UsageRecord[] = [];
  let keyNames = new Map<string, string>();
  if (usageResult.status === "fulfilled") {
    usageRecords = usageResult.value;
    const keyIds = collectKeyIds(usageRecords);
    if (keyIds.length > 0) {
      try {
        keyNames = await client.resolveKeyNames(keyIds);
      } catch (error) {
        const message = `API key name fetch failed: ${describeError(error)}`;
        usageError = appendError(usageError, message);
        logger.warn("key name resolution failed", { provider: client.provider, error: message });
      }
    }
  } else {
    usageError = appendError(usageError, `Usage fetch failed: ${describeError(usageResult.reason)}`);
    logger.error("usage fetch failed", { provider: client.provider, error: usageError });
  }

  logger.info("fetch finished", {
    provider: client.provider,
    costRecords: costRecords.length,
    usageRecords: usageRecords.length,
    keyNames: keyNames.size,
    elapsedMs: Date.now() - startedAt,
  });

  return {
    provider: client.provider,
    costRecords,
    usageRecords,
    keyNames,
    costError,
    usageError,
  };
};
