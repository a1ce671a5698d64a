import type { CostRecord, ProviderId, UsageRecord } from "@spendtop/shared";

export type UsageSource = {
  name: string;
  fetch: (startDay: string) => Promise<UsageRecord[]>;
};

/**
 * Vendor-specific access to one organization's billing data.
 * `startDay` is the first UTC day (`YYYY-MM-DD`) to request.
 */
export type ProviderClient = {
  provider: ProviderId;
  fetchCosts: (startDay: string) => Promise<CostRecord[]>;
  usageSources: readonly UsageSource[];
  resolveKeyNames: (ids: readonly string[]) => Promise<Map<string, string>>;
};

export type ProviderClientOptions = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  maxPages: number;
  fetchImpl?: typeof fetch;
};

export const sortByDate = <T extends { date: string }>(records: T[]) =>
  records.sort((left, right) => left.date.localeCompare(right.date));
