import type { CostRecord, GroupBy, Metric, RangeId, UsageRecord } from "@spendtop/shared";
import { shiftUtcDay } from "@spendtop/shared";

import {
  type CategorySelector,
  costGroupKey,
  costValue,
  filterByCategory,
  latestDate,
  rangeCutoff,
  rangeDays,
  recordsInRange,
  sumBy,
  usageGroupKey,
  usageValue,
} from "./time-series";

export type DateSpan = { from: string; to: string };

export type PeriodChange = {
  ratio: number;
  direction: "up" | "down";
};

export type CostSummary = {
  filter: string | null;
  total: number;
  averagePerDay: number;
  change: PeriodChange | null;
  span: DateSpan | null;
};

export type UsageSummary = {
  filter: string | null;
  totalTokens: number;
  averageTokensPerDay: number;
  inputTokens: number;
  outputTokens: number;
  totalRequests: number | null;
  averageRequestsPerDay: number | null;
  cacheHitRate: number | null;
  change: PeriodChange | null;
  span: DateSpan | null;
};

export type ProviderSummary = {
  range: RangeId;
  cost: CostSummary;
  usage: UsageSummary;
  span: DateSpan | null;
};

type SummaryInput = {
  costRecords: readonly CostRecord[];
  usageRecords: readonly UsageRecord[];
  range: RangeId;
  metric: Metric;
  groupBy: GroupBy;
  filter: string | null;
};

const spanOf = (records: readonly { date: string }[]): DateSpan | null => {
  if (records.length === 0) {
    return null;
  }
  const dates = records.map((record) => record.date).sort();
  const from = dates[0];
  const to = dates[dates.length - 1];
  return from && to ? { from, to } : null;
};

/**
 * Change of the current window against the window right before it, as a
 * ratio. Null when the previous window sums to zero.
 */
export const comparePeriods = <T extends { date: string }>(
  records: readonly T[],
  range: RangeId,
  selector: CategorySelector<T>,
  value: (record: T) => number,
  filter: string | null,
): PeriodChange | null => {
  const latest = latestDate(records);
  if (latest == null) {
    return null;
  }
  const cutoff = rangeCutoff(latest, range);
  const previousCutoff = shiftUtcDay(cutoff, -rangeDays(range));
  const filtered = filterByCategory(records, selector, filter);
  const current = sumBy(
    filtered.filter((record) => record.date >= cutoff),
    value,
  );
  const previous = sumBy(
    filtered.filter((record) => record.date >= previousCutoff && record.date < cutoff),
    value,
  );
  if (previous === 0) {
    return null;
  }
  const ratio = (current - previous) / previous;
  return { ratio, direction: ratio >= 0 ? "up" : "down" };
};

export const cacheHitRate = (records: readonly UsageRecord[]) => {
  let cacheRead = 0;
  let uncached = 0;
  records.forEach((record) => {
    if (record.cacheReadTokens == null || record.uncachedTokens == null) {
      return;
    }
    cacheRead += record.cacheReadTokens;
    uncached += record.uncachedTokens;
  });
  const cacheable = cacheRead + uncached;
  return cacheable === 0 ? null : cacheRead / cacheable;
};

/**
 * Figures for the summary panel. The selected filter narrows only the panel
 * of the active metric; the period change is reported for the 7-day range.
 */
export const summarizeProvider = ({
  costRecords,
  usageRecords,
  range,
  metric,
  groupBy,
  filter,
}: SummaryInput): ProviderSummary => {
  const days = rangeDays(range);
  const withChange = range === "7d";
  const costFilter = metric === "cost" ? filter : null;
  const usageFilter = metric === "usage" ? filter : null;
  const usageSelector = usageGroupKey(groupBy);

  const costInRange = filterByCategory(recordsInRange(costRecords, range), costGroupKey, costFilter);
  const costTotal = sumBy(costInRange, costValue);
  const cost: CostSummary = {
    filter: costFilter,
    total: costTotal,
    averagePerDay: costTotal / days,
    change: withChange
      ? comparePeriods(costRecords, range, costGroupKey, costValue, costFilter)
      : null,
    span: spanOf(costInRange),
  };

  const usageInRange = filterByCategory(
    recordsInRange(usageRecords, range),
    usageSelector,
    usageFilter,
  );
  const inputTokens = sumBy(usageInRange, (record) => record.inputTokens);
  const outputTokens = sumBy(usageInRange, (record) => record.outputTokens);
  const requests = sumBy(usageInRange, (record) => record.requestCount ?? 0);
  const usage: UsageSummary = {
    filter: usageFilter,
    totalTokens: inputTokens + outputTokens,
    averageTokensPerDay: (inputTokens + outputTokens) / days,
    inputTokens,
    outputTokens,
    totalRequests: requests > 0 ? requests : null,
    averageRequestsPerDay: requests > 0 ? requests / days : null,
    cacheHitRate: cacheHitRate(usageInRange),
    change: withChange
      ? comparePeriods(usageRecords, range, usageSelector, usageValue, usageFilter)
      : null,
    span: spanOf(usageInRange),
  };

  return { range, cost, usage, span: cost.span ?? usage.span };
};
