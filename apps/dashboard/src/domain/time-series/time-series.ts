import type { CostRecord, GroupBy, RangeId, UsageRecord } from "@spendtop/shared";
import { shiftUtcDay } from "@spendtop/shared";

export const UNKNOWN_CATEGORY = "unknown";

type Dated = { date: string };

export type CategorySelector<T> = (record: T) => string;

export const rangeDays = (range: RangeId) => {
  switch (range) {
    case "7d":
      return 7;
    case "30d":
      return 30;
  }
};

/**
 * The single normalization for every category key: trimmed, with blank or
 * absent values collapsing to "unknown".
 */
export const groupKey = (value: string | null | undefined) => {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : UNKNOWN_CATEGORY;
};

export const costGroupKey: CategorySelector<CostRecord> = (record) => groupKey(record.category);

export const usageGroupKey =
  (groupBy: GroupBy): CategorySelector<UsageRecord> =>
  (record) => {
    switch (groupBy) {
      case "model":
        return groupKey(record.model);
      case "apiKey":
        return groupKey(record.apiKeyId);
    }
  };

export const latestDate = (records: readonly Dated[]) =>
  records.reduce<string | null>(
    (latest, record) => (latest == null || record.date > latest ? record.date : latest),
    null,
  );

export const rangeCutoff = (latest: string, range: RangeId) =>
  shiftUtcDay(latest, -(rangeDays(range) - 1));

/**
 * Keeps the records inside the window that ends on the newest record's day.
 */
export const recordsInRange = <T extends Dated>(records: readonly T[], range: RangeId): T[] => {
  const latest = latestDate(records);
  if (latest == null) {
    return [];
  }
  const cutoff = rangeCutoff(latest, range);
  return records.filter((record) => record.date >= cutoff);
};

export const filterByCategory = <T>(
  records: readonly T[],
  selector: CategorySelector<T>,
  filter: string | null,
): T[] => (filter == null ? [...records] : records.filter((record) => selector(record) === filter));

export const availableCategories = <T>(records: readonly T[], selector: CategorySelector<T>) =>
  Array.from(new Set(records.map(selector))).sort();

export type GroupedTotals = Map<string, Map<string, number>>;

/**
 * Per-day, per-category sums keyed by `YYYY-MM-DD` in ascending order.
 * A day with records keeps its entry even when every category sums to zero;
 * zero-valued categories are left out.
 */
export const groupTotals = <T extends Dated>(
  records: readonly T[],
  selector: CategorySelector<T>,
  value: (record: T) => number,
): GroupedTotals => {
  const byDate = new Map<string, Map<string, number>>();
  [...records]
    .sort((left, right) => left.date.localeCompare(right.date))
    .forEach((record) => {
      const categories = byDate.get(record.date) ?? new Map<string, number>();
      byDate.set(record.date, categories);
      const category = selector(record);
      categories.set(category, (categories.get(category) ?? 0) + value(record));
    });
  byDate.forEach((categories) => {
    categories.forEach((total, category) => {
      if (total === 0) {
        categories.delete(category);
      }
    });
  });
  return byDate;
};

export const costValue = (record: CostRecord) => record.amount;

export const usageValue = (record: UsageRecord) => record.inputTokens + record.outputTokens;

export const sumBy = <T>(records: readonly T[], value: (record: T) => number) =>
  records.reduce((total, record) => total + value(record), 0);
