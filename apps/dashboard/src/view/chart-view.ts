import type { ChartConfig, CostRecord, Metric, UsageRecord } from "@spendtop/shared";

import {
  type ChartLayout,
  computeChartLayout,
  type ScrollbarGeometry,
  scrollbarGeometry,
  smartScale,
  stackSegments,
} from "../domain/chart/chart-layout";
import type { ProviderSession } from "../domain/fetch/session-store";
import type { NavigationState } from "../domain/navigation/navigation";
import {
  type CategorySelector,
  costGroupKey,
  costValue,
  filterByCategory,
  groupTotals,
  recordsInRange,
  usageGroupKey,
  usageValue,
} from "../domain/time-series/time-series";
import {
  compactDateLabel,
  displayKeyName,
  formatDateLabel,
  formatLegendCost,
  formatTokens,
  formatWholeCost,
  PROVIDER_LABELS,
} from "./format";
import type { TerminalColor } from "./palette";

// Rows of the chart area that are not bar body: value label, date label, scrollbar.
const CHART_CHROME_ROWS = 3;
const MIN_PLOT_WIDTH = 20;

export type BarSegmentView = {
  category: string;
  color: TerminalColor;
  height: number;
  valueLabel: string | null;
};

export type BarView = {
  x: number;
  width: number;
  dateLabel: string;
  segments: BarSegmentView[];
  totalLabel: string | null;
  capped: boolean;
};

export type LegendEntry = {
  label: string;
  color: TerminalColor;
  detail: string;
};

export type ChartScrollState = {
  totalBars: number;
  visibleCount: number;
  startIndex: number;
};

export type ChartPanel =
  | {
      kind: "message";
      title: string;
      message: string;
      tone: "normal" | "error";
    }
  | {
      kind: "chart";
      title: string;
      plotWidth: number;
      barAreaHeight: number;
      bars: BarView[];
      legendTitle: string;
      legend: LegendEntry[];
      legendWidth: number;
      scrollbar: ScrollbarGeometry | null;
      layout: ChartLayout;
      scroll: ChartScrollState;
    };

type ChartPanelInput = {
  nav: NavigationState;
  session: Readonly<ProviderSession>;
  colors: ReadonlyMap<string, TerminalColor>;
  chart: ChartConfig;
  width: number;
  height: number;
};

type SeriesSpec<T extends { date: string }> = {
  records: readonly T[];
  selector: CategorySelector<T>;
  value: (record: T) => number;
  formatValue: (value: number) => string;
  legend: (categories: string[], filtered: readonly T[]) => LegendEntry[];
};

const metricLabel = (metric: Metric) => (metric === "cost" ? "Cost" : "Usage");

const chartTitle = (nav: NavigationState, keyNames: ReadonlyMap<string, string>) => {
  const provider = PROVIDER_LABELS[nav.provider];
  const filterLabel =
    nav.selectedFilter == null
      ? ""
      : ` - ${nav.metric === "usage" && nav.groupBy === "apiKey" ? displayKeyName(nav.selectedFilter, keyNames) : nav.selectedFilter}`;
  if (nav.metric === "cost") {
    return `${provider} - Daily Cost by Model${filterLabel}`;
  }
  const grouping = nav.groupBy === "model" ? "Model" : "API Key";
  return `${provider} - Daily Token Usage by ${grouping}${filterLabel}`;
};

const colorOf = (colors: ReadonlyMap<string, TerminalColor>, category: string): TerminalColor =>
  colors.get(category) ?? "white";

const buildSeriesPanel = <T extends { date: string }>(
  spec: SeriesSpec<T>,
  input: ChartPanelInput,
  title: string,
): ChartPanel => {
  const { nav, session, chart } = input;
  const provider = PROVIDER_LABELS[nav.provider];
  const error = nav.metric === "cost" ? session.costError : session.usageError;
  if (error) {
    return {
      kind: "message",
      title,
      message: `Error loading ${provider} ${metricLabel(nav.metric)} data: ${error}`,
      tone: "error",
    };
  }

  const inRange = recordsInRange(spec.records, nav.range);
  if (inRange.length === 0) {
    return {
      kind: "message",
      title,
      message: session.inFlight
        ? `Loading ${provider} ${metricLabel(nav.metric)} data...`
        : `No ${provider} ${metricLabel(nav.metric)} data in the selected window.`,
      tone: "normal",
    };
  }

  const filtered = filterByCategory(inRange, spec.selector, nav.selectedFilter);
  if (filtered.length === 0) {
    return {
      kind: "message",
      title,
      message: `No ${provider} ${metricLabel(nav.metric)} data in the selected window.`,
      tone: "normal",
    };
  }

  const totals = groupTotals(filtered, spec.selector, spec.value);
  const dates = Array.from(totals.keys());
  const categories = Array.from(new Set(filtered.map(spec.selector))).sort();
  const legendWidth = input.width - chart.legendWidth >= MIN_PLOT_WIDTH ? chart.legendWidth : 0;
  const plotWidth = input.width - legendWidth;
  const barAreaHeight = input.height - CHART_CHROME_ROWS;
  const scrollOffset = nav.metric === "cost" ? session.costScroll : session.usageScroll;
  const layout =
    barAreaHeight > 0 ? computeChartLayout(dates.length, plotWidth, scrollOffset, chart) : null;

  if (!layout) {
    return {
      kind: "message",
      title,
      message: `Not enough space to render the ${metricLabel(nav.metric).toLowerCase()} chart`,
      tone: "normal",
    };
  }

  const dayTotals = dates.map((date) =>
    Array.from(totals.get(date)?.values() ?? []).reduce((sum, value) => sum + value, 0),
  );
  const scale = smartScale(dayTotals, chart);
  const visibleDates = dates.slice(layout.startIndex, layout.startIndex + layout.visibleCount);

  const bars: BarView[] = visibleDates.map((date, visibleIndex) => {
    const dayCategories = totals.get(date) ?? new Map<string, number>();
    const total = dayTotals[layout.startIndex + visibleIndex] ?? 0;
    const stacked = stackSegments(
      categories
        .filter((category) => dayCategories.has(category))
        .map((category) => ({ category, value: dayCategories.get(category) ?? 0 })),
      scale.displayMax,
      barAreaHeight,
    );
    return {
      x: layout.offset + visibleIndex * (layout.barWidth + layout.spacing),
      width: layout.barWidth,
      dateLabel: compactDateLabel(formatDateLabel(date), layout.barWidth),
      segments: stacked.segments.map((segment) => {
        const label = spec.formatValue(segment.value);
        return {
          category: segment.category,
          color: colorOf(input.colors, segment.category),
          height: segment.height,
          valueLabel: nav.showSegmentValues && label.length <= layout.barWidth ? label : null,
        };
      }),
      totalLabel: total > 0 ? spec.formatValue(total) : null,
      capped: stacked.capped,
    };
  });

  return {
    kind: "chart",
    title,
    plotWidth,
    barAreaHeight,
    bars,
    legendTitle: "",
    legend: legendWidth > 0 ? spec.legend(categories, filtered) : [],
    legendWidth,
    scrollbar: scrollbarGeometry(dates.length, layout.visibleCount, layout.startIndex, plotWidth),
    layout,
    scroll: {
      totalBars: dates.length,
      visibleCount: layout.visibleCount,
      startIndex: layout.startIndex,
    },
  };
};

const sumCategories = <T>(
  records: readonly T[],
  selector: CategorySelector<T>,
  value: (record: T) => number,
) => {
  const sums = new Map<string, number>();
  records.forEach((record) => {
    const category = selector(record);
    sums.set(category, (sums.get(category) ?? 0) + value(record));
  });
  return sums;
};

const costSpec = (
  records: readonly CostRecord[],
  colors: ReadonlyMap<string, TerminalColor>,
  threshold: number,
): SeriesSpec<CostRecord> => ({
  records,
  selector: costGroupKey,
  value: costValue,
  formatValue: formatWholeCost,
  legend: (categories, filtered) => {
    const sums = sumCategories(filtered, costGroupKey, costValue);
    const significant = categories.filter((category) => (sums.get(category) ?? 0) >= threshold);
    return (significant.length > 0 ? significant : categories).map((category) => ({
      label: category,
      color: colorOf(colors, category),
      detail: `Cost: ${formatLegendCost(sums.get(category) ?? 0, threshold)}`,
    }));
  },
});

const usageSpec = (
  records: readonly UsageRecord[],
  nav: NavigationState,
  colors: ReadonlyMap<string, TerminalColor>,
  keyNames: ReadonlyMap<string, string>,
): SeriesSpec<UsageRecord> => {
  const selector = usageGroupKey(nav.groupBy);
  return {
    records,
    selector,
    value: usageValue,
    formatValue: formatTokens,
    legend: (categories, filtered) => {
      const input = sumCategories(filtered, selector, (record) => record.inputTokens);
      const output = sumCategories(filtered, selector, (record) => record.outputTokens);
      return categories.map((category) => ({
        label: nav.groupBy === "apiKey" ? displayKeyName(category, keyNames) : category,
        color: colorOf(colors, category),
        detail: `In: ${formatTokens(input.get(category) ?? 0)} Out: ${formatTokens(output.get(category) ?? 0)}`,
      }));
    },
  };
};

/**
 * The chart panel of the active metric: a status message, or bars, legend
 * and scrollbar laid out inside a `width` x `height` area.
 */
export const buildChartPanel = (input: ChartPanelInput, hasCredentials: boolean): ChartPanel => {
  const { nav, session, colors, chart } = input;
  const title = chartTitle(nav, session.keyNames);
  if (!hasCredentials) {
    return {
      kind: "message",
      title,
      message: `No admin key for ${PROVIDER_LABELS[nav.provider]}: press Enter or r to add one`,
      tone: "normal",
    };
  }
  if (nav.metric === "cost") {
    const panel = buildSeriesPanel(
      costSpec(session.costRecords, colors, chart.legendCostThreshold),
      input,
      title,
    );
    const threshold = formatLegendCost(chart.legendCostThreshold, chart.legendCostThreshold);
    return panel.kind === "chart" ? { ...panel, legendTitle: `Models (>${threshold})` } : panel;
  }
  const panel = buildSeriesPanel(
    usageSpec(session.usageRecords, nav, colors, session.keyNames),
    input,
    title,
  );
  return panel.kind === "chart"
    ? { ...panel, legendTitle: nav.groupBy === "model" ? "Models" : "API Keys" }
    : panel;
};
