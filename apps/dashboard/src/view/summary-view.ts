import type { ProviderSummary, PeriodChange } from "../domain/time-series/summary";
import {
  displayKeyName,
  formatChange,
  formatCost,
  formatPercent,
  formatSpan,
  formatTokens,
} from "./format";

export type SummaryTone = "normal" | "up" | "down";

export type SummaryLine = {
  label: string;
  value: string;
  tone: SummaryTone;
};

export type SummarySection = {
  title: string;
  lines: SummaryLine[];
};

export type SummaryView = {
  span: string;
  sections: SummarySection[];
};

const line = (label: string, value: string): SummaryLine => ({ label, value, tone: "normal" });

const changeLine = (change: PeriodChange | null): SummaryLine =>
  change
    ? { label: "vs prev", value: formatChange(change), tone: change.direction }
    : line("vs prev", "n/a");

const sectionTitle = (title: string, filter: string | null) =>
  filter == null ? title : `${title} [${filter}]`;

export const buildSummaryView = (
  summary: ProviderSummary,
  keyNames: ReadonlyMap<string, string>,
  usageFilterIsKey: boolean,
): SummaryView => {
  const { cost, usage } = summary;
  const usageFilter =
    usage.filter != null && usageFilterIsKey ? displayKeyName(usage.filter, keyNames) : usage.filter;

  const usageLines = [
    line("Tokens", formatTokens(usage.totalTokens)),
    line("Avg/day", formatTokens(usage.averageTokensPerDay)),
    line("In/Out", `${formatTokens(usage.inputTokens)} / ${formatTokens(usage.outputTokens)}`),
  ];
  if (usage.totalRequests != null && usage.averageRequestsPerDay != null) {
    usageLines.push(
      line("Requests", `${usage.totalRequests} (${Math.round(usage.averageRequestsPerDay)}/day)`),
    );
  }
  if (usage.cacheHitRate != null) {
    usageLines.push(line("Cache hit", formatPercent(usage.cacheHitRate)));
  }
  usageLines.push(changeLine(usage.change));

  return {
    span: formatSpan(summary.span),
    sections: [
      {
        title: sectionTitle("Cost", cost.filter),
        lines: [
          line("Total", formatCost(cost.total)),
          line("Avg/day", formatCost(cost.averagePerDay)),
          changeLine(cost.change),
        ],
      },
      { title: sectionTitle("Usage", usageFilter), lines: usageLines },
    ],
  };
};
