import type { DateSpan, PeriodChange } from "../domain/time-series/summary";

export const PROVIDER_LABELS = { openai: "OpenAI", anthropic: "Anthropic" } as const;

export const formatTokens = (tokens: number) => {
  if (tokens >= 1_000_000) {
    return `${(tokens / 1_000_000).toFixed(1)}M`;
  }
  if (tokens >= 1000) {
    return `${Math.floor(tokens / 1000)}k`;
  }
  return `${Math.round(tokens)}`;
};

export const formatCost = (amount: number) => `$${amount.toFixed(2)}`;

export const formatWholeCost = (amount: number) => `$${amount.toFixed(0)}`;

// "$42.50" -> "$42.5", "$42.00" -> "$42" for amounts at or above the threshold.
export const formatLegendCost = (amount: number, threshold: number) => {
  const fixed = formatCost(amount);
  if (amount < threshold) {
    return fixed;
  }
  return fixed.replace(/0+$/, "").replace(/\.$/, "");
};

export const abbreviateApiKey = (id: string) => {
  const chars = Array.from(id);
  if (chars.length <= 16) {
    return id;
  }
  return `${chars.slice(0, 8).join("")}...${chars.slice(-4).join("")}`;
};

export const displayKeyName = (id: string, keyNames: ReadonlyMap<string, string>) =>
  keyNames.get(id) ?? abbreviateApiKey(id);

// "2025-01-10" -> "01/10"
export const formatDateLabel = (day: string) => `${day.slice(5, 7)}/${day.slice(8, 10)}`;

export const compactDateLabel = (label: string, width: number) => {
  if (width >= label.length) {
    return label;
  }
  const dayPart = label.split("/")[1] ?? label;
  if (width >= dayPart.length) {
    return dayPart;
  }
  return dayPart.slice(0, Math.max(0, width));
};

export const formatPercent = (ratio: number) => `${(ratio * 100).toFixed(1)}%`;

export const formatChange = (change: PeriodChange) =>
  `${change.direction === "up" ? "↑" : "↓"} ${formatPercent(Math.abs(change.ratio))}`;

export const formatSpan = (span: DateSpan | null) =>
  span ? `${formatDateLabel(span.from)} - ${formatDateLabel(span.to)}` : "No data in selected range";
