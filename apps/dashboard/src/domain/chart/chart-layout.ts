import type { ChartConfig } from "@spendtop/shared";
import { configDefaults } from "@spendtop/shared";

export type ChartLayout = {
  startIndex: number;
  visibleCount: number;
  barWidth: number;
  spacing: number;
  offset: number;
};

export type BarGeometry = Pick<ChartConfig, "minBarWidth" | "maxBarWidth" | "barSpacing">;

export type ScaleOptions = Pick<ChartConfig, "outlierRatio" | "compressedScaleMultiplier">;

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

export const maxScrollOffset = (totalBars: number, visibleCount: number) =>
  Math.max(0, totalBars - visibleCount);

/**
 * Packs as many bars as fit into `availableWidth`, starting from all of them
 * and dropping one at a time. Null when nothing fits.
 */
export const computeChartLayout = (
  totalBars: number,
  availableWidth: number,
  scrollOffset: number,
  geometry: BarGeometry = configDefaults.chart,
): ChartLayout | null => {
  if (totalBars <= 0 || availableWidth <= 0) {
    return null;
  }
  const spacing = geometry.barSpacing;
  let visible = Math.min(totalBars, availableWidth);

  while (visible > 0) {
    const required = spacing * (visible - 1);
    if (availableWidth <= required) {
      visible -= 1;
      continue;
    }
    const barWidth = clamp(
      Math.floor((availableWidth - required) / visible),
      geometry.minBarWidth,
      geometry.maxBarWidth,
    );
    const used = visible * barWidth + required;
    if (used <= availableWidth) {
      return {
        startIndex: clamp(scrollOffset, 0, maxScrollOffset(totalBars, visible)),
        visibleCount: visible,
        barWidth,
        spacing,
        offset: Math.floor((availableWidth - used) / 2),
      };
    }
    visible -= 1;
  }
  return null;
};

export const clampScroll = (
  current: number,
  delta: number,
  totalBars: number,
  visibleCount: number,
) => {
  const max = maxScrollOffset(totalBars, visibleCount);
  return clamp(clamp(current, 0, max) + delta, 0, max);
};

export type ChartScale = {
  actualMax: number;
  displayMax: number;
  compressed: boolean;
};

/**
 * Nearest-rank 75th percentile over the positive values.
 */
export const percentile75 = (values: readonly number[]) => {
  const positive = values.filter((value) => value > 0).sort((a, b) => a - b);
  if (positive.length === 0) {
    return 0;
  }
  const rank = Math.ceil(0.75 * positive.length) - 1;
  return positive[Math.max(0, rank)] ?? 0;
};

/**
 * Compresses the scale when one bar dwarfs the rest, so typical days stay
 * readable. Bars above `displayMax` are drawn capped.
 */
export const smartScale = (
  totals: readonly number[],
  options: ScaleOptions = configDefaults.chart,
): ChartScale => {
  const actualMax = totals.reduce((max, total) => Math.max(max, total), 0);
  const p75 = percentile75(totals);
  if (p75 > 0 && actualMax > options.outlierRatio * p75) {
    return { actualMax, displayMax: options.compressedScaleMultiplier * p75, compressed: true };
  }
  return { actualMax, displayMax: actualMax, compressed: false };
};

export type SegmentInput = {
  category: string;
  value: number;
};

export type SegmentHeight = SegmentInput & {
  height: number;
};

export type StackedBar = {
  segments: SegmentHeight[];
  capped: boolean;
  usedHeight: number;
};

/**
 * Heights for one stacked bar, bottom-up in the given order. Each positive
 * value gets at least one row; the stack never exceeds `barAreaHeight`.
 */
export const stackSegments = (
  segments: readonly SegmentInput[],
  displayMax: number,
  barAreaHeight: number,
): StackedBar => {
  const total = segments.reduce((sum, segment) => sum + Math.max(0, segment.value), 0);
  const capped = displayMax > 0 && total > displayMax;
  const scale = capped ? displayMax / total : 1;
  const stacked: SegmentHeight[] = [];
  let usedHeight = 0;

  if (displayMax <= 0 || barAreaHeight <= 0) {
    return { segments: stacked, capped, usedHeight };
  }

  for (const segment of segments) {
    if (segment.value <= 0) {
      continue;
    }
    const remaining = barAreaHeight - usedHeight;
    if (remaining <= 0) {
      break;
    }
    const scaled = segment.value * scale;
    const height = Math.min(Math.max(1, Math.round((scaled / displayMax) * barAreaHeight)), remaining);
    stacked.push({ ...segment, height });
    usedHeight += height;
  }
  return { segments: stacked, capped, usedHeight };
};

export type ScrollbarGeometry = {
  thumbStart: number;
  thumbLength: number;
  trackLength: number;
};

export const scrollbarGeometry = (
  totalBars: number,
  visibleCount: number,
  startIndex: number,
  trackLength: number,
): ScrollbarGeometry | null => {
  if (totalBars <= visibleCount || visibleCount <= 0 || trackLength <= 0) {
    return null;
  }
  const thumbLength = clamp(Math.round((visibleCount / totalBars) * trackLength), 1, trackLength);
  const thumbStart = clamp(
    Math.floor((startIndex / totalBars) * trackLength),
    0,
    trackLength - thumbLength,
  );
  return { thumbStart, thumbLength, trackLength };
};
