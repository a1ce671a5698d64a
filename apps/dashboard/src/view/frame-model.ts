import type { ProviderId, ResolvedConfig } from "@spendtop/shared";

import { assignColors } from "../domain/chart/color-assigner";
import type { ProviderSession } from "../domain/fetch/session-store";
import type { FilterView, NavigationState } from "../domain/navigation/navigation";
import { summarizeProvider } from "../domain/time-series/summary";
import {
  availableCategories,
  costGroupKey,
  recordsInRange,
  usageGroupKey,
} from "../domain/time-series/time-series";
import { buildChartPanel, type ChartPanel } from "./chart-view";
import { PROVIDER_LABELS } from "./format";
import { buildOptionsColumns, type OptionsColumnView } from "./options-view";
import { type Palette, paletteFor } from "./palette";
import { buildSummaryView, type SummaryView } from "./summary-view";

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export const MIN_TERMINAL_WIDTH = 60;
export const MIN_TERMINAL_HEIGHT = 20;

const HEADER_HEIGHT = 1;
const FOOTER_HEIGHT = 1;
const TOP_BAND_HEIGHT = 12;
// Title, two entries and a spacer sit above the filter list.
const OPTIONS_FIXED_ROWS = 4;
const BOX_BORDER = 2;

const DEFAULT_HINTS = "←/→ column  ↑/↓ select  enter expand  h/l scroll  d values  r refresh  q quit";
const PROMPT_HINTS = "enter submit  esc cancel";

export type PromptView = {
  title: string;
  maskedInput: string;
};

export type DashboardFrame = {
  kind: "dashboard";
  width: number;
  height: number;
  palette: Palette;
  header: { title: string; status: string };
  regions: {
    header: Rect;
    options: Rect;
    summary: Rect;
    chart: Rect;
    footer: Rect;
  };
  options: OptionsColumnView[];
  summary: SummaryView | string;
  chart: ChartPanel;
  footer: string;
  prompt: PromptView | null;
};

export type Frame =
  | DashboardFrame
  | {
      kind: "tooSmall";
      width: number;
      height: number;
      message: string;
    };

export type FrameInput = {
  nav: NavigationState;
  sessionOf: (provider: ProviderId) => Readonly<ProviderSession>;
  config: Pick<ResolvedConfig, "chart">;
  width: number;
  height: number;
};

/**
 * Categories the group-by filter can pick from: the ones present in the
 * selected range of the active metric.
 */
export const filterOptionsFor = (session: Readonly<ProviderSession>, view: FilterView) =>
  view.metric === "cost"
    ? availableCategories(recordsInRange(session.costRecords, view.range), costGroupKey)
    : availableCategories(recordsInRange(session.usageRecords, view.range), usageGroupKey(view.groupBy));

export const maskCredential = (input: string) => {
  const chars = Array.from(input);
  if (chars.length <= 4) {
    return "*".repeat(chars.length);
  }
  return `${"*".repeat(chars.length - 4)}${chars.slice(-4).join("")}`;
};

const layoutRegions = (width: number, height: number): DashboardFrame["regions"] => {
  const optionsWidth = Math.floor(width * 0.6);
  const bandY = HEADER_HEIGHT;
  const chartY = bandY + TOP_BAND_HEIGHT;
  return {
    header: { x: 0, y: 0, width, height: HEADER_HEIGHT },
    options: { x: 0, y: bandY, width: optionsWidth, height: TOP_BAND_HEIGHT },
    summary: { x: optionsWidth, y: bandY, width: width - optionsWidth, height: TOP_BAND_HEIGHT },
    chart: { x: 0, y: chartY, width, height: height - chartY - FOOTER_HEIGHT },
    footer: { x: 0, y: height - FOOTER_HEIGHT, width, height: FOOTER_HEIGHT },
  };
};

const chartColors = (session: Readonly<ProviderSession>, nav: NavigationState, palette: Palette) =>
  assignColors(
    [
      ...session.costRecords.map(costGroupKey),
      ...session.usageRecords.map(usageGroupKey(nav.groupBy)),
    ],
    palette.chartColors,
  );

const summaryFor = (session: Readonly<ProviderSession>, nav: NavigationState): SummaryView | string => {
  if (session.costRecords.length === 0 && session.usageRecords.length === 0) {
    if (session.credentials == null) {
      return "No API key configured";
    }
    return session.inFlight ? "Loading..." : "No data yet";
  }
  return buildSummaryView(
    summarizeProvider({
      costRecords: session.costRecords,
      usageRecords: session.usageRecords,
      range: nav.range,
      metric: nav.metric,
      groupBy: nav.groupBy,
      filter: nav.selectedFilter,
    }),
    session.keyNames,
    nav.metric === "usage" && nav.groupBy === "apiKey",
  );
};

/**
 * Everything one redraw needs, derived from the navigation state and the
 * provider sessions for a `width` x `height` terminal.
 */
export const buildFrame = ({ nav, sessionOf, config, width, height }: FrameInput): Frame => {
  if (width < MIN_TERMINAL_WIDTH || height < MIN_TERMINAL_HEIGHT) {
    return {
      kind: "tooSmall",
      width,
      height,
      message: `Terminal too small: ${width}x${height}, needs ${MIN_TERMINAL_WIDTH}x${MIN_TERMINAL_HEIGHT}`,
    };
  }

  const session = sessionOf(nav.provider);
  const palette = paletteFor(nav.provider);
  const regions = layoutRegions(width, height);

  const chart = buildChartPanel(
    {
      nav,
      session,
      colors: chartColors(session, nav, palette),
      chart: config.chart,
      width: regions.chart.width - BOX_BORDER,
      height: regions.chart.height - BOX_BORDER,
    },
    session.credentials != null,
  );

  const prompt = nav.credentialPrompt
    ? {
        title: `Enter ${PROVIDER_LABELS[nav.credentialPrompt.provider]} admin key`,
        maskedInput: maskCredential(nav.credentialPrompt.input),
      }
    : null;

  return {
    kind: "dashboard",
    width,
    height,
    palette,
    header: {
      title: `spendtop - ${PROVIDER_LABELS[nav.provider]}`,
      status: session.inFlight ? "Refreshing..." : "",
    },
    regions,
    options: buildOptionsColumns({
      nav,
      hasCredentials: (provider) => sessionOf(provider).credentials != null,
      filterOptions: filterOptionsFor(session, nav),
      keyNames: session.keyNames,
      filterRows: regions.options.height - BOX_BORDER - OPTIONS_FIXED_ROWS,
    }),
    summary: summaryFor(session, nav),
    chart,
    footer: prompt ? PROMPT_HINTS : DEFAULT_HINTS,
    prompt,
  };
};
