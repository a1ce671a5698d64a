import type { OptionsColumn, ProviderId } from "@spendtop/shared";

import {
  GROUP_BY_ORDER,
  METRIC_ORDER,
  type NavigationState,
  OPTIONS_COLUMNS,
  PROVIDER_ORDER,
  RANGE_ORDER,
} from "../domain/navigation/navigation";
import { displayKeyName, PROVIDER_LABELS } from "./format";

export type OptionItem = {
  label: string;
  selected: boolean;
  cursor: boolean;
  disabled: boolean;
};

export type OptionsColumnView = {
  column: OptionsColumn;
  title: string;
  active: boolean;
  items: OptionItem[];
  filter: FilterListView | null;
};

export type FilterListView = {
  items: OptionItem[];
  // Index of the first visible entry when the list is windowed.
  firstIndex: number;
  total: number;
};

const COLUMN_TITLES: Record<OptionsColumn, string> = {
  provider: "Provider",
  metric: "Metric",
  groupBy: "Group By",
  range: "Range",
};

const METRIC_LABELS = { usage: "Usage", cost: "Cost" } as const;
const GROUP_BY_LABELS = { model: "Model", apiKey: "API Keys" } as const;
const RANGE_LABELS = { "7d": "7 days", "30d": "30 days" } as const;

type OptionsInput = {
  nav: NavigationState;
  hasCredentials: (provider: ProviderId) => boolean;
  filterOptions: readonly string[];
  keyNames: ReadonlyMap<string, string>;
  // Rows available for the filter list under the group-by entries.
  filterRows: number;
};

const windowAround = (total: number, cursor: number, rows: number) => {
  if (total <= rows) {
    return 0;
  }
  return Math.min(Math.max(0, cursor - Math.floor(rows / 2)), total - rows);
};

const buildFilterList = (input: OptionsInput): FilterListView => {
  const { nav, filterOptions, keyNames } = input;
  const labels = [
    "All",
    ...filterOptions.map((option) =>
      nav.metric === "usage" && nav.groupBy === "apiKey" ? displayKeyName(option, keyNames) : option,
    ),
  ];
  const rows = Math.max(1, input.filterRows);
  const firstIndex = windowAround(labels.length, nav.filterCursorIndex, rows);
  return {
    items: labels.slice(firstIndex, firstIndex + rows).map((label, offset) => {
      const index = firstIndex + offset;
      return {
        label,
        selected: index === nav.filterCursorIndex,
        cursor: index === nav.filterCursorIndex,
        disabled: false,
      };
    }),
    firstIndex,
    total: labels.length,
  };
};

/**
 * One column per option group. The cursor marks the selected entry of the
 * active column; the group-by column lists its filters while expanded.
 */
export const buildOptionsColumns = (input: OptionsInput): OptionsColumnView[] => {
  const { nav } = input;
  return OPTIONS_COLUMNS.map((column) => {
    const active = nav.activeColumn === column;
    const item = (label: string, selected: boolean, disabled = false): OptionItem => ({
      label,
      selected,
      cursor: active && selected,
      disabled,
    });
    const view = (items: OptionItem[], filter: FilterListView | null = null): OptionsColumnView => ({
      column,
      title: COLUMN_TITLES[column],
      active,
      items,
      filter,
    });

    switch (column) {
      case "provider":
        return view(
          PROVIDER_ORDER.map((provider) =>
            item(
              input.hasCredentials(provider)
                ? PROVIDER_LABELS[provider]
                : `${PROVIDER_LABELS[provider]} (no key)`,
              provider === nav.provider,
            ),
          ),
        );
      case "metric":
        return view(METRIC_ORDER.map((metric) => item(METRIC_LABELS[metric], metric === nav.metric)));
      case "groupBy":
        return view(
          GROUP_BY_ORDER.map((groupBy) =>
            item(
              GROUP_BY_LABELS[groupBy],
              groupBy === nav.groupBy,
              groupBy === "apiKey" && nav.metric === "cost",
            ),
          ),
          active && nav.groupByExpanded ? buildFilterList(input) : null,
        );
      case "range":
        return view(RANGE_ORDER.map((range) => item(RANGE_LABELS[range], range === nav.range)));
    }
  });
};
