import { describe, expect, it } from "vitest";

import { createInitialNavigation, type NavigationState } from "../domain/navigation/navigation";
import { buildOptionsColumns } from "./options-view";

const nav = (overrides: Partial<NavigationState> = {}): NavigationState => ({
  ...createInitialNavigation({ provider: "openai", metric: "usage", range: "7d" }),
  ...overrides,
});

const build = (navState: NavigationState, filterOptions: string[] = [], filterRows = 4) =>
  buildOptionsColumns({
    nav: navState,
    hasCredentials: (provider) => provider === "openai",
    filterOptions,
    keyNames: new Map([["key_a", "CI"]]),
    filterRows,
  });

describe("buildOptionsColumns", () => {
  it("lists every column with the cursor on the active one", () => {
    const columns = build(nav());

    expect(columns.map((column) => column.title)).toEqual(["Provider", "Metric", "Group By", "Range"]);
    expect(columns[0]?.items).toEqual([
      { label: "OpenAI", selected: true, cursor: true, disabled: false },
      { label: "Anthropic (no key)", selected: false, cursor: false, disabled: false },
    ]);
    expect(columns[1]?.items.map((item) => [item.label, item.selected, item.cursor])).toEqual([
      ["Usage", true, false],
      ["Cost", false, false],
    ]);
    expect(columns[3]?.items.map((item) => item.label)).toEqual(["7 days", "30 days"]);
  });

  it("disables API key grouping under cost", () => {
    const groupBy = build(nav({ metric: "cost" }))[2];

    expect(groupBy?.items.map((item) => [item.label, item.disabled])).toEqual([
      ["Model", false],
      ["API Keys", true],
    ]);
  });

  it("shows the filter list only while group by is expanded", () => {
    expect(build(nav({ activeColumn: "groupBy" }), ["gpt-4"])[2]?.filter).toBeNull();

    const expanded = build(nav({ activeColumn: "groupBy", groupByExpanded: true }), ["gpt-4"])[2];
    expect(expanded?.filter).toEqual({
      items: [
        { label: "All", selected: true, cursor: true, disabled: false },
        { label: "gpt-4", selected: false, cursor: false, disabled: false },
      ],
      firstIndex: 0,
      total: 2,
    });
  });

  it("windows a long filter list around the cursor", () => {
    const filter = build(
      nav({ activeColumn: "groupBy", groupByExpanded: true, filterCursorIndex: 4 }),
      ["a", "b", "c", "d", "e"],
      3,
    )[2]?.filter;

    expect(filter?.firstIndex).toBe(3);
    expect(filter?.total).toBe(6);
    expect(filter?.items.map((item) => item.label)).toEqual(["c", "d", "e"]);
    expect(filter?.items.find((item) => item.cursor)?.label).toBe("d");
  });

  it("shows key names in the filter list when grouping by key", () => {
    const filter = build(
      nav({ activeColumn: "groupBy", groupByExpanded: true, groupBy: "apiKey" }),
      ["key_a"],
    )[2]?.filter;

    expect(filter?.items.map((item) => item.label)).toEqual(["All", "CI"]);
  });
});
