import { describe, expect, it } from "vitest";

import {
  createInitialNavigation,
  type NavigationContext,
  type NavigationState,
  reconcileFilter,
  reduceNavigation,
} from "./navigation";

const createContext = (overrides: Partial<NavigationContext> = {}): NavigationContext => ({
  hasCredentials: () => true,
  fetchedOnce: () => false,
  filterOptions: () => ["gpt-4", "gpt-4o"],
  ...overrides,
});

const initial = (overrides: Partial<NavigationState> = {}): NavigationState => ({
  ...createInitialNavigation({ provider: "openai", metric: "usage", range: "7d" }),
  ...overrides,
});

describe("reduceNavigation", () => {
  it("cycles columns and collapses the filter list when leaving group by", () => {
    const context = createContext();

    expect(reduceNavigation(initial(), { type: "moveColumn", delta: 1 }, context).state.activeColumn).toBe(
      "metric",
    );
    expect(reduceNavigation(initial(), { type: "moveColumn", delta: -1 }, context).state.activeColumn).toBe(
      "range",
    );
    const leaving = reduceNavigation(
      initial({ activeColumn: "groupBy", groupByExpanded: true }),
      { type: "moveColumn", delta: 1 },
      context,
    );
    expect(leaving.state.groupByExpanded).toBe(false);
  });

  it("switches provider, clears the filter and fetches on first visit", () => {
    const result = reduceNavigation(
      initial({ selectedFilter: "gpt-4", filterCursorIndex: 1 }),
      { type: "moveCursor", delta: 1 },
      createContext(),
    );

    expect(result.state.provider).toBe("anthropic");
    expect(result.state.selectedFilter).toBeNull();
    expect(result.state.filterCursorIndex).toBe(0);
    expect(result.effects).toEqual([{ type: "fetch", provider: "anthropic" }]);
  });

  it("does not refetch a provider that already loaded", () => {
    const result = reduceNavigation(
      initial(),
      { type: "moveCursor", delta: 1 },
      createContext({ fetchedOnce: () => true }),
    );

    expect(result.effects).toEqual([]);
  });

  it("opens the key prompt for a provider without credentials", () => {
    const result = reduceNavigation(
      initial(),
      { type: "moveCursor", delta: -1 },
      createContext({ hasCredentials: (provider) => provider === "openai" }),
    );

    expect(result.state.provider).toBe("anthropic");
    expect(result.state.credentialPrompt).toEqual({ provider: "anthropic", input: "" });
    expect(result.effects).toEqual([]);
  });

  it("forces model grouping when switching to cost", () => {
    const result = reduceNavigation(
      initial({ activeColumn: "metric", groupBy: "apiKey", selectedFilter: "key_a" }),
      { type: "moveCursor", delta: 1 },
      createContext(),
    );

    expect(result.state.metric).toBe("cost");
    expect(result.state.groupBy).toBe("model");
    expect(result.state.selectedFilter).toBeNull();
  });

  it("keeps model grouping under cost", () => {
    const state = initial({ activeColumn: "groupBy", metric: "cost" });

    expect(reduceNavigation(state, { type: "moveCursor", delta: 1 }, createContext()).state).toBe(
      state,
    );
  });

  it("switches grouping under usage", () => {
    const result = reduceNavigation(
      initial({ activeColumn: "groupBy" }),
      { type: "moveCursor", delta: 1 },
      createContext(),
    );

    expect(result.state.groupBy).toBe("apiKey");
  });

  it("moves through the expanded filter list with All first", () => {
    const expanded = initial({ activeColumn: "groupBy", groupByExpanded: true });
    const context = createContext();

    const down = reduceNavigation(expanded, { type: "moveCursor", delta: 1 }, context).state;
    expect(down.filterCursorIndex).toBe(1);
    expect(down.selectedFilter).toBe("gpt-4");

    const wrapped = reduceNavigation(expanded, { type: "moveCursor", delta: -1 }, context).state;
    expect(wrapped.filterCursorIndex).toBe(2);
    expect(wrapped.selectedFilter).toBe("gpt-4o");

    const back = reduceNavigation(down, { type: "moveCursor", delta: -1 }, context).state;
    expect(back.selectedFilter).toBeNull();
  });

  it("drops a filter that the new range does not contain", () => {
    const result = reduceNavigation(
      initial({ activeColumn: "range", selectedFilter: "gpt-3.5", filterCursorIndex: 1 }),
      { type: "moveCursor", delta: 1 },
      createContext({ filterOptions: () => ["gpt-4"] }),
    );

    expect(result.state.range).toBe("30d");
    expect(result.state.selectedFilter).toBeNull();
  });

  it("toggles the filter list only on the group by column", () => {
    const context = createContext();
    const elsewhere = initial();

    expect(reduceNavigation(elsewhere, { type: "toggleGroupByExpansion" }, context).state).toBe(
      elsewhere,
    );
    const opened = reduceNavigation(
      initial({ activeColumn: "groupBy", selectedFilter: "gpt-4o" }),
      { type: "toggleGroupByExpansion" },
      context,
    ).state;
    expect(opened.groupByExpanded).toBe(true);
    expect(opened.filterCursorIndex).toBe(2);
  });

  it("submits a trimmed key and triggers a fetch", () => {
    const prompting = initial({ credentialPrompt: { provider: "openai", input: "" } });

    const result = reduceNavigation(
      prompting,
      { type: "submitCredentials", key: "  test-secret " },
      createContext(),
    );

    expect(result.state.credentialPrompt).toBeNull();
    expect(result.effects).toEqual([
      { type: "setCredentials", provider: "openai", key: "test-secret" },
      { type: "fetch", provider: "openai" },
    ]);
    expect(
      reduceNavigation(prompting, { type: "submitCredentials", key: "   " }, createContext()).effects,
    ).toEqual([]);
  });

  it("edits the prompt input", () => {
    const context = createContext();
    let state = initial({ credentialPrompt: { provider: "openai", input: "ab" } });

    state = reduceNavigation(
      state,
      { type: "editCredentialInput", edit: { kind: "char", char: "c" } },
      context,
    ).state;
    expect(state.credentialPrompt?.input).toBe("abc");

    state = reduceNavigation(
      state,
      { type: "editCredentialInput", edit: { kind: "backspace" } },
      context,
    ).state;
    expect(state.credentialPrompt?.input).toBe("ab");

    state = reduceNavigation(state, { type: "cancelCredentials" }, context).state;
    expect(state.credentialPrompt).toBeNull();
  });

  it("asks for a key instead of refreshing a provider without one", () => {
    const result = reduceNavigation(
      initial(),
      { type: "requestRefresh", provider: "openai" },
      createContext({ hasCredentials: () => false }),
    );

    expect(result.state.credentialPrompt).toEqual({ provider: "openai", input: "" });
    expect(result.effects).toEqual([]);
  });

  it("emits scroll, refresh and quit effects", () => {
    const context = createContext();

    expect(reduceNavigation(initial(), { type: "scroll", delta: -1 }, context).effects).toEqual([
      { type: "scroll", provider: "openai", metric: "usage", delta: -1 },
    ]);
    expect(
      reduceNavigation(initial(), { type: "requestRefresh", provider: "openai" }, context).effects,
    ).toEqual([{ type: "fetch", provider: "openai" }]);
    expect(reduceNavigation(initial(), { type: "requestQuit" }, context).effects).toEqual([
      { type: "quit" },
    ]);
  });

  it("flips the segment value toggle", () => {
    const result = reduceNavigation(initial(), { type: "toggleSegmentValues" }, createContext());

    expect(result.state.showSegmentValues).toBe(true);
  });
});

describe("reconcileFilter", () => {
  it("keeps a filter that is still available", () => {
    const state = initial({ selectedFilter: "gpt-4o", filterCursorIndex: 0 });

    expect(reconcileFilter(state, createContext())).toMatchObject({
      selectedFilter: "gpt-4o",
      filterCursorIndex: 2,
    });
  });

  it("returns the same state when nothing changes", () => {
    const state = initial();

    expect(reconcileFilter(state, createContext())).toBe(state);
  });
});
