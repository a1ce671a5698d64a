import type { GroupBy, Metric, OptionsColumn, ProviderId, RangeId } from "@spendtop/shared";

export const OPTIONS_COLUMNS = ["provider", "metric", "groupBy", "range"] as const satisfies readonly OptionsColumn[];
export const PROVIDER_ORDER = ["openai", "anthropic"] as const satisfies readonly ProviderId[];
export const METRIC_ORDER = ["usage", "cost"] as const satisfies readonly Metric[];
export const GROUP_BY_ORDER = ["model", "apiKey"] as const satisfies readonly GroupBy[];
export const RANGE_ORDER = ["7d", "30d"] as const satisfies readonly RangeId[];

export type CredentialPrompt = {
  provider: ProviderId;
  input: string;
};

export type NavigationState = {
  provider: ProviderId;
  metric: Metric;
  groupBy: GroupBy;
  range: RangeId;
  selectedFilter: string | null;
  filterCursorIndex: number;
  activeColumn: OptionsColumn;
  groupByExpanded: boolean;
  credentialPrompt: CredentialPrompt | null;
  showSegmentValues: boolean;
};

export type FilterView = Pick<NavigationState, "provider" | "metric" | "groupBy" | "range">;

export type Step = 1 | -1;

export type CredentialEdit = { kind: "char"; char: string } | { kind: "backspace" };

export type NavigationCommand =
  | { type: "moveColumn"; delta: Step }
  | { type: "moveCursor"; delta: Step }
  | { type: "toggleGroupByExpansion" }
  | { type: "scroll"; delta: Step }
  | { type: "submitCredentials"; key: string }
  | { type: "cancelCredentials" }
  | { type: "editCredentialInput"; edit: CredentialEdit }
  | { type: "toggleSegmentValues" }
  | { type: "requestRefresh"; provider: ProviderId }
  | { type: "requestQuit" };

export type NavigationEffect =
  | { type: "fetch"; provider: ProviderId }
  | { type: "setCredentials"; provider: ProviderId; key: string }
  | { type: "scroll"; provider: ProviderId; metric: Metric; delta: Step }
  | { type: "quit" };

export type NavigationContext = {
  hasCredentials: (provider: ProviderId) => boolean;
  fetchedOnce: (provider: ProviderId) => boolean;
  filterOptions: (view: FilterView) => readonly string[];
};

export type NavigationResult = {
  state: NavigationState;
  effects: NavigationEffect[];
};

type InitialNavigation = {
  provider: ProviderId;
  metric: Metric;
  range: RangeId;
};

export const createInitialNavigation = ({
  provider,
  metric,
  range,
}: InitialNavigation): NavigationState => ({
  provider,
  metric,
  groupBy: "model",
  range,
  selectedFilter: null,
  filterCursorIndex: 0,
  activeColumn: "provider",
  groupByExpanded: false,
  credentialPrompt: null,
  showSegmentValues: false,
});

const cycle = <T>(values: readonly T[], current: T, delta: number): T => {
  const index = Math.max(0, values.indexOf(current));
  const next = (((index + delta) % values.length) + values.length) % values.length;
  return values[next] ?? current;
};

const clearFilter = (state: NavigationState): NavigationState => ({
  ...state,
  selectedFilter: null,
  filterCursorIndex: 0,
});

/**
 * Drops a filter that no longer names a category of the current view and
 * re-points the filter cursor at the selected entry ("All" is index 0).
 */
export const reconcileFilter = (
  state: NavigationState,
  context: Pick<NavigationContext, "filterOptions">,
): NavigationState => {
  if (state.selectedFilter == null) {
    return state.filterCursorIndex === 0 ? state : { ...state, filterCursorIndex: 0 };
  }
  const index = context.filterOptions(state).indexOf(state.selectedFilter);
  if (index < 0) {
    return clearFilter(state);
  }
  return state.filterCursorIndex === index + 1 ? state : { ...state, filterCursorIndex: index + 1 };
};

const selectProvider = (
  state: NavigationState,
  provider: ProviderId,
  context: NavigationContext,
): NavigationResult => {
  if (provider === state.provider) {
    return { state, effects: [] };
  }
  const next = clearFilter({ ...state, provider });
  if (!context.hasCredentials(provider)) {
    return { state: { ...next, credentialPrompt: { provider, input: "" } }, effects: [] };
  }
  return {
    state: { ...next, credentialPrompt: null },
    effects: context.fetchedOnce(provider) ? [] : [{ type: "fetch", provider }],
  };
};

const moveCursor = (
  state: NavigationState,
  delta: Step,
  context: NavigationContext,
): NavigationResult => {
  switch (state.activeColumn) {
    case "provider":
      return selectProvider(state, cycle(PROVIDER_ORDER, state.provider, delta), context);
    case "metric": {
      const metric = cycle(METRIC_ORDER, state.metric, delta);
      if (metric === state.metric) {
        return { state, effects: [] };
      }
      const groupBy = metric === "cost" ? "model" : state.groupBy;
      return { state: clearFilter({ ...state, metric, groupBy }), effects: [] };
    }
    case "groupBy": {
      if (state.groupByExpanded) {
        const options = context.filterOptions(state);
        const cursor = cycle(
          Array.from({ length: options.length + 1 }, (_, index) => index),
          state.filterCursorIndex,
          delta,
        );
        return {
          state: {
            ...state,
            filterCursorIndex: cursor,
            selectedFilter: cursor === 0 ? null : (options[cursor - 1] ?? null),
          },
          effects: [],
        };
      }
      if (state.metric !== "usage") {
        return { state, effects: [] };
      }
      const groupBy = cycle(GROUP_BY_ORDER, state.groupBy, delta);
      return { state: clearFilter({ ...state, groupBy }), effects: [] };
    }
    case "range": {
      const range = cycle(RANGE_ORDER, state.range, delta);
      return { state: reconcileFilter({ ...state, range }, context), effects: [] };
    }
  }
};

const editInput = (input: string, edit: CredentialEdit) => {
  switch (edit.kind) {
    case "char":
      return input + edit.char;
    case "backspace":
      return input.slice(0, -1);
  }
};

export const reduceNavigation = (
  state: NavigationState,
  command: NavigationCommand,
  context: NavigationContext,
): NavigationResult => {
  switch (command.type) {
    case "moveColumn": {
      const activeColumn = cycle(OPTIONS_COLUMNS, state.activeColumn, command.delta);
      return {
        state: {
          ...state,
          activeColumn,
          groupByExpanded: activeColumn === "groupBy" ? state.groupByExpanded : false,
        },
        effects: [],
      };
    }
    case "moveCursor":
      return moveCursor(state, command.delta, context);
    case "toggleGroupByExpansion":
      if (state.activeColumn !== "groupBy") {
        return { state, effects: [] };
      }
      return {
        state: reconcileFilter({ ...state, groupByExpanded: !state.groupByExpanded }, context),
        effects: [],
      };
    case "scroll":
      return {
        state,
        effects: [
          { type: "scroll", provider: state.provider, metric: state.metric, delta: command.delta },
        ],
      };
    case "submitCredentials": {
      const prompt = state.credentialPrompt;
      const key = command.key.trim();
      if (!prompt || key.length === 0) {
        return { state, effects: [] };
      }
      return {
        state: { ...state, credentialPrompt: null },
        effects: [
          { type: "setCredentials", provider: prompt.provider, key },
          { type: "fetch", provider: prompt.provider },
        ],
      };
    }
    case "cancelCredentials":
      return { state: { ...state, credentialPrompt: null }, effects: [] };
    case "editCredentialInput": {
      const prompt = state.credentialPrompt;
      if (!prompt) {
        return { state, effects: [] };
      }
      return {
        state: { ...state, credentialPrompt: { ...prompt, input: editInput(prompt.input, command.edit) } },
        effects: [],
      };
    }
    case "toggleSegmentValues":
      return { state: { ...state, showSegmentValues: !state.showSegmentValues }, effects: [] };
    case "requestRefresh":
      if (!context.hasCredentials(command.provider)) {
        return {
          state: { ...state, credentialPrompt: { provider: command.provider, input: "" } },
          effects: [],
        };
      }
      return { state, effects: [{ type: "fetch", provider: command.provider }] };
    case "requestQuit":
      return { state, effects: [{ type: "quit" }] };
  }
};
