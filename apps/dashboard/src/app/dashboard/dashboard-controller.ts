import type { Metric, ProviderId, RangeId, ResolvedConfig } from "@spendtop/shared";

import { clampScroll } from "../../domain/chart/chart-layout";
import { createFetchController } from "../../domain/fetch/fetch-controller";
import { createSessionStore, PROVIDER_IDS } from "../../domain/fetch/session-store";
import {
  createInitialNavigation,
  type NavigationCommand,
  type NavigationContext,
  type NavigationEffect,
  type NavigationState,
  reconcileFilter,
  reduceNavigation,
} from "../../domain/navigation/navigation";
import type { ProviderClientFactory } from "../../domain/providers/create-provider-client";
import type { Logger } from "../../logs";
import type { ChartScrollState } from "../../view/chart-view";
import { buildFrame, filterOptionsFor, type Frame } from "../../view/frame-model";

export type Credentials = Partial<Record<ProviderId, string>>;

export type InitialView = {
  provider?: ProviderId;
  metric?: Metric;
  range?: RangeId;
};

type DashboardControllerOptions = {
  config: ResolvedConfig;
  initial: InitialView;
  credentials: Credentials;
  createClient: ProviderClientFactory;
  logger: Logger;
  now?: () => Date;
  onChange?: () => void;
  onQuit?: () => void;
};

/**
 * The preferred provider, unless it has no key and another provider does.
 */
export const resolveInitialProvider = (
  preferred: ProviderId,
  hasCredentials: (provider: ProviderId) => boolean,
): ProviderId => {
  if (hasCredentials(preferred)) {
    return preferred;
  }
  return PROVIDER_IDS.find((provider) => hasCredentials(provider)) ?? preferred;
};

const scrollKey = (provider: ProviderId, metric: Metric) => `${provider}:${metric}`;

export type DashboardController = ReturnType<typeof createDashboardController>;

export const createDashboardController = ({
  config,
  initial,
  credentials,
  createClient,
  logger,
  now,
  onChange = () => {},
  onQuit = () => {},
}: DashboardControllerOptions) => {
  const store = createSessionStore();
  PROVIDER_IDS.forEach((provider) => {
    const key = credentials[provider]?.trim();
    if (key) {
      store.setCredentials(provider, key);
    }
  });

  const context: NavigationContext = {
    hasCredentials: store.hasCredentials,
    fetchedOnce: (provider) => store.get(provider).fetchedOnce,
    filterOptions: (view) => filterOptionsFor(store.get(view.provider), view),
  };

  const provider = resolveInitialProvider(
    initial.provider ?? config.ui.defaultProvider,
    store.hasCredentials,
  );
  let nav: NavigationState = createInitialNavigation({
    provider,
    metric: initial.metric ?? config.ui.defaultMetric,
    range: initial.range ?? config.ui.defaultRange,
  });
  if (!store.hasCredentials(provider)) {
    nav = { ...nav, credentialPrompt: { provider, input: "" } };
  }

  // Last rendered layout per chart; scrolling clamps against it.
  const lastScroll = new Map<string, ChartScrollState>();
  const pending = new Set<Promise<boolean>>();
  let quitRequested = false;

  const fetches = createFetchController({
    store,
    createClient,
    lookbackDays: config.fetch.lookbackDays,
    logger,
    now,
    onCommit: () => {
      nav = reconcileFilter(nav, context);
      onChange();
    },
  });

  const startFetch = (target: ProviderId) => {
    const task = fetches.trigger(target);
    pending.add(task);
    void task.finally(() => {
      pending.delete(task);
    });
  };

  const applyEffect = (effect: NavigationEffect) => {
    switch (effect.type) {
      case "fetch":
        startFetch(effect.provider);
        return;
      case "setCredentials":
        store.setCredentials(effect.provider, effect.key);
        logger.info("credentials entered", { provider: effect.provider });
        return;
      case "scroll": {
        const layout = lastScroll.get(scrollKey(effect.provider, effect.metric));
        if (!layout) {
          return;
        }
        store.setScroll(
          effect.provider,
          effect.metric,
          clampScroll(
            store.getScroll(effect.provider, effect.metric),
            effect.delta,
            layout.totalBars,
            layout.visibleCount,
          ),
        );
        return;
      }
      case "quit":
        quitRequested = true;
        onQuit();
        return;
    }
  };

  const dispatch = (command: NavigationCommand) => {
    const result = reduceNavigation(nav, command, context);
    nav = result.state;
    result.effects.forEach(applyEffect);
    onChange();
  };

  /**
   * Builds the frame for the given terminal size and records the clamped
   * scroll position the layout settled on.
   */
  const frame = (width: number, height: number): Frame => {
    const built = buildFrame({ nav, sessionOf: store.get, config, width, height });
    if (built.kind === "dashboard" && built.chart.kind === "chart") {
      store.setScroll(nav.provider, nav.metric, built.chart.scroll.startIndex);
      lastScroll.set(scrollKey(nav.provider, nav.metric), built.chart.scroll);
    }
    return built;
  };

  const start = () => {
    if (store.hasCredentials(nav.provider)) {
      startFetch(nav.provider);
    }
  };

  const settle = async () => {
    await Promise.allSettled(Array.from(pending));
  };

  return {
    dispatch,
    frame,
    start,
    settle,
    state: () => nav,
    session: store.get,
    isQuitRequested: () => quitRequested,
  };
};
