import type { CostRecord, Metric, ProviderId, UsageRecord } from "@spendtop/shared";

import type { FetchOutcome } from "./fetch-aggregator";

export const PROVIDER_IDS = ["openai", "anthropic"] as const satisfies readonly ProviderId[];

// Scroll starts pinned to the newest bars; layout clamps it on first render.
export const SCROLL_TO_END = Number.MAX_SAFE_INTEGER;

export type ProviderSession = {
  credentials: string | null;
  costRecords: CostRecord[];
  usageRecords: UsageRecord[];
  costError: string | null;
  usageError: string | null;
  inFlight: boolean;
  fetchedOnce: boolean;
  keyNames: Map<string, string>;
  costScroll: number;
  usageScroll: number;
};

const createEmptySession = (): ProviderSession => ({
  credentials: null,
  costRecords: [],
  usageRecords: [],
  costError: null,
  usageError: null,
  inFlight: false,
  fetchedOnce: false,
  keyNames: new Map(),
  costScroll: SCROLL_TO_END,
  usageScroll: SCROLL_TO_END,
});

export type SessionStore = ReturnType<typeof createSessionStore>;

export const createSessionStore = () => {
  const sessions: Record<ProviderId, ProviderSession> = {
    openai: createEmptySession(),
    anthropic: createEmptySession(),
  };

  const get = (provider: ProviderId): Readonly<ProviderSession> => sessions[provider];

  const hasCredentials = (provider: ProviderId) => sessions[provider].credentials != null;

  const setCredentials = (provider: ProviderId, credentials: string) => {
    const session = sessions[provider];
    session.credentials = credentials;
    session.fetchedOnce = false;
  };

  /**
   * Marks a fetch as started. Returns false when the provider has no
   * credentials or a fetch is already running; the caller drops the trigger.
   */
  const beginFetch = (provider: ProviderId) => {
    const session = sessions[provider];
    if (session.credentials == null || session.inFlight) {
      return false;
    }
    session.inFlight = true;
    session.costError = null;
    session.usageError = null;
    return true;
  };

  const commitOutcome = (outcome: FetchOutcome) => {
    const session = sessions[outcome.provider];
    session.costRecords = outcome.costRecords;
    session.usageRecords = outcome.usageRecords;
    session.keyNames = outcome.keyNames;
    session.costError = outcome.costError;
    session.usageError = outcome.usageError;
    session.inFlight = false;
    session.fetchedOnce = true;
  };

  const getScroll = (provider: ProviderId, metric: Metric) =>
    metric === "cost" ? sessions[provider].costScroll : sessions[provider].usageScroll;

  const setScroll = (provider: ProviderId, metric: Metric, value: number) => {
    if (metric === "cost") {
      sessions[provider].costScroll = value;
      return;
    }
    sessions[provider].usageScroll = value;
  };

  return { get, hasCredentials, setCredentials, beginFetch, commitOutcome, getScroll, setScroll };
};
