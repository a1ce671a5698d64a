import type { ProviderId } from "@spendtop/shared";
import { shiftUtcDay, toUtcDay } from "@spendtop/shared";

import type { Logger } from "../../logs";
import type { ProviderClientFactory } from "../providers/create-provider-client";
import { describeError } from "../providers/provider-error";
import { type FetchOutcome, runProviderFetch } from "./fetch-aggregator";
import type { SessionStore } from "./session-store";

type FetchControllerOptions = {
  store: SessionStore;
  createClient: ProviderClientFactory;
  lookbackDays: number;
  logger: Logger;
  now?: () => Date;
  onCommit?: (provider: ProviderId) => void;
};

const failedOutcome = (provider: ProviderId, message: string): FetchOutcome => ({
  provider,
  costRecords: [],
  usageRecords: [],
  keyNames: new Map(),
  costError: message,
  usageError: message,
});

export const createFetchController = ({
  store,
  createClient,
  lookbackDays,
  logger,
  now = () => new Date(),
  onCommit,
}: FetchControllerOptions) => {
  /**
   * Starts a background refresh. Resolves to false when the trigger was
   * dropped because the provider has no key or is already fetching.
   */
  const trigger = async (provider: ProviderId) => {
    if (!store.beginFetch(provider)) {
      logger.debug("fetch trigger dropped", { provider });
      return false;
    }
    const credentials = store.get(provider).credentials ?? "";
    const startDay = shiftUtcDay(toUtcDay(now()), -lookbackDays);
    let outcome: FetchOutcome;
    try {
      outcome = await runProviderFetch(createClient(provider, credentials), { startDay, logger });
    } catch (error) {
      const message = describeError(error);
      logger.error("fetch crashed", { provider, error: message });
      outcome = failedOutcome(provider, message);
    }
    store.commitOutcome(outcome);
    onCommit?.(outcome.provider);
    return true;
  };

  return { trigger };
};
