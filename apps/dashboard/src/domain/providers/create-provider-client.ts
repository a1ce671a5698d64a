import type { ProviderId, ResolvedConfig } from "@spendtop/shared";

import { createAnthropicClient } from "./anthropic-client";
import { createOpenAiClient } from "./openai-client";
import type { ProviderClient } from "./provider-client";

export type ProviderClientFactory = (provider: ProviderId, apiKey: string) => ProviderClient;

export const createProviderClientFactory =
  (config: ResolvedConfig, fetchImpl?: typeof fetch): ProviderClientFactory =>
  (provider, apiKey) => {
    switch (provider) {
      case "openai":
        return createOpenAiClient({
          apiKey,
          baseUrl: config.providers.openai.baseUrl,
          timeoutMs: config.fetch.timeoutMs,
          maxPages: config.fetch.maxPages,
          costPageLimit: config.fetch.costPageLimit,
          fetchImpl,
        });
      case "anthropic":
        return createAnthropicClient({
          apiKey,
          baseUrl: config.providers.anthropic.baseUrl,
          version: config.providers.anthropic.version,
          timeoutMs: config.fetch.timeoutMs,
          maxPages: config.fetch.maxPages,
          fetchImpl,
        });
    }
  };
