/**
 * LLM Client Factory
 *
 * To add a provider: extend LLMProvider and PROVIDER_CONFIGS in ./types.ts,
 * then add a case below.
 */

import { OpenAICompatibleClient } from "./openai-compatible.js";
import { ResilientModelClient, type ResilientClientOptions } from "./resilience/index.js";
import { PROVIDER_CONFIGS, type ILLMClient, type LLMClientOptions } from "./types.js";

export function createLLMClient(options: LLMClientOptions): ILLMClient {
  const { provider, apiKey, baseUrl, model, timeoutMs } = options;
  const config = PROVIDER_CONFIGS[provider];

  switch (provider) {
    case "openai":
      if (!apiKey) throw new Error("OpenAI requires an API key");
      return new OpenAICompatibleClient("openai", apiKey, baseUrl || config.baseUrl, model || config.defaultModel, options.fetch, timeoutMs);

    case "ollama":
      return new OpenAICompatibleClient("ollama", apiKey ?? "", baseUrl || config.baseUrl, model || config.defaultModel, options.fetch, timeoutMs);
  }
}

/** Provider client wrapped with retries; what the agent brain talks to. */
export function createModelClient(options: LLMClientOptions, resilience?: ResilientClientOptions): ResilientModelClient {
  return new ResilientModelClient(createLLMClient(options), resilience);
}
