/**
 * LLM Module: Barrel Export
 *
 * Structure:
 *   types.ts: message, tool-call and client shapes
 *   openai-compatible.ts: chat completions client (OpenAI, Ollama)
 *   parse.ts: raw response → ModelTurn
 *   factory.ts: client creation
 *   resilience/: retry detection, backoff, resilient wrapper
 */

export type {
  LLMProvider,
  LLMMessage,
  LLMToolCall,
  LLMToolDefinition,
  LLMRequestOptions,
  LLMResponse,
  LLMProviderConfig,
  LLMClientOptions,
  ILLMClient,
  ModelTurn,
  ProposedToolCall,
} from "./types.js";
export { LLM_PROVIDERS, PROVIDER_CONFIGS, isLLMProvider } from "./types.js";
export { OpenAICompatibleClient } from "./openai-compatible.js";
export { parseModelTurn } from "./parse.js";
export { createLLMClient, createModelClient } from "./factory.js";
export { ResilientModelClient, isRetryableError, computeBackoffMs, type ResilientClientOptions } from "./resilience/index.js";
