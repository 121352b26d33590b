/**
 * LLM Types
 *
 * Provider-agnostic message, tool-call and client shapes. Both supported
 * providers speak the OpenAI chat completions wire format, so these
 * mirror it closely.
 */

export type LLMProvider = "openai" | "ollama";

export const LLM_PROVIDERS: readonly LLMProvider[] = ["openai", "ollama"];

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some(p => p === value);
}

export interface LLMToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    /** JSON-encoded argument object, exactly as the model produced it */
    arguments: string;
  };
}

export interface LLMMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  /** Assistant turns that requested tools */
  tool_calls?: LLMToolCall[];
  /** Tool turns: the call this observation answers */
  tool_call_id?: string;
}

/** Tool declaration in the native function-calling format. */
export interface LLMToolDefinition {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  tools?: LLMToolDefinition[];
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: LLMProvider;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  toolCalls?: LLMToolCall[];
}

export interface ILLMClient {
  readonly provider: LLMProvider;
  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}

export interface LLMProviderConfig {
  baseUrl: string;
  defaultModel: string;
  requiresApiKey: boolean;
}

export const PROVIDER_CONFIGS: Record<LLMProvider, LLMProviderConfig> = {
  openai: {
    baseUrl: "https://api.openai.com/v1",
    defaultModel: "gpt-4o",
    requiresApiKey: true,
  },
  ollama: {
    baseUrl: "http://localhost:11434/v1",
    defaultModel: "llama3.2",
    requiresApiKey: false,
  },
};

export interface LLMClientOptions {
  provider: LLMProvider;
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  fetch?: typeof fetch;
  /** Per-request timeout (default: 120s) */
  timeoutMs?: number;
}

// ============================================
// MODEL TURNS
// ============================================

export interface ProposedToolCall {
  id: string;
  name: string;
  /** Decoded argument object; validated against the tool's schema before anything runs */
  arguments: Record<string, unknown>;
}

/** One parsed model turn: either tool requests or a final answer. */
export type ModelTurn =
  | { kind: "tool_calls"; calls: ProposedToolCall[]; content: string; raw: LLMResponse }
  | { kind: "answer"; text: string; raw: LLMResponse };
