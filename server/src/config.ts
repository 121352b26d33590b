/**
 * Server Configuration
 *
 * Turns environment variables into a typed AppConfig. loadEnvFile() reads
 * .env from the project root (ESM compatible); loadConfig() is pure so
 * tests can hand it a plain object.
 */

import { config as loadDotenv } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@live-agent/shared/logging";
import { isLLMProvider, PROVIDER_CONFIGS, type LLMProvider } from "./llm/index.js";
import { DEFAULT_CONNECTOR_POLICY, type ConnectorPolicy } from "./connectors/types.js";

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  logLevel?: LogLevel;
  logDir?: string;
  llm: {
    provider: LLMProvider;
    apiKey: string;
    model: string;
    baseUrl: string;
    /** Per-request timeout for the model endpoint */
    timeoutMs: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  agent: {
    maxIterations: number;
    requireLiveData: boolean;
  };
  sqlite: {
    /** Database file; null disables the inventory connector */
    path: string | null;
    timestampColumn?: string;
  };
  rest: {
    /** Order service base URL; null disables the order connector */
    baseUrl: string | null;
  };
  policy: ConnectorPolicy;
  health: {
    timeoutMs: number;
    cacheMs: number;
  };
  /** Problems that fell back to a default; logged once at startup */
  warnings: string[];
}

/** Load <root>/.env into process.env. Existing variables win. */
export function loadEnvFile(): void {
  const here = dirname(fileURLToPath(import.meta.url));
  loadDotenv({ path: resolve(here, "../../.env") });
}

// ============================================
// PARSING
// ============================================

function int(env: Env, key: string, fallback: number, warnings: string[], min = 0): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    warnings.push(`${key}="${raw}" is not an integer >= ${min}; using ${fallback}`);
    return fallback;
  }
  return value;
}

function bool(env: Env, key: string, fallback: boolean, warnings: string[]): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  warnings.push(`${key}="${raw}" is not a boolean; using ${fallback}`);
  return fallback;
}

function str(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const warnings: string[] = [];

  const providerRaw = str(env, "LLM_PROVIDER") ?? "openai";
  let provider: LLMProvider = "openai";
  if (isLLMProvider(providerRaw)) provider = providerRaw;
  else warnings.push(`LLM_PROVIDER="${providerRaw}" is not one of openai, ollama; using openai`);

  const apiKey = str(env, "OPENAI_API_KEY") ?? "";
  if (provider === "openai" && !apiKey) {
    throw new Error("OPENAI_API_KEY is required when LLM_PROVIDER=openai");
  }

  const model = provider === "openai"
    ? str(env, "OPENAI_MODEL") ?? PROVIDER_CONFIGS.openai.defaultModel
    : str(env, "OLLAMA_MODEL") ?? PROVIDER_CONFIGS.ollama.defaultModel;

  const baseUrl = provider === "openai"
    ? str(env, "OPENAI_BASE_URL") ?? PROVIDER_CONFIGS.openai.baseUrl
    : ollamaBaseUrl(str(env, "OLLAMA_URL"));

  const logLevelRaw = str(env, "LOG_LEVEL");
  let logLevel: LogLevel | undefined;
  if (logLevelRaw && isLogLevel(logLevelRaw)) logLevel = logLevelRaw;
  else if (logLevelRaw) warnings.push(`LOG_LEVEL="${logLevelRaw}" is not a log level; using the default`);

  return {
    port: int(env, "PORT", 3000, warnings, 1),
    logLevel,
    logDir: str(env, "LOG_DIR"),
    llm: {
      provider,
      apiKey: provider === "openai" ? apiKey : "",
      model,
      baseUrl,
      timeoutMs: int(env, "LLM_TIMEOUT_MS", 120_000, warnings, 1),
      maxRetries: int(env, "LLM_MAX_RETRIES", 2, warnings),
      backoffBaseMs: int(env, "LLM_BACKOFF_BASE_MS", 500, warnings),
      backoffMaxMs: int(env, "LLM_BACKOFF_MAX_MS", 8_000, warnings),
    },
    agent: {
      maxIterations: int(env, "AGENT_MAX_ITERATIONS", 5, warnings, 1),
      requireLiveData: bool(env, "AGENT_REQUIRE_LIVE_DATA", true, warnings),
    },
    sqlite: {
      path: str(env, "SQLITE_PATH") ?? null,
      timestampColumn: str(env, "SQLITE_TIMESTAMP_COLUMN"),
    },
    rest: {
      baseUrl: str(env, "ORDERS_API_URL") ?? null,
    },
    policy: {
      readOnly: bool(env, "SANDBOX_READ_ONLY", DEFAULT_CONNECTOR_POLICY.readOnly, warnings),
      maxRows: int(env, "SANDBOX_MAX_ROWS", DEFAULT_CONNECTOR_POLICY.maxRows, warnings, 1),
      timeoutMs: int(env, "SANDBOX_TIMEOUT_MS", DEFAULT_CONNECTOR_POLICY.timeoutMs, warnings, 1),
      maxConcurrency: int(env, "SANDBOX_MAX_CONCURRENCY", DEFAULT_CONNECTOR_POLICY.maxConcurrency, warnings, 1),
      maxStalenessMs: int(env, "SANDBOX_MAX_STALENESS_MS", DEFAULT_CONNECTOR_POLICY.maxStalenessMs, warnings),
    },
    health: {
      timeoutMs: int(env, "HEALTH_TIMEOUT_MS", 5_000, warnings, 1),
      cacheMs: int(env, "HEALTH_CACHE_MS", 10_000, warnings),
    },
    warnings,
  };
}

/** OLLAMA_URL names the server root; the chat API lives under /v1. */
function ollamaBaseUrl(url: string | undefined): string {
  if (!url) return PROVIDER_CONFIGS.ollama.baseUrl;
  const trimmed = url.replace(/\/+$/, "");
  return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}
