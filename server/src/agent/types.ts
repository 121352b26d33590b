/**
 * Agent Brain: Shared Types
 */

import type { ErrorObservation } from "../errors.js";
import type { LLMMessage, LLMRequestOptions, ModelTurn } from "../llm/index.js";
import type { LiveDataDetector } from "./policy.js";

export type BrainState = "AWAITING_MODEL" | "EXECUTING_TOOL" | "ANSWERED" | "FAILED" | "BUDGET_EXCEEDED";

export type TerminalState = Extract<BrainState, "ANSWERED" | "FAILED" | "BUDGET_EXCEEDED">;

export interface TransitionEvent {
  requestId: string;
  from: BrainState | null;
  to: BrainState;
  iteration: number;
}

/** The model side of the loop. ResilientModelClient implements it. */
export interface ModelGateway {
  proposeTurn(messages: LLMMessage[], options: LLMRequestOptions, makeId: () => string): Promise<ModelTurn>;
}

export interface AgentBrainOptions {
  /** Model round-trips allowed per question (default: 5) */
  maxIterations?: number;
  /** Refuse direct answers to live-data questions before a tool succeeded (default: true) */
  requireLiveData?: boolean;
  liveDataDetector?: LiveDataDetector;
  systemPrompt?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  onTransition?: (event: TransitionEvent) => void;
  /** Request and tool-call id source (default: nanoid) */
  makeId?: () => string;
}

export interface AnswerOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface AgentResponse {
  status: TerminalState;
  answer: string;
  /** "live_data" only when the answer rests on at least one successful tool result */
  provenance: "live_data" | "none";
  /** Earliest data timestamp among the results the answer rests on */
  dataTimestamp: string | null;
  /** Tools that returned data, in first-use order */
  toolsUsed: string[];
  /** Connector ids that produced that data */
  sources: string[];
  iterations: number;
  requestId: string;
  error?: ErrorObservation;
}
