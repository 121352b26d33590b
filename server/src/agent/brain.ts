/**
 * Agent Brain: Tool Orchestration Loop
 *
 * One answer() call runs one question through the state machine:
 *
 *   AWAITING_MODEL → EXECUTING_TOOL → AWAITING_MODEL → … → ANSWERED | FAILED | BUDGET_EXCEEDED
 *
 * 1. Send the conversation plus every registered tool schema to the model
 * 2. Tool calls → resolve, validate arguments, run the handler, append the
 *    result (or the typed failure) as a tool message
 * 3. Text only → candidate answer. Live-data questions are sent back to
 *    the model until a tool has succeeded
 * 4. Stop on an answer, a fatal failure, cancellation, or maxIterations
 *
 * Tool failures are observations for the model, not retries. Two failures
 * end the request outright: UnsafeQueryError, and cancellation.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@live-agent/shared/logging";
import { createComponentLogger } from "../logging.js";
import {
  BudgetExceededError,
  ConnectionError,
  LiveAgentError,
  RequestCancelledError,
  UnsafeQueryError,
  errorMessage,
  toObservation,
  type ErrorObservation,
} from "../errors.js";
import type { CapabilityRegistry } from "../connectors/registry.js";
import type { ExecutionSandbox } from "../sandbox/sandbox.js";
import type { QueryResult } from "../sandbox/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import { validateArguments } from "../tools/arguments.js";
import { toNativeTools } from "../tools/native.js";
import type { LLMMessage, LLMRequestOptions, ModelTurn, ProposedToolCall } from "../llm/index.js";
import { abortableCall, abortReason } from "./abort.js";
import { mentionedEntities, type LiveDataDetector } from "./policy.js";
import { SYSTEM_PROMPT, liveDataReminder } from "./prompt.js";
import type {
  AgentBrainOptions,
  AgentResponse,
  AnswerOptions,
  BrainState,
  ModelGateway,
  TerminalState,
} from "./types.js";

const log = createComponentLogger("brain");

export const BUDGET_EXCEEDED_ANSWER = "I was unable to determine an answer within the allotted steps.";

export interface AgentBrainDeps {
  model: ModelGateway;
  tools: ToolRegistry;
  capabilities: CapabilityRegistry;
  sandbox: ExecutionSandbox;
}

type ToolOutcome =
  | { ok: true; tool: string; result: QueryResult }
  | { ok: false; tool: string; error: unknown };

/** Per-question working state; discarded when answer() returns. */
interface Run {
  requestId: string;
  log: ILogger;
  signal?: AbortSignal;
  state: BrainState | null;
  iteration: number;
  messages: LLMMessage[];
  results: { tool: string; result: QueryResult }[];
  seenResultIds: Set<string>;
  connectionError: ConnectionError | null;
}

export class AgentBrain {
  private maxIterations: number;
  private requireLiveData: boolean;
  private detector: LiveDataDetector;
  private systemPrompt: string;
  private makeId: () => string;

  constructor(
    private readonly deps: AgentBrainDeps,
    private readonly options: AgentBrainOptions = {},
  ) {
    this.maxIterations = options.maxIterations ?? 5;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new Error(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
    this.requireLiveData = options.requireLiveData ?? true;
    this.detector = options.liveDataDetector ?? mentionedEntities;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.makeId = options.makeId ?? (() => nanoid());
  }

  async answer(question: string, opts: AnswerOptions = {}): Promise<AgentResponse> {
    const requestId = opts.requestId ?? this.makeId();
    const run: Run = {
      requestId,
      log: log.child({ requestId }),
      signal: opts.signal,
      state: null,
      iteration: 0,
      messages: [
        { role: "system", content: this.systemPrompt },
        { role: "user", content: question },
      ],
      results: [],
      seenResultIds: new Set(),
      connectionError: null,
    };

    const liveEntities = this.requireLiveData ? this.detector(question, this.deps.tools.dynamicEntities()) : [];
    const tools = toNativeTools(this.deps.tools.listSchemas());
    const request: LLMRequestOptions = {
      tools,
      signal: opts.signal,
      model: this.options.model,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    };

    run.log.info("Question received", {
      length: question.length,
      tools: tools.length,
      liveEntities,
    });

    while (run.iteration < this.maxIterations) {
      run.iteration++;
      this.transition(run, "AWAITING_MODEL");

      let turn: ModelTurn;
      try {
        turn = await abortableCall(
          () => this.deps.model.proposeTurn(run.messages, request, this.makeId),
          opts.signal,
        );
      } catch (err) {
        if (opts.signal?.aborted) return this.cancelled(run, opts.signal);
        run.log.error("Model turn failed", err, { iteration: run.iteration });
        return this.fail(run, err);
      }

      if (turn.kind === "answer") {
        if (run.results.length === 0 && run.connectionError) {
          return this.fail(run, run.connectionError);
        }
        if (liveEntities.length > 0 && run.results.length === 0) {
          run.log.warn("Direct answer to a live-data question rejected", {
            iteration: run.iteration,
            entities: liveEntities,
          });
          run.messages.push({ role: "assistant", content: turn.text });
          run.messages.push({ role: "user", content: liveDataReminder(liveEntities) });
          continue;
        }
        return this.finish(run, "ANSWERED", turn.text);
      }

      this.transition(run, "EXECUTING_TOOL");
      run.messages.push({
        role: "assistant",
        content: turn.content,
        tool_calls: turn.calls.map(call => ({
          id: call.id,
          type: "function",
          function: { name: call.name, arguments: JSON.stringify(call.arguments) },
        })),
      });

      for (const call of turn.calls) {
        const outcome = await this.executeCall(run, call);

        if (!outcome.ok) {
          if (opts.signal?.aborted) return this.cancelled(run, opts.signal);
          if (outcome.error instanceof UnsafeQueryError) return this.fail(run, outcome.error);
          if (outcome.error instanceof ConnectionError) run.connectionError = outcome.error;
        }

        run.messages.push({
          role: "tool",
          tool_call_id: call.id,
          content: observe(outcome),
        });
      }
    }

    if (run.results.length === 0 && run.connectionError) {
      return this.fail(run, run.connectionError);
    }
    const budget = new BudgetExceededError(this.maxIterations);
    run.log.warn("Iteration budget exhausted", { maxIterations: this.maxIterations });
    return this.finish(run, "BUDGET_EXCEEDED", BUDGET_EXCEEDED_ANSWER, toObservation(budget));
  }

  // ============================================
  // TOOL EXECUTION
  // ============================================

  private async executeCall(run: Run, call: ProposedToolCall): Promise<ToolOutcome> {
    const started = Date.now();
    try {
      const tool = this.deps.tools.resolve(call.name);
      const args = validateArguments(tool, call.arguments);

      const signal = run.signal ?? new AbortController().signal;
      const result = await abortableCall(
        () => tool.handler(args, {
          sandbox: this.deps.sandbox,
          capabilities: this.deps.capabilities,
          signal,
          requestId: run.requestId,
          log: run.log.child({ component: `server.tool.${tool.name}` }),
        }),
        run.signal,
      );

      if (run.seenResultIds.has(result.resultId)) {
        throw new LiveAgentError("INTERNAL_ERROR", `Tool ${tool.name} returned a result that was already used`);
      }
      run.seenResultIds.add(result.resultId);
      run.results.push({ tool: tool.name, result });

      run.log.info("Tool succeeded", {
        tool: tool.name,
        callId: call.id,
        source: result.source,
        rowCount: result.rowCount,
        durationMs: Date.now() - started,
      });
      return { ok: true, tool: tool.name, result };
    } catch (error) {
      run.log.warn("Tool failed", {
        tool: call.name,
        callId: call.id,
        code: toObservation(error).code,
        error: errorMessage(error),
        durationMs: Date.now() - started,
      });
      return { ok: false, tool: call.name, error };
    }
  }

  // ============================================
  // TERMINATION
  // ============================================

  private transition(run: Run, to: BrainState): void {
    const from = run.state;
    run.state = to;
    run.log.debug("State transition", { from, to, iteration: run.iteration });
    this.options.onTransition?.({ requestId: run.requestId, from, to, iteration: run.iteration });
  }

  private cancelled(run: Run, signal: AbortSignal): AgentResponse {
    run.log.info("Request cancelled", { iteration: run.iteration });
    return this.fail(run, new RequestCancelledError(abortReason(signal)));
  }

  private fail(run: Run, error: unknown): AgentResponse {
    const observation = toObservation(error);
    return this.finish(run, "FAILED", `Unable to answer: ${observation.message}`, observation);
  }

  private finish(run: Run, status: TerminalState, answer: string, error?: ErrorObservation): AgentResponse {
    this.transition(run, status);

    // Only an answer that rests on fetched data carries provenance.
    const grounded = status === "ANSWERED" ? run.results : [];
    const timestamps = grounded.map(r => r.result.dataTimestamp).sort();

    const response: AgentResponse = {
      status,
      answer,
      provenance: grounded.length > 0 ? "live_data" : "none",
      dataTimestamp: timestamps[0] ?? null,
      toolsUsed: unique(grounded.map(r => r.tool)),
      sources: unique(grounded.map(r => r.result.source)),
      iterations: run.iteration,
      requestId: run.requestId,
      ...(error ? { error } : {}),
    };

    const level = status === "ANSWERED" ? "info" : "warn";
    run.log[level]("Request finished", {
      status,
      iterations: run.iteration,
      toolsUsed: response.toolsUsed,
      code: error?.code,
    });
    return response;
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/** Tool message content the model reads back. */
function observe(outcome: ToolOutcome): string {
  if (outcome.ok) {
    const { result } = outcome;
    return JSON.stringify({
      success: true,
      source: result.source,
      rowCount: result.rowCount,
      dataTimestamp: result.dataTimestamp,
      fetchedAt: result.fetchedAt,
      modifiedAt: result.modifiedAt,
      data: result.data,
    });
  }
  return JSON.stringify({ success: false, error: toObservation(outcome.error) });
}
