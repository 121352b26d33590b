/**
 * Model Turn Parsing
 *
 * Turns a raw chat response into either tool requests or a final answer.
 * Output that is neither raises ModelCommunicationError so the caller can
 * retry instead of treating garbage as an answer.
 */

import { ModelCommunicationError } from "../errors.js";
import type { LLMResponse, ModelTurn, ProposedToolCall } from "./types.js";

/** Decode a tool call's JSON argument text. Empty text means no arguments. */
export function decodeArguments(toolName: string, text: string): Record<string, unknown> {
  if (text.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ModelCommunicationError(`arguments for ${toolName} are not valid JSON`, { cause: err });
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ModelCommunicationError(`arguments for ${toolName} must be a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function parseModelTurn(response: LLMResponse, makeId: () => string): ModelTurn {
  if (response.toolCalls?.length) {
    const calls: ProposedToolCall[] = response.toolCalls.map((call, index) => {
      const name = call.function.name.trim();
      if (!name) throw new ModelCommunicationError(`tool call ${index} has no function name`);
      return {
        id: call.id || makeId(),
        name,
        arguments: decodeArguments(name, call.function.arguments),
      };
    });
    return { kind: "tool_calls", calls, content: response.content, raw: response };
  }

  const text = response.content.trim();
  if (!text) throw new ModelCommunicationError("empty response with no tool calls");
  return { kind: "answer", text, raw: response };
}
