import type { ChunkHandler, ToolCall } from "./types.js";
import {
  ChatCompletionChunkSchema,
  type ChatCompletion,
  type ChatCompletionChunk,
  type ToolCallDelta,
} from "./wire.js";
import { createLogger } from "../logging.js";
import { describeError, truncate } from "../utils.js";

const log = createLogger("stream");

const DATA_PREFIX = "data:";
const DONE_SENTINEL = "[DONE]";

type ToolCallSlot = {
  id: string;
  name: string;
  arguments: string;
};

/**
 * Parses server-sent `data:` lines into chat completion chunks. Parsing stops at
 * `data: [DONE]`. Other lines and payloads that are not chunk JSON are skipped.
 */
export function parseSseEvents(sseText: string): ChatCompletionChunk[] {
  const chunks: ChatCompletionChunk[] = [];

  for (const line of sseText.split(/\r?\n|\r/)) {
    if (!line.startsWith(DATA_PREFIX)) {
      continue;
    }
    let data = line.slice(DATA_PREFIX.length);
    if (data.startsWith(" ")) {
      data = data.slice(1);
    }
    if (data.trim() === DONE_SENTINEL) {
      break;
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (err) {
      log.debug(`Skipping undecodable stream event "${truncate(data, 80)}": ${describeError(err)}`);
      continue;
    }
    const parsed = ChatCompletionChunkSchema.safeParse(json);
    if (!parsed.success) {
      log.debug(`Skipping stream event with unexpected shape: ${truncate(data, 80)}`);
      continue;
    }
    chunks.push(parsed.data);
  }

  return chunks;
}

function toToolCall(slot: ToolCallSlot): ToolCall {
  return {
    id: slot.id,
    type: "function",
    function: { name: slot.name, arguments: slot.arguments },
  };
}

/**
 * Rebuilds one complete chat completion from a streamed body, reporting each
 * increment through `onChunk` as it is consumed. The result has the same shape
 * as a non-streaming response. Tool calls are ordered by first appearance of
 * their index, not by index value.
 */
export function processStream(sseText: string, onChunk: ChunkHandler = () => {}): ChatCompletion {
  let content = "";
  const slots = new Map<number, ToolCallSlot>();
  let responseId: string | undefined;
  let model: string | undefined;
  let finishReason: string | null = null;
  let usage: ChatCompletion["usage"];

  const applyToolCallDelta = (delta: ToolCallDelta, position: number): void => {
    const index = delta.index ?? position;
    let slot = slots.get(index);
    if (!slot) {
      slot = { id: "", name: "", arguments: "" };
      slots.set(index, slot);
    }

    if (delta.id && !slot.id) {
      slot.id = delta.id;
      onChunk({ type: "tool_call_start", index, id: delta.id });
    }

    const name = delta.function?.name;
    if (name) {
      slot.name += name;
    }

    const args = delta.function?.arguments;
    if (args) {
      slot.arguments += args;
      onChunk({ type: "tool_call_delta", index, arguments: args });
    }
  };

  for (const chunk of parseSseEvents(sseText)) {
    if (chunk.id) {
      responseId = chunk.id;
    }
    if (chunk.model) {
      model = chunk.model;
    }
    if (chunk.usage) {
      usage = chunk.usage;
    }

    const choice = chunk.choices[0];
    if (!choice) {
      continue;
    }
    if (choice.finish_reason) {
      finishReason = choice.finish_reason;
    }

    const delta = choice.delta;
    if (delta?.content) {
      content += delta.content;
      onChunk({ type: "content", content: delta.content });
    }
    delta?.tool_calls?.forEach(applyToolCallDelta);
  }

  const toolCalls: ToolCall[] = [];
  for (const [index, slot] of slots) {
    const toolCall = toToolCall(slot);
    onChunk({ type: "tool_call_end", index, toolCall });
    toolCalls.push(toolCall);
  }

  return {
    id: responseId,
    object: "chat.completion",
    created: Math.floor(Date.now() / 1000),
    model,
    choices: [
      {
        index: 0,
        message: {
          role: "assistant",
          content: content !== "" ? content : null,
          tool_calls: toolCalls.length > 0 ? toolCalls : undefined,
        },
        finish_reason: finishReason,
      },
    ],
    ...(usage ? { usage } : {}),
  };
}
