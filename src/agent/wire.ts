import type OpenAI from "openai";
import { z } from "zod";
import type { SchemaNode } from "../schema/types.js";
import type { Message, ToolCall } from "./types.js";
import { ProtocolError } from "../infra/errors.js";
import { describeError } from "../utils.js";

// --- Chat Completions response schemas ---

export const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").default("function"),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(""),
  }),
});

export const UsageSchema = z
  .object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  })
  .passthrough();

export const ChatCompletionMessageSchema = z
  .object({
    role: z.enum(["system", "user", "assistant", "tool"]).default("assistant"),
    content: z.string().nullable().optional(),
    tool_calls: z.array(WireToolCallSchema).nullable().optional(),
  })
  .passthrough();

export type ChatCompletionMessage = z.infer<typeof ChatCompletionMessageSchema>;

export const ChatCompletionSchema = z
  .object({
    id: z.string().optional(),
    object: z.string().optional(),
    created: z.number().optional(),
    model: z.string().optional(),
    choices: z.array(
      z.object({
        index: z.number().optional(),
        message: ChatCompletionMessageSchema,
        finish_reason: z.string().nullable().optional(),
      }),
    ),
    usage: UsageSchema.nullable().optional(),
  })
  .passthrough();

export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

export const ToolCallDeltaSchema = z.object({
  index: z.number().int().optional(),
  id: z.string().nullable().optional(),
  type: z.string().nullable().optional(),
  function: z
    .object({
      name: z.string().nullable().optional(),
      arguments: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
});

export type ToolCallDelta = z.infer<typeof ToolCallDeltaSchema>;

export const ChatCompletionChunkSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        delta: z
          .object({
            role: z.string().nullable().optional(),
            content: z.string().nullable().optional(),
            tool_calls: z.array(ToolCallDeltaSchema).nullable().optional(),
          })
          .nullable()
          .optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: UsageSchema.nullable().optional(),
});

export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;

// --- Requests ---

export type ToolSpec = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: SchemaNode;
  };
};

export type ChatRequestBody = {
  model: string;
  messages: OpenAI.ChatCompletionMessageParam[];
  temperature?: number;
  max_tokens?: number;
  tools?: OpenAI.ChatCompletionTool[];
  stream?: boolean;
};

export function toWireMessages(messages: readonly Message[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((m): OpenAI.ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content ?? "" };
      case "user":
        return { role: "user", content: m.content ?? "" };
      case "tool":
        return { role: "tool", tool_call_id: m.toolCallId ?? "", content: m.content ?? "" };
      case "assistant":
        if (m.toolCalls && m.toolCalls.length > 0) {
          return {
            role: "assistant",
            content: m.content ?? null,
            tool_calls: m.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.function.name, arguments: tc.function.arguments },
            })),
          };
        }
        return { role: "assistant", content: m.content ?? "" };
    }
  });
}

export function fromWireMessage(message: ChatCompletionMessage): Message {
  const result: Message = { role: message.role, content: message.content ?? null };
  if (message.tool_calls && message.tool_calls.length > 0) {
    result.toolCalls = message.tool_calls.map(
      (tc): ToolCall => ({
        id: tc.id,
        type: "function",
        function: { name: tc.function.name, arguments: tc.function.arguments },
      }),
    );
  }
  return result;
}

export function decodeChatCompletion(body: string): ChatCompletion {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ProtocolError(`Failed to decode response body: ${describeError(err)}`);
  }
  const result = ChatCompletionSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ProtocolError(`Unexpected chat completion shape${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}
