import type { SchemaNode } from "../schema/types.js";
import type { Transport } from "../transport/types.js";
import type { ChatCompletion } from "./wire.js";

export type Role = "system" | "user" | "assistant" | "tool";

export type ToolCall = {
  id: string;
  type: "function";
  function: {
    name: string;
    /** JSON-encoded; decoded only when the tool runs. */
    arguments: string;
  };
};

export type Message = {
  role: Role;
  content?: string | null;
  toolCalls?: ToolCall[];
  toolCallId?: string;
};

export type Deps = Record<string, unknown>;

/**
 * Per-run state handed to tool handlers and to a dynamic system prompt.
 * `messages` is the live conversation of the run.
 */
export type RunContext = {
  readonly deps: Deps;
  readonly messages: Message[];
};

export type ToolHandler = (context: RunContext, args: unknown) => unknown;

export type ToolDescriptor = {
  description?: string;
  parameters?: SchemaNode;
  handler: ToolHandler;
};

export type SystemPrompt = string | ((context: RunContext) => string | Promise<string>);

export type StreamChunk =
  | { type: "content"; content: string }
  | { type: "tool_call_start"; index: number; id: string }
  | { type: "tool_call_delta"; index: number; arguments: string }
  | { type: "tool_call_end"; index: number; toolCall: ToolCall };

export type StreamChunkType = StreamChunk["type"];

export type ChunkHandler = (chunk: StreamChunk) => void;

export type AgentOptions = {
  model: string;
  systemPrompt?: SystemPrompt;
  outputSchema?: SchemaNode;
  tools?: Record<string, ToolDescriptor>;
  baseUrl?: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  transport?: Transport;
};

export type RunOptions = {
  deps?: Deps;
  messageHistory?: readonly Message[];
  maxIterations?: number;
  stream?: boolean;
  onChunk?: ChunkHandler;
};

export type RunResult = {
  /** Assistant text, or the validated structured answer when an output schema is set. */
  data: unknown;
  messages: Message[];
  rawResponse: ChatCompletion;
};
