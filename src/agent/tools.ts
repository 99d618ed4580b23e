import type { SchemaNode } from "../schema/types.js";
import type { RunContext, ToolCall, ToolDescriptor, ToolHandler } from "./types.js";
import type { ToolSpec } from "./wire.js";
import { ConfigError, ToolExecutionError, UnknownToolError } from "../infra/errors.js";
import { createLogger } from "../logging.js";
import { describeError } from "../utils.js";

const log = createLogger("tools");

export const OUTPUT_TOOL_NAME = "final_answer";

const OUTPUT_TOOL_DESCRIPTION = "Call this function to return your final answer with structured data";

const EMPTY_PARAMETERS: SchemaNode = { type: "object", properties: {} };

export type RegisteredTool = {
  name: string;
  description: string;
  parameters: SchemaNode;
  handler: ToolHandler;
};

function decodeArguments(raw: string): unknown {
  return raw.trim() === "" ? {} : JSON.parse(raw);
}

function encodeResult(result: unknown): string {
  if (typeof result === "string") {
    return result;
  }
  return JSON.stringify(result) ?? "null";
}

function errorPayload(error: Error): string {
  return JSON.stringify({ error: error.message });
}

export type ToolRegistry = {
  register: (name: string, descriptor: ToolDescriptor) => RegisteredTool;
  /**
   * Registers the synthetic `final_answer` tool. The run loop intercepts calls
   * to it, so its handler only echoes the arguments.
   */
  registerOutputTool: (schema: SchemaNode) => RegisteredTool;
  has: (name: string) => boolean;
  get: (name: string) => RegisteredTool | undefined;
  names: () => string[];
  buildToolSpecs: () => ToolSpec[];
  /**
   * Runs a tool call and returns the text for the tool-result message. Never
   * throws: unknown tools and handler failures come back as `{"error": ...}`.
   */
  execute: (toolCall: ToolCall, context: RunContext) => Promise<string>;
};

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, RegisteredTool>();

  const register = (name: string, descriptor: ToolDescriptor): RegisteredTool => {
    if (typeof descriptor.handler !== "function") {
      throw new ConfigError(`Tool '${name}' requires a handler`);
    }
    if (tools.has(name)) {
      throw new ConfigError(`Tool '${name}' is already registered`);
    }
    const tool: RegisteredTool = {
      name,
      description: descriptor.description ?? "",
      parameters: descriptor.parameters ?? EMPTY_PARAMETERS,
      handler: descriptor.handler,
    };
    tools.set(name, tool);
    return tool;
  };

  const registerOutputTool = (schema: SchemaNode): RegisteredTool => {
    if (tools.has(OUTPUT_TOOL_NAME)) {
      throw new ConfigError(
        `Tool name '${OUTPUT_TOOL_NAME}' is reserved for structured output when an output schema is configured`,
      );
    }
    return register(OUTPUT_TOOL_NAME, {
      description: OUTPUT_TOOL_DESCRIPTION,
      parameters: schema,
      handler: (_context, args) => args,
    });
  };

  const buildToolSpecs = (): ToolSpec[] =>
    [...tools.values()].map((t) => ({
      type: "function" as const,
      function: {
        name: t.name,
        description: t.description,
        parameters: t.parameters,
      },
    }));

  const execute = async (toolCall: ToolCall, context: RunContext): Promise<string> => {
    const name = toolCall.function.name;
    const tool = tools.get(name);
    if (!tool) {
      const error = new UnknownToolError(name);
      log.warn(error.message);
      return errorPayload(error);
    }

    try {
      const args = decodeArguments(toolCall.function.arguments);
      log.debug(`Executing tool ${name} (call ${toolCall.id})`);
      const result: unknown = await tool.handler(context, args);
      return encodeResult(result);
    } catch (err) {
      const error = new ToolExecutionError(name, describeError(err));
      log.warn(`Tool ${name} failed: ${error.message}`);
      return errorPayload(error);
    }
  };

  return {
    register,
    registerOutputTool,
    has: (name) => tools.has(name),
    get: (name) => tools.get(name),
    names: () => [...tools.keys()],
    buildToolSpecs,
    execute,
  };
}
