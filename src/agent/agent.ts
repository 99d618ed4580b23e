import type { SchemaNode } from "../schema/types.js";
import type { Transport } from "../transport/types.js";
import type {
  AgentOptions,
  ChunkHandler,
  Deps,
  Message,
  RunContext,
  RunOptions,
  RunResult,
  SystemPrompt,
  ToolCall,
  ToolDescriptor,
} from "./types.js";
import {
  decodeChatCompletion,
  fromWireMessage,
  toWireMessages,
  type ChatCompletion,
  type ChatRequestBody,
  type ToolSpec,
} from "./wire.js";
import { createToolRegistry } from "./tools.js";
import { buildSystemPrompt } from "./prompt.js";
import { processStream } from "./stream.js";
import { validateSchema } from "../schema/validate.js";
import { createFetchTransport } from "../transport/fetch-transport.js";
import {
  ConfigError,
  IterationLimitError,
  OutputValidationError,
  ProtocolError,
  TransportError,
} from "../infra/errors.js";
import { optionalEnv } from "../infra/env.js";
import { createLogger } from "../logging.js";
import { describeError, truncate } from "../utils.js";

const log = createLogger("agent");

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MAX_ITERATIONS = 10;
export const API_KEY_ENV_VAR = "OPENAI_API_KEY";

export type ResolvedAgentConfig = {
  model: string;
  systemPrompt?: SystemPrompt;
  outputSchema?: SchemaNode;
  baseUrl: string;
  apiKey?: string;
  /** `OPENAI_API_KEY` as it was when the agent was created. */
  envApiKey?: string;
  temperature?: number;
  maxTokens?: number;
  transport?: Transport;
};

export type Agent = {
  readonly model: string;
  run: (prompt: string, options?: RunOptions) => Promise<RunResult>;
  /** Registers another tool; names must stay unique. */
  tool: (name: string, descriptor: ToolDescriptor) => void;
  toolSpecs: () => ToolSpec[];
};

export function resolveAgentConfig(
  options: AgentOptions,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedAgentConfig {
  if (typeof options.model !== "string" || options.model.trim() === "") {
    throw new ConfigError("model is required");
  }
  const { temperature, maxTokens } = options;
  if (temperature !== undefined && (!Number.isFinite(temperature) || temperature < 0 || temperature > 2)) {
    throw new ConfigError("temperature must be between 0 and 2");
  }
  if (maxTokens !== undefined && (!Number.isInteger(maxTokens) || maxTokens < 1)) {
    throw new ConfigError("maxTokens must be a positive integer");
  }

  return {
    model: options.model,
    systemPrompt: options.systemPrompt,
    outputSchema: options.outputSchema,
    baseUrl: (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    apiKey: options.apiKey,
    envApiKey: optionalEnv(API_KEY_ENV_VAR, undefined, env),
    temperature,
    maxTokens,
    transport: options.transport,
  };
}

/** Config key first, then `deps.apiKey`, then the environment. */
function resolveApiKey(config: ResolvedAgentConfig, deps: Deps): string {
  const fromDeps = typeof deps.apiKey === "string" && deps.apiKey.trim() !== "" ? deps.apiKey : undefined;
  const apiKey = config.apiKey || fromDeps || config.envApiKey;
  if (!apiKey) {
    throw new ConfigError(`API key not provided. Set via config, deps, or ${API_KEY_ENV_VAR} env var`);
  }
  return apiKey;
}

function parseStructuredOutput(toolCall: ToolCall, schema: SchemaNode): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(toolCall.function.arguments);
  } catch (err) {
    throw new OutputValidationError(
      `Output validation failed: arguments of '${toolCall.function.name}' are not valid JSON (${describeError(err)})`,
    );
  }
  const result = validateSchema(parsed, schema);
  if (!result.ok) {
    throw new OutputValidationError(`Output validation failed: ${result.error}`);
  }
  return parsed;
}

export function createAgent(options: AgentOptions): Agent {
  const config = resolveAgentConfig(options);

  const registry = createToolRegistry();
  for (const [name, descriptor] of Object.entries(options.tools ?? {})) {
    registry.register(name, descriptor);
  }
  const outputToolName = config.outputSchema
    ? registry.registerOutputTool(config.outputSchema).name
    : undefined;
  log.debug(`Agent for ${config.model} created with tools: ${registry.names().join(", ") || "(none)"}`);

  let transport = config.transport;
  const getTransport = (): Transport => {
    transport ??= createFetchTransport();
    return transport;
  };

  const complete = async (params: {
    messages: Message[];
    tools: ToolSpec[];
    deps: Deps;
    stream: boolean;
    onChunk?: ChunkHandler;
  }): Promise<ChatCompletion> => {
    const apiKey = resolveApiKey(config, params.deps);

    const body: ChatRequestBody = {
      model: config.model,
      messages: toWireMessages(params.messages),
    };
    if (config.temperature !== undefined) {
      body.temperature = config.temperature;
    }
    if (config.maxTokens !== undefined) {
      body.max_tokens = config.maxTokens;
    }
    if (params.tools.length > 0) {
      body.tools = params.tools;
    }
    if (params.stream) {
      body.stream = true;
    }

    const response = await getTransport().post(
      `${config.baseUrl}/chat/completions`,
      {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      JSON.stringify(body),
    );

    if (response.status < 200 || response.status >= 300) {
      log.error(`API error (status ${response.status}): ${truncate(response.body, 200)}`);
      throw TransportError.fromResponse(response.status, response.body);
    }

    return params.stream
      ? processStream(response.body, params.onChunk)
      : decodeChatCompletion(response.body);
  };

  const run = async (prompt: string, runOptions: RunOptions = {}): Promise<RunResult> => {
    const maxIterations = runOptions.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new ConfigError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const deps = runOptions.deps ?? {};
    const messages: Message[] = (runOptions.messageHistory ?? []).map((m) => structuredClone(m));
    const context: RunContext = { deps, messages };

    const systemPrompt = await buildSystemPrompt({
      systemPrompt: config.systemPrompt,
      context,
      outputToolName,
    });
    if (systemPrompt) {
      messages.unshift({ role: "system", content: systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    const tools = registry.buildToolSpecs();
    const stream = runOptions.stream === true;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      log.debug(`Iteration ${iteration}/${maxIterations} with ${messages.length} messages`);

      const response = await complete({ messages, tools, deps, stream, onChunk: runOptions.onChunk });
      const choice = response.choices[0];
      if (!choice) {
        throw new ProtocolError("API returned no choices in response");
      }

      const message = fromWireMessage(choice.message);
      messages.push(message);

      const toolCalls = message.toolCalls ?? [];
      if (toolCalls.length === 0) {
        if (outputToolName) {
          throw new OutputValidationError(
            `Model did not call the '${outputToolName}' tool for structured output`,
          );
        }
        return { data: message.content ?? "", messages, rawResponse: response };
      }

      const outputCall = outputToolName
        ? toolCalls.find((tc) => tc.function.name === outputToolName)
        : undefined;
      if (outputCall && config.outputSchema) {
        const data = parseStructuredOutput(outputCall, config.outputSchema);
        log.info(`Structured output accepted after ${iteration} iteration(s)`);
        return { data, messages, rawResponse: response };
      }

      for (const toolCall of toolCalls) {
        const content = await registry.execute(toolCall, context);
        messages.push({ role: "tool", toolCallId: toolCall.id, content });
      }
    }

    log.warn(`Run stopped after ${maxIterations} iterations without a final answer`);
    throw new IterationLimitError(maxIterations);
  };

  return {
    model: config.model,
    run,
    tool: (name, descriptor) => {
      registry.register(name, descriptor);
    },
    toolSpecs: () => registry.buildToolSpecs(),
  };
}
