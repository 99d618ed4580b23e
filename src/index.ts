export {
  createAgent,
  resolveAgentConfig,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_ITERATIONS,
  type Agent,
  type ResolvedAgentConfig,
} from "./agent/agent.js";
export { createToolRegistry, OUTPUT_TOOL_NAME, type RegisteredTool, type ToolRegistry } from "./agent/tools.js";
export { processStream, parseSseEvents } from "./agent/stream.js";
export { buildSystemPrompt, outputToolInstruction } from "./agent/prompt.js";
export {
  decodeChatCompletion,
  fromWireMessage,
  toWireMessages,
  type ChatCompletion,
  type ChatCompletionChunk,
  type ChatRequestBody,
  type ToolSpec,
} from "./agent/wire.js";
export type {
  AgentOptions,
  ChunkHandler,
  Deps,
  Message,
  Role,
  RunContext,
  RunOptions,
  RunResult,
  StreamChunk,
  StreamChunkType,
  SystemPrompt,
  ToolCall,
  ToolDescriptor,
  ToolHandler,
} from "./agent/types.js";
export { validateSchema } from "./schema/validate.js";
export type { SchemaNode, SchemaType, ValidationResult } from "./schema/types.js";
export { createFetchTransport } from "./transport/fetch-transport.js";
export type { Transport, TransportResponse } from "./transport/types.js";
export { detectProvider, PROVIDER_PRESETS, type DetectedProvider, type ProviderPreset } from "./providers/detect.js";
export {
  AppError,
  ConfigError,
  IterationLimitError,
  OutputValidationError,
  ProtocolError,
  ToolExecutionError,
  TransportError,
  UnknownToolError,
  formatError,
} from "./infra/errors.js";
export { createLogger, type LogLevel } from "./logging.js";
export { loadConfig, CONFIG_FILENAMES } from "./config/config.js";
export type { AgentFileConfig, AgentLoopConfig } from "./config/types.js";
export { loadDotenv } from "./infra/dotenv.js";
export { optionalEnv } from "./infra/env.js";
