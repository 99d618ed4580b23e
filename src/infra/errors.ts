export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "AppError";
    this.code = code;
  }
}

/** Missing model or credential, or an option outside its allowed range. */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/** Non-2xx reply from the API, or a request that never got one. */
export class TransportError extends AppError {
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(message: string, status?: number, body?: string) {
    super(message, "TRANSPORT_ERROR");
    this.name = "TransportError";
    this.status = status;
    this.body = body;
  }

  static fromResponse(status: number, body: string): TransportError {
    return new TransportError(`API error (status ${status}): ${body}`, status, body);
  }
}

/** A 2xx reply whose body is not a chat completion. */
export class ProtocolError extends AppError {
  constructor(message: string) {
    super(message, "PROTOCOL_ERROR");
    this.name = "ProtocolError";
  }
}

export class OutputValidationError extends AppError {
  constructor(message: string) {
    super(message, "OUTPUT_VALIDATION_ERROR");
    this.name = "OutputValidationError";
  }
}

export class IterationLimitError extends AppError {
  readonly iterations: number;

  constructor(iterations: number) {
    super(`Max iterations (${iterations}) reached`, "ITERATION_LIMIT_ERROR");
    this.name = "IterationLimitError";
    this.iterations = iterations;
  }
}

// The two errors below never leave a run: the tool registry turns them into
// tool-result content for the model.

export class ToolExecutionError extends AppError {
  readonly toolName: string;

  constructor(toolName: string, detail: string) {
    super(`Tool execution failed: ${detail}`, "TOOL_EXECUTION_ERROR");
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class UnknownToolError extends AppError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool '${toolName}' not found`, "UNKNOWN_TOOL_ERROR");
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
}
