import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createAgent, resolveAgentConfig } from "./agent.js";
import type { AgentOptions, Message, RunContext, StreamChunk, ToolHandler } from "./types.js";
import type { Transport, TransportResponse } from "../transport/types.js";
import type { SchemaNode } from "../schema/types.js";
import {
  ConfigError,
  IterationLimitError,
  OutputValidationError,
  ProtocolError,
  TransportError,
} from "../infra/errors.js";

// ---------------------------------------------------------------------------
// Transport stand-in
// ---------------------------------------------------------------------------

const post = vi.fn<Transport["post"]>();

type WireCall = { id: string; name: string; arguments: string };

function ok(body: unknown): TransportResponse {
  return { status: 200, body: JSON.stringify(body) };
}

function textResponse(content: string): TransportResponse {
  return ok({
    id: "chatcmpl-1",
    object: "chat.completion",
    model: "test-model",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
  });
}

function toolResponse(calls: WireCall[], content: string | null = null): TransportResponse {
  return ok({
    id: "chatcmpl-2",
    object: "chat.completion",
    model: "test-model",
    choices: [
      {
        index: 0,
        message: {
          role: "assistant",
          content,
          tool_calls: calls.map((c) => ({
            id: c.id,
            type: "function",
            function: { name: c.name, arguments: c.arguments },
          })),
        },
        finish_reason: "tool_calls",
      },
    ],
  });
}

function sseResponse(events: unknown[]): TransportResponse {
  const body = events.map((e) => `data: ${JSON.stringify(e)}\n\n`).join("") + "data: [DONE]\n\n";
  return { status: 200, body };
}

function requestBody(callIndex: number): Record<string, unknown> {
  const parsed: unknown = JSON.parse(post.mock.calls[callIndex][2]);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("request body is not an object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

function makeAgent(overrides: Partial<AgentOptions> = {}) {
  return createAgent({
    model: "test-model",
    apiKey: "test-key",
    transport: { post },
    ...overrides,
  });
}

const answerSchema: SchemaNode = {
  type: "object",
  properties: { answer: { type: "string" } },
  required: ["answer"],
};

let savedEnv: NodeJS.ProcessEnv;

beforeEach(() => {
  vi.clearAllMocks();
  post.mockReset();
  savedEnv = { ...process.env };
  delete process.env.OPENAI_API_KEY;
});

afterEach(() => {
  process.env = savedEnv;
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe("resolveAgentConfig", () => {
  it("requires a model", () => {
    expect(() => resolveAgentConfig({ model: "" })).toThrow(ConfigError);
    expect(() => resolveAgentConfig({ model: "   " })).toThrow("model is required");
  });

  it("applies defaults and strips trailing slashes from the base URL", () => {
    expect(resolveAgentConfig({ model: "m" }, {}).baseUrl).toBe("https://api.openai.com/v1");
    expect(resolveAgentConfig({ model: "m", baseUrl: "http://localhost:8080/v1//" }, {}).baseUrl).toBe(
      "http://localhost:8080/v1",
    );
  });

  it("captures OPENAI_API_KEY from the environment", () => {
    expect(resolveAgentConfig({ model: "m" }, { OPENAI_API_KEY: "env-key" }).envApiKey).toBe("env-key");
    expect(resolveAgentConfig({ model: "m" }, {}).envApiKey).toBeUndefined();
  });

  it("rejects out-of-range sampling options", () => {
    expect(() => resolveAgentConfig({ model: "m", temperature: 2.5 })).toThrow("temperature must be between 0 and 2");
    expect(() => resolveAgentConfig({ model: "m", maxTokens: 0 })).toThrow("maxTokens must be a positive integer");
  });

  it("fails at construction when the model is missing", () => {
    expect(() => createAgent({ model: "" })).toThrow("model is required");
  });
});

// ---------------------------------------------------------------------------
// Plain text runs
// ---------------------------------------------------------------------------

describe("run: text responses", () => {
  it("returns the assistant content", async () => {
    post.mockResolvedValueOnce(textResponse("Hello"));
    const agent = makeAgent();

    const result = await agent.run("x");

    expect(result.data).toBe("Hello");
    expect(result.messages).toEqual([
      { role: "user", content: "x" },
      { role: "assistant", content: "Hello" },
    ]);
    expect(result.rawResponse.id).toBe("chatcmpl-1");
  });

  it("posts an OpenAI-compatible request", async () => {
    post.mockResolvedValueOnce(textResponse("Hello"));
    await makeAgent().run("Hi there");

    const [url, headers] = post.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-key" });
    expect(requestBody(0)).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "Hi there" }],
    });
  });

  it("includes sampling options, tools and the custom base URL", async () => {
    post.mockResolvedValueOnce(textResponse("ok"));
    const agent = makeAgent({
      baseUrl: "http://localhost:11434/v1/",
      temperature: 0.3,
      maxTokens: 256,
      tools: { ping: { description: "Ping", handler: () => "pong" } },
    });

    await agent.run("go");

    expect(post.mock.calls[0][0]).toBe("http://localhost:11434/v1/chat/completions");
    const body = requestBody(0);
    expect(body.temperature).toBe(0.3);
    expect(body.max_tokens).toBe(256);
    expect(body.tools).toEqual([
      {
        type: "function",
        function: { name: "ping", description: "Ping", parameters: { type: "object", properties: {} } },
      },
    ]);
    expect(body.stream).toBeUndefined();
  });

  it("returns an empty string when the model sends no content", async () => {
    post.mockResolvedValueOnce(
      ok({ choices: [{ index: 0, message: { role: "assistant", content: null }, finish_reason: "stop" }] }),
    );
    const result = await makeAgent().run("x");
    expect(result.data).toBe("");
  });
});

// ---------------------------------------------------------------------------
// System prompt and history
// ---------------------------------------------------------------------------

describe("run: prompt construction", () => {
  it("puts a static system prompt first", async () => {
    post.mockResolvedValueOnce(textResponse("ok"));
    await makeAgent({ systemPrompt: "Be terse." }).run("q");

    expect(requestBody(0).messages).toEqual([
      { role: "system", content: "Be terse." },
      { role: "user", content: "q" },
    ]);
  });

  it("evaluates a dynamic system prompt once per run with the run context", async () => {
    post
      .mockResolvedValueOnce(toolResponse([{ id: "call_1", name: "ping", arguments: "{}" }]))
      .mockResolvedValueOnce(textResponse("done"));
    const systemPrompt = vi.fn((ctx: RunContext) => `User is ${String(ctx.deps.userName)}.`);
    const agent = makeAgent({ systemPrompt, tools: { ping: { handler: () => "pong" } } });

    await agent.run("hello", { deps: { userName: "Alice" } });

    expect(systemPrompt).toHaveBeenCalledTimes(1);
    expect(requestBody(0).messages).toEqual([
      { role: "system", content: "User is Alice." },
      { role: "user", content: "hello" },
    ]);
  });

  it("accepts an async system prompt", async () => {
    post.mockResolvedValueOnce(textResponse("ok"));
    await makeAgent({ systemPrompt: async () => "From a promise." }).run("q");
    expect(requestBody(0).messages).toEqual([
      { role: "system", content: "From a promise." },
      { role: "user", content: "q" },
    ]);
  });

  it("copies history, places the system prompt before it and the prompt after it", async () => {
    post.mockResolvedValueOnce(textResponse("Your name is Bob."));
    const history: Message[] = [
      { role: "user", content: "My name is Bob." },
      { role: "assistant", content: "Nice to meet you, Bob." },
    ];
    const snapshot = structuredClone(history);

    const result = await makeAgent({ systemPrompt: "Remember names." }).run("What is my name?", {
      messageHistory: history,
    });

    expect(history).toEqual(snapshot);
    expect(result.messages).not.toBe(history);
    expect(requestBody(0).messages).toEqual([
      { role: "system", content: "Remember names." },
      { role: "user", content: "My name is Bob." },
      { role: "assistant", content: "Nice to meet you, Bob." },
      { role: "user", content: "What is my name?" },
    ]);
    result.messages[1].content = "changed";
    expect(history[0].content).toBe("My name is Bob.");
  });
});

// ---------------------------------------------------------------------------
// Tool calls
// ---------------------------------------------------------------------------

describe("run: tool calls", () => {
  it("executes tool calls and feeds results back", async () => {
    post
      .mockResolvedValueOnce(toolResponse([{ id: "call_1", name: "get_weather", arguments: '{"city":"Paris"}' }]))
      .mockResolvedValueOnce(textResponse("It is 21 degrees in Paris."));
    const handler = vi.fn<ToolHandler>(() => ({ temp: 21 }));
    const deps = { units: "metric" };

    const result = await makeAgent({ tools: { get_weather: { handler } } }).run("Weather?", { deps });

    expect(result.data).toBe("It is 21 degrees in Paris.");
    expect(handler).toHaveBeenCalledTimes(1);
    const [context, args] = handler.mock.calls[0];
    expect(args).toEqual({ city: "Paris" });
    expect(context.deps).toBe(deps);
    expect(context.messages).toBe(result.messages);

    expect(result.messages).toEqual([
      { role: "user", content: "Weather?" },
      {
        role: "assistant",
        content: null,
        toolCalls: [
          { id: "call_1", type: "function", function: { name: "get_weather", arguments: '{"city":"Paris"}' } },
        ],
      },
      { role: "tool", toolCallId: "call_1", content: '{"temp":21}' },
      { role: "assistant", content: "It is 21 degrees in Paris." },
    ]);

    expect(requestBody(1).messages).toEqual([
      { role: "user", content: "Weather?" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "call_1", type: "function", function: { name: "get_weather", arguments: '{"city":"Paris"}' } },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: '{"temp":21}' },
    ]);
  });

  it("turns a throwing handler into a tool-result error", async () => {
    post
      .mockResolvedValueOnce(toolResponse([{ id: "call_1", name: "explode", arguments: "{}" }]))
      .mockResolvedValueOnce(textResponse("Sorry, that failed."));
    const agent = makeAgent({
      tools: {
        explode: {
          handler: () => {
            throw new Error("boom");
          },
        },
      },
    });

    const result = await agent.run("try it");

    const toolMessage = result.messages.find((m) => m.role === "tool");
    const payload: unknown = JSON.parse(toolMessage?.content ?? "");
    expect(payload).toEqual({ error: "Tool execution failed: boom" });
    expect(result.data).toBe("Sorry, that failed.");
  });

  it("reports unknown tools to the model", async () => {
    post
      .mockResolvedValueOnce(toolResponse([{ id: "call_9", name: "missing", arguments: "{}" }]))
      .mockResolvedValueOnce(textResponse("ok"));

    const result = await makeAgent().run("x");

    expect(result.messages[2]).toEqual({
      role: "tool",
      toolCallId: "call_9",
      content: '{"error":"Tool \'missing\' not found"}',
    });
  });

  it("runs the calls of one turn sequentially in order", async () => {
    const order: string[] = [];
    post
      .mockResolvedValueOnce(
        toolResponse([
          { id: "call_a", name: "slow", arguments: '{"tag":"a"}' },
          { id: "call_b", name: "fast", arguments: '{"tag":"b"}' },
        ]),
      )
      .mockResolvedValueOnce(textResponse("done"));
    const agent = makeAgent({
      tools: {
        slow: {
          handler: async () => {
            order.push("slow:start");
            await new Promise((resolve) => setTimeout(resolve, 5));
            order.push("slow:end");
            return "a";
          },
        },
        fast: {
          handler: () => {
            order.push("fast");
            return "b";
          },
        },
      },
    });

    const result = await agent.run("both");

    expect(order).toEqual(["slow:start", "slow:end", "fast"]);
    expect(result.messages.filter((m) => m.role === "tool").map((m) => m.toolCallId)).toEqual(["call_a", "call_b"]);
  });

  it("supports tools registered after construction", async () => {
    post
      .mockResolvedValueOnce(toolResponse([{ id: "call_1", name: "late", arguments: "{}" }]))
      .mockResolvedValueOnce(textResponse("ok"));
    const agent = makeAgent();
    agent.tool("late", { description: "Added later", handler: () => "here" });

    const result = await agent.run("x");

    expect(agent.toolSpecs().map((t) => t.function.name)).toEqual(["late"]);
    expect(result.messages[2]?.content).toBe("here");
  });
});

// ---------------------------------------------------------------------------
// Structured output
// ---------------------------------------------------------------------------

describe("run: structured output", () => {
  it("returns the validated final_answer arguments", async () => {
    post.mockResolvedValueOnce(toolResponse([{ id: "call_f", name: "final_answer", arguments: '{"answer":"42"}' }]));

    const result = await makeAgent({ outputSchema: answerSchema }).run("Meaning of life?");

    expect(result.data).toEqual({ answer: "42" });
    expect(result.messages.at(-1)?.role).toBe("assistant");
    expect(result.messages.some((m) => m.role === "tool")).toBe(false);
  });

  it("advertises final_answer and appends the instruction to the system prompt", async () => {
    post.mockResolvedValueOnce(toolResponse([{ id: "call_f", name: "final_answer", arguments: '{"answer":"x"}' }]));

    await makeAgent({ systemPrompt: "Be terse.", outputSchema: answerSchema }).run("q");

    const body = requestBody(0);
    expect(body.messages).toEqual([
      {
        role: "system",
        content:
          "Be terse.\n\nWhen you are ready to provide your final answer, you MUST call the 'final_answer' function with the structured data.",
      },
      { role: "user", content: "q" },
    ]);
    expect(body.tools).toEqual([
      {
        type: "function",
        function: {
          name: "final_answer",
          description: "Call this function to return your final answer with structured data",
          parameters: answerSchema,
        },
      },
    ]);
  });

  it("uses the instruction alone when there is no base prompt", async () => {
    post.mockResolvedValueOnce(toolResponse([{ id: "call_f", name: "final_answer", arguments: '{"answer":"x"}' }]));
    await makeAgent({ outputSchema: answerSchema }).run("q");

    expect(requestBody(0).messages).toEqual([
      {
        role: "system",
        content: "When you are ready to provide your final answer, you MUST call the 'final_answer' function with the structured data.",
      },
      { role: "user", content: "q" },
    ]);
  });

  it("fails when the answer does not match the schema", async () => {
    post.mockResolvedValueOnce(toolResponse([{ id: "call_f", name: "final_answer", arguments: '{"wrong":"x"}' }]));
    const run = makeAgent({ outputSchema: answerSchema }).run("q");

    await expect(run).rejects.toThrow(OutputValidationError);
    await expect(run).rejects.toThrow("Output validation failed: Required property 'answer' is missing");
  });

  it("fails when the answer is not JSON", async () => {
    post.mockResolvedValueOnce(toolResponse([{ id: "call_f", name: "final_answer", arguments: "{oops" }]));
    await expect(makeAgent({ outputSchema: answerSchema }).run("q")).rejects.toThrow(
      /^Output validation failed: arguments of 'final_answer' are not valid JSON/,
    );
  });

  it("fails when the model answers in plain text", async () => {
    post.mockResolvedValueOnce(textResponse("42"));
    await expect(makeAgent({ outputSchema: answerSchema }).run("q")).rejects.toThrow(
      "Model did not call the 'final_answer' tool for structured output",
    );
  });

  it("skips the rest of a batch that contains final_answer", async () => {
    const handler = vi.fn<ToolHandler>(() => "side effect");
    post.mockResolvedValueOnce(
      toolResponse([
        { id: "call_1", name: "record", arguments: "{}" },
        { id: "call_f", name: "final_answer", arguments: '{"answer":"done"}' },
      ]),
    );

    const result = await makeAgent({ outputSchema: answerSchema, tools: { record: { handler } } }).run("q");

    expect(result.data).toEqual({ answer: "done" });
    expect(handler).not.toHaveBeenCalled();
  });

  it("runs regular tools before the final answer arrives", async () => {
    post
      .mockResolvedValueOnce(toolResponse([{ id: "call_1", name: "lookup", arguments: '{"q":"x"}' }]))
      .mockResolvedValueOnce(toolResponse([{ id: "call_f", name: "final_answer", arguments: '{"answer":"found"}' }]));
    const handler = vi.fn<ToolHandler>(() => ({ hit: true }));

    const result = await makeAgent({ outputSchema: answerSchema, tools: { lookup: { handler } } }).run("q");

    expect(handler).toHaveBeenCalledTimes(1);
    expect(result.data).toEqual({ answer: "found" });
    expect(result.messages.map((m) => m.role)).toEqual(["system", "user", "assistant", "tool", "assistant"]);
  });

  it("rejects a user tool named final_answer when an output schema is set", () => {
    expect(() =>
      makeAgent({ outputSchema: answerSchema, tools: { final_answer: { handler: () => "mine" } } }),
    ).toThrow(ConfigError);
  });
});

// ---------------------------------------------------------------------------
// Streaming
// ---------------------------------------------------------------------------

describe("run: streaming", () => {
  it("streams content through onChunk and returns the assembled text", async () => {
    post.mockResolvedValueOnce(
      sseResponse([
        { id: "s1", choices: [{ index: 0, delta: { role: "assistant", content: "Hello" } }] },
        { id: "s1", choices: [{ index: 0, delta: { content: " World" } }] },
        { id: "s1", choices: [{ index: 0, delta: {}, finish_reason: "stop" }] },
      ]),
    );
    const chunks: StreamChunk[] = [];

    const result = await makeAgent().run("hi", { stream: true, onChunk: (c) => chunks.push(c) });

    expect(result.data).toBe("Hello World");
    expect(chunks).toEqual([
      { type: "content", content: "Hello" },
      { type: "content", content: " World" },
    ]);
    expect(requestBody(0).stream).toBe(true);
    expect(result.rawResponse.choices[0]?.finish_reason).toBe("stop");
  });

  it("executes streamed tool calls once the stream is complete", async () => {
    post
      .mockResolvedValueOnce(
        sseResponse([
          {
            choices: [
              {
                index: 0,
                delta: {
                  tool_calls: [{ index: 0, id: "call_s", type: "function", function: { name: "add", arguments: "" } }],
                },
              },
            ],
          },
          { choices: [{ index: 0, delta: { tool_calls: [{ index: 0, function: { arguments: '{"a":2,' } }] } }] },
          { choices: [{ index: 0, delta: { tool_calls: [{ index: 0, function: { arguments: '"b":3}' } }] } }] },
          { choices: [{ index: 0, delta: {}, finish_reason: "tool_calls" }] },
        ]),
      )
      .mockResolvedValueOnce(sseResponse([{ choices: [{ index: 0, delta: { content: "5" }, finish_reason: "stop" }] }]));
    const add = vi.fn<ToolHandler>((_ctx, args) => {
      if (typeof args !== "object" || args === null) return "bad args";
      const { a, b } = Object.fromEntries(Object.entries(args));
      return Number(a) + Number(b);
    });
    const types: string[] = [];

    const result = await makeAgent({ tools: { add: { handler: add } } }).run("2+3", {
      stream: true,
      onChunk: (c) => types.push(c.type),
    });

    expect(add).toHaveBeenCalledTimes(1);
    expect(add.mock.calls[0][1]).toEqual({ a: 2, b: 3 });
    expect(result.messages[2]).toEqual({ role: "tool", toolCallId: "call_s", content: "5" });
    expect(result.data).toBe("5");
    expect(types).toEqual(["tool_call_start", "tool_call_delta", "tool_call_delta", "tool_call_end", "content"]);
  });

  it("executes streamed tool calls even when the stream ends on a length cutoff", async () => {
    post
      .mockResolvedValueOnce(
        sseResponse([
          {
            choices: [
              {
                index: 0,
                delta: { tool_calls: [{ index: 0, id: "call_t", function: { name: "note", arguments: '{"text":"hi"}' } }] },
              },
            ],
          },
          { choices: [{ index: 0, delta: {}, finish_reason: "length" }] },
        ]),
      )
      .mockResolvedValueOnce(sseResponse([{ choices: [{ index: 0, delta: { content: "noted" }, finish_reason: "stop" }] }]));
    const note = vi.fn<ToolHandler>(() => "saved");

    const result = await makeAgent({ tools: { note: { handler: note } } }).run("remember hi", { stream: true });

    expect(note).toHaveBeenCalledTimes(1);
    expect(note.mock.calls[0][1]).toEqual({ text: "hi" });
    expect(result.messages[2]).toEqual({ role: "tool", toolCallId: "call_t", content: "saved" });
    expect(result.data).toBe("noted");
  });

  it("reports a truncated tool call to the model as a failed execution", async () => {
    post
      .mockResolvedValueOnce(
        sseResponse([
          {
            choices: [
              {
                index: 0,
                delta: { tool_calls: [{ index: 0, id: "call_t", function: { name: "note", arguments: '{"text":"h' } }] },
                finish_reason: "length",
              },
            ],
          },
        ]),
      )
      .mockResolvedValueOnce(sseResponse([{ choices: [{ index: 0, delta: { content: "retrying" } }] }]));
    const note = vi.fn<ToolHandler>(() => "saved");

    const result = await makeAgent({ tools: { note: { handler: note } } }).run("remember hi", { stream: true });

    expect(note).not.toHaveBeenCalled();
    const toolMessage = result.messages[2];
    expect(toolMessage?.role).toBe("tool");
    expect(toolMessage?.content).toMatch(/^\{"error":"Tool execution failed: /);
  });

  it("streams without a chunk callback", async () => {
    post.mockResolvedValueOnce(sseResponse([{ choices: [{ index: 0, delta: { content: "quiet" } }] }]));
    const result = await makeAgent().run("hi", { stream: true });
    expect(result.data).toBe("quiet");
  });

  it("returns structured output from a streamed final_answer", async () => {
    post.mockResolvedValueOnce(
      sseResponse([
        {
          choices: [
            {
              index: 0,
              delta: {
                tool_calls: [{ index: 0, id: "call_f", function: { name: "final_answer", arguments: '{"answer":' } }],
              },
            },
          ],
        },
        { choices: [{ index: 0, delta: { tool_calls: [{ index: 0, function: { arguments: '"streamed"}' } }] } }] },
      ]),
    );
    const result = await makeAgent({ outputSchema: answerSchema }).run("q", { stream: true });
    expect(result.data).toEqual({ answer: "streamed" });
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("run: failures", () => {
  it("stops at the iteration bound", async () => {
    post.mockImplementation(async () => toolResponse([{ id: "call_1", name: "loop", arguments: "{}" }]));
    const run = makeAgent({ tools: { loop: { handler: () => "again" } } }).run("x", { maxIterations: 3 });

    await expect(run).rejects.toThrow(IterationLimitError);
    await expect(run).rejects.toThrow("Max iterations (3) reached");
    expect(post).toHaveBeenCalledTimes(3);
  });

  it("defaults to ten iterations", async () => {
    post.mockImplementation(async () => toolResponse([{ id: "call_1", name: "loop", arguments: "{}" }]));
    await expect(makeAgent({ tools: { loop: { handler: () => "again" } } }).run("x")).rejects.toThrow(
      "Max iterations (10) reached",
    );
    expect(post).toHaveBeenCalledTimes(10);
  });

  it("rejects a non-positive iteration bound", async () => {
    await expect(makeAgent().run("x", { maxIterations: 0 })).rejects.toThrow(ConfigError);
    expect(post).not.toHaveBeenCalled();
  });

  it("propagates non-2xx responses with status and body", async () => {
    post.mockResolvedValueOnce({ status: 401, body: '{"error":"unauthorized"}' });

    const error = await makeAgent().run("x").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      status: 401,
      body: '{"error":"unauthorized"}',
      message: 'API error (status 401): {"error":"unauthorized"}',
    });
  });

  it("fails on a body that is not JSON", async () => {
    post.mockResolvedValueOnce({ status: 200, body: "<html>" });
    await expect(makeAgent().run("x")).rejects.toThrow(ProtocolError);
  });

  it("fails on a response without choices", async () => {
    post.mockResolvedValueOnce(ok({ choices: [] }));
    await expect(makeAgent().run("x")).rejects.toThrow("API returned no choices in response");
  });
});

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

describe("run: credentials", () => {
  function authHeader(callIndex = 0): string | undefined {
    return post.mock.calls[callIndex][1].Authorization;
  }

  it("fails before any request when no key is available", async () => {
    const agent = createAgent({ model: "test-model", transport: { post } });
    await expect(agent.run("x")).rejects.toThrow(
      "API key not provided. Set via config, deps, or OPENAI_API_KEY env var",
    );
    expect(post).not.toHaveBeenCalled();
  });

  it("uses deps.apiKey when the config has none", async () => {
    post.mockResolvedValueOnce(textResponse("ok"));
    await createAgent({ model: "test-model", transport: { post } }).run("x", { deps: { apiKey: "deps-key" } });
    expect(authHeader()).toBe("Bearer deps-key");
  });

  it("prefers the configured key over deps", async () => {
    post.mockResolvedValueOnce(textResponse("ok"));
    await makeAgent().run("x", { deps: { apiKey: "deps-key" } });
    expect(authHeader()).toBe("Bearer test-key");
  });

  it("falls back to OPENAI_API_KEY read at construction", async () => {
    process.env.OPENAI_API_KEY = "env-key";
    const agent = createAgent({ model: "test-model", transport: { post } });
    delete process.env.OPENAI_API_KEY;
    post.mockResolvedValueOnce(textResponse("ok"));

    await agent.run("x");

    expect(authHeader()).toBe("Bearer env-key");
  });
});

// ---------------------------------------------------------------------------
// Default transport
// ---------------------------------------------------------------------------

describe("default transport", () => {
  it("is created lazily on the global fetch", async () => {
    const fetchMock = vi.fn(async () => ({
      status: 200,
      text: async () => textResponse("via fetch").body,
    }));
    vi.stubGlobal("fetch", fetchMock);

    const agent = createAgent({ model: "test-model", apiKey: "test-key" });
    expect(fetchMock).not.toHaveBeenCalled();

    const result = await agent.run("x");

    expect(result.data).toBe("via fetch");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
