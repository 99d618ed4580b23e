import { createAgent, type StreamChunk } from "../src/index.js";
import { requireProvider } from "./provider.js";

function printChunk(chunk: StreamChunk): void {
  switch (chunk.type) {
    case "content":
      process.stdout.write(chunk.content);
      break;
    case "tool_call_start":
      process.stdout.write(`\n[tool call ${chunk.index} started: ${chunk.id}]\n`);
      break;
    case "tool_call_delta":
      break;
    case "tool_call_end":
      process.stdout.write(`[${chunk.toolCall.function.name}(${chunk.toolCall.function.arguments})]\n`);
      break;
  }
}

const provider = requireProvider();
const agent = createAgent({
  model: provider.model,
  baseUrl: provider.baseUrl,
  apiKey: provider.apiKey,
  systemPrompt: "You are a helpful assistant. Use the calculator for arithmetic.",
  tools: {
    calculate: {
      description: "Evaluate a binary arithmetic operation",
      parameters: {
        type: "object",
        properties: {
          operation: { type: "string", enum: ["add", "subtract", "multiply", "divide"] },
          a: { type: "number" },
          b: { type: "number" },
        },
        required: ["operation", "a", "b"],
      },
      handler: (_ctx, args) => {
        const get = (key: string): unknown =>
          typeof args === "object" && args !== null ? Object.getOwnPropertyDescriptor(args, key)?.value : undefined;
        const a = Number(get("a"));
        const b = Number(get("b"));
        switch (get("operation")) {
          case "add":
            return { result: a + b };
          case "subtract":
            return { result: a - b };
          case "multiply":
            return { result: a * b };
          case "divide":
            return b === 0 ? { error: "Division by zero" } : { result: a / b };
          default:
            return { error: "Unknown operation" };
        }
      },
    },
  },
});

console.log("=== Streaming a story ===");
await agent.run("Tell me a very short story about a robot.", { stream: true, onChunk: printChunk });

console.log("\n\n=== Streaming with tools ===");
const result = await agent.run("What is 127 multiplied by 43?", { stream: true, onChunk: printChunk });
console.log(`\n\nMessages exchanged: ${result.messages.length}`);
