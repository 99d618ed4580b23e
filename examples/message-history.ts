import { createAgent } from "../src/index.js";
import { requireProvider } from "./provider.js";

const provider = requireProvider();
const agent = createAgent({
  model: provider.model,
  baseUrl: provider.baseUrl,
  apiKey: provider.apiKey,
  systemPrompt: "You are a friendly assistant with a good memory.",
});

const first = await agent.run("My name is Alice and I like tea.");
console.log(`Assistant: ${String(first.data)}`);

// The system prompt is rebuilt every run, so only the conversation itself is carried over.
const history = first.messages.filter((m) => m.role !== "system");
const second = await agent.run("What's my name, and what do I like to drink?", { messageHistory: history });
console.log(`Assistant: ${String(second.data)}`);
console.log(`History length after two turns: ${second.messages.length}`);
