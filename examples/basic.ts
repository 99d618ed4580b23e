import { createAgent } from "../src/index.js";
import { requireProvider } from "./provider.js";

const provider = requireProvider();
console.log(`Provider: ${provider.provider} (${provider.model})`);

const agent = createAgent({
  model: provider.model,
  baseUrl: provider.baseUrl,
  apiKey: provider.apiKey,
  systemPrompt: "You are a helpful assistant that provides concise answers.",
});

const result = await agent.run("What is the capital of France?");
console.log(`Answer: ${String(result.data)}`);
