import { createAgent, type RunContext } from "../src/index.js";
import { requireProvider } from "./provider.js";

function persona(ctx: RunContext): string {
  const personality = typeof ctx.deps.personality === "string" ? ctx.deps.personality : "helpful";
  const expertise = typeof ctx.deps.expertise === "string" ? ctx.deps.expertise : "general topics";
  return `You are a ${personality} assistant with expertise in ${expertise}. Respond accordingly.`;
}

const provider = requireProvider();
const agent = createAgent({
  model: provider.model,
  baseUrl: provider.baseUrl,
  apiKey: provider.apiKey,
  systemPrompt: persona,
});

const enthusiastic = await agent.run("Explain quantum computing in two sentences.", {
  deps: { personality: "enthusiastic", expertise: "physics" },
});
console.log(`Enthusiastic physicist: ${String(enthusiastic.data)}`);

const concise = await agent.run("Explain quantum computing in two sentences.", {
  deps: { personality: "concise", expertise: "computer science" },
});
console.log(`\nConcise CS expert: ${String(concise.data)}`);
