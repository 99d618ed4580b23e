import { z } from "zod";
import { createAgent, type SchemaNode } from "../src/index.js";
import { requireProvider } from "./provider.js";

const SentimentSchema = z.object({
  sentiment: z.enum(["positive", "negative", "neutral"]),
  confidence: z.number(),
  reasoning: z.string(),
});

const outputSchema: SchemaNode = {
  type: "object",
  properties: {
    sentiment: { type: "string", enum: ["positive", "negative", "neutral"] },
    confidence: { type: "number", description: "Confidence score between 0 and 1" },
    reasoning: { type: "string", description: "Brief explanation of the sentiment" },
  },
  required: ["sentiment", "confidence", "reasoning"],
  additionalProperties: false,
};

const provider = requireProvider();
const agent = createAgent({
  model: provider.model,
  baseUrl: provider.baseUrl,
  apiKey: provider.apiKey,
  systemPrompt: "You analyze the sentiment of text.",
  outputSchema,
});

const result = await agent.run("I absolutely love this product! It exceeded all my expectations.");

// The agent checks shape and types; zod gives the value a static type here.
const sentiment = SentimentSchema.parse(result.data);
console.log(`Sentiment: ${sentiment.sentiment}`);
console.log(`Confidence: ${sentiment.confidence}`);
console.log(`Reasoning: ${sentiment.reasoning}`);
