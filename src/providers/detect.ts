import { optionalEnv } from "../infra/env.js";

export type ProviderPreset = {
  name: string;
  envVar: string;
  baseUrl: string;
  model: string;
};

export type DetectedProvider = {
  provider: string;
  baseUrl: string;
  model: string;
  apiKey: string;
};

/** Checked in this order; the first variable that is set wins. */
export const PROVIDER_PRESETS: readonly ProviderPreset[] = [
  { name: "xAI", envVar: "XAI_API_KEY", baseUrl: "https://api.x.ai/v1", model: "grok-4-fast" },
  {
    name: "Anthropic",
    envVar: "ANTHROPIC_API_KEY",
    baseUrl: "https://api.anthropic.com/v1",
    model: "claude-4-5-haiku",
  },
  { name: "OpenAI", envVar: "OPENAI_API_KEY", baseUrl: "https://api.openai.com/v1", model: "gpt-4o-mini" },
  {
    name: "Together AI",
    envVar: "TOGETHER_API_KEY",
    baseUrl: "https://api.together.xyz/v1",
    model: "meta-llama/Meta-Llama-3.1-8B-Instruct-Turbo",
  },
  {
    name: "Groq",
    envVar: "GROQ_API_KEY",
    baseUrl: "https://api.groq.com/openai/v1",
    model: "llama-3.1-8b-instant",
  },
];

export function detectProvider(env: NodeJS.ProcessEnv = process.env): DetectedProvider | undefined {
  for (const preset of PROVIDER_PRESETS) {
    const apiKey = optionalEnv(preset.envVar, undefined, env);
    if (apiKey) {
      return {
        provider: preset.name,
        baseUrl: preset.baseUrl,
        model: preset.model,
        apiKey,
      };
    }
  }
  return undefined;
}
