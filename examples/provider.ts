import { detectProvider, loadDotenv, type DetectedProvider } from "../src/index.js";

/** Loads `.env` and picks the first provider whose API key is set, or exits. */
export function requireProvider(): DetectedProvider {
  loadDotenv();
  const provider = detectProvider();
  if (!provider) {
    console.error(
      "No provider API key found. Set one of XAI_API_KEY, ANTHROPIC_API_KEY, OPENAI_API_KEY, TOGETHER_API_KEY or GROQ_API_KEY.",
    );
    process.exit(1);
  }
  return provider;
}
