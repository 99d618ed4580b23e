#!/usr/bin/env node
import { parseCliArgs } from "./args.js";
import { createAgent } from "../agent/agent.js";
import { loadConfig } from "../config/config.js";
import { detectProvider } from "../providers/detect.js";
import { loadDotenv } from "../infra/dotenv.js";
import { formatError } from "../infra/errors.js";
import { createLogger } from "../logging.js";

const log = createLogger("cli");

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv);

  loadDotenv();
  const config = loadConfig();
  const detected = detectProvider();

  const model = args.model ?? config.agent?.model ?? detected?.model;
  if (!model) {
    throw new Error("No model configured. Pass --model, set agent.model in agentloop.config.yaml, or set a provider API key.");
  }
  if (detected) {
    log.debug(`Using provider ${detected.provider}`);
  }

  const agent = createAgent({
    model,
    baseUrl: config.agent?.baseUrl ?? detected?.baseUrl,
    apiKey: detected?.apiKey,
    systemPrompt: config.agent?.systemPrompt,
    temperature: config.agent?.temperature,
    maxTokens: config.agent?.maxTokens,
  });

  const stream = args.stream || config.agent?.stream === true;
  const result = await agent.run(args.prompt, {
    maxIterations: args.maxIterations ?? config.agent?.maxIterations,
    stream,
    onChunk: (chunk) => {
      if (chunk.type === "content") {
        process.stdout.write(chunk.content);
      }
    },
  });

  if (stream) {
    process.stdout.write("\n");
  } else {
    console.log(typeof result.data === "string" ? result.data : JSON.stringify(result.data, null, 2));
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  log.debug(formatError(err));
  process.exit(1);
});
