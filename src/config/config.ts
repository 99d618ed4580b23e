import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { AgentLoopConfig } from "./types.js";
import { ConfigError } from "../infra/errors.js";
import { describeError, isRecord } from "../utils.js";

export const CONFIG_FILENAMES = [
  "agentloop.config.yaml",
  "agentloop.config.yml",
  "agentloop.config.json",
];

const STRING_KEYS = ["model", "baseUrl", "systemPrompt"] as const;

function validateConfig(value: unknown): AgentLoopConfig {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError("Config must be an object");
  }
  const agent = value.agent;
  if (agent === undefined) {
    return {};
  }
  if (!isRecord(agent)) {
    throw new ConfigError("Config 'agent' must be an object");
  }

  for (const key of STRING_KEYS) {
    if (agent[key] !== undefined && typeof agent[key] !== "string") {
      throw new ConfigError(`Config 'agent.${key}' must be a string`);
    }
  }
  const { temperature, maxTokens, maxIterations, stream } = agent;
  if (temperature !== undefined && (typeof temperature !== "number" || temperature < 0 || temperature > 2)) {
    throw new ConfigError("agent.temperature must be between 0 and 2");
  }
  if (maxTokens !== undefined && (typeof maxTokens !== "number" || !Number.isInteger(maxTokens) || maxTokens < 1)) {
    throw new ConfigError("agent.maxTokens must be a positive integer");
  }
  if (
    maxIterations !== undefined &&
    (typeof maxIterations !== "number" || !Number.isInteger(maxIterations) || maxIterations < 1)
  ) {
    throw new ConfigError("agent.maxIterations must be a positive integer");
  }
  if (stream !== undefined && typeof stream !== "boolean") {
    throw new ConfigError("Config 'agent.stream' must be a boolean");
  }

  return {
    agent: {
      model: typeof agent.model === "string" ? agent.model : undefined,
      baseUrl: typeof agent.baseUrl === "string" ? agent.baseUrl : undefined,
      systemPrompt: typeof agent.systemPrompt === "string" ? agent.systemPrompt : undefined,
      temperature: typeof temperature === "number" ? temperature : undefined,
      maxTokens: typeof maxTokens === "number" ? maxTokens : undefined,
      maxIterations: typeof maxIterations === "number" ? maxIterations : undefined,
      stream: typeof stream === "boolean" ? stream : undefined,
    },
  };
}

export function loadConfig(dir?: string): AgentLoopConfig {
  const baseDir = dir ?? process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(baseDir, filename);
    if (existsSync(filepath)) {
      let raw: string;
      try {
        raw = readFileSync(filepath, "utf-8");
      } catch (err) {
        throw new ConfigError(`Failed to read config file ${filepath}: ${describeError(err)}`);
      }
      let parsed: unknown;
      try {
        parsed = filename.endsWith(".json")
          ? JSON.parse(raw)
          : (parseYaml(raw) ?? {});
      } catch (err) {
        throw new ConfigError(`Failed to parse config file ${filepath}: ${describeError(err)}`);
      }
      return validateConfig(parsed);
    }
  }

  return {};
}
