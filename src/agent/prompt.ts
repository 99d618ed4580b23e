import type { RunContext, SystemPrompt } from "./types.js";

export function outputToolInstruction(toolName: string): string {
  return `When you are ready to provide your final answer, you MUST call the '${toolName}' function with the structured data.`;
}

/**
 * Resolves the system prompt for one run. A function prompt is evaluated with
 * the run context; the output-tool instruction, if any, goes after the base.
 */
export async function buildSystemPrompt(params: {
  systemPrompt?: SystemPrompt;
  context: RunContext;
  outputToolName?: string;
}): Promise<string> {
  const parts: string[] = [];

  const base =
    typeof params.systemPrompt === "function"
      ? await params.systemPrompt(params.context)
      : params.systemPrompt;
  if (base) {
    parts.push(base);
  }

  if (params.outputToolName) {
    parts.push(outputToolInstruction(params.outputToolName));
  }

  return parts.join("\n\n");
}
