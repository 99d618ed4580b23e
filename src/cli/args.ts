export type CliArgs = {
  prompt: string;
  stream: boolean;
  maxIterations?: number;
  model?: string;
};

export const USAGE = "Usage: agentloop [--stream] [--max-iterations <n>] [--model <name>] <prompt...>";

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = argv.slice(2);
  const skipIndices = new Set<number>();

  const streamIdx = args.indexOf("--stream");
  const stream = streamIdx >= 0;
  if (stream) skipIndices.add(streamIdx);

  const valueOf = (flag: string): string | undefined => {
    const idx = args.indexOf(flag);
    if (idx < 0) {
      return undefined;
    }
    const value = args[idx + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${flag}\n${USAGE}`);
    }
    skipIndices.add(idx);
    skipIndices.add(idx + 1);
    return value;
  };

  const model = valueOf("--model");
  const rawIterations = valueOf("--max-iterations");
  let maxIterations: number | undefined;
  if (rawIterations !== undefined) {
    maxIterations = Number(rawIterations);
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new Error(`--max-iterations must be a positive integer, got "${rawIterations}"`);
    }
  }

  const prompt = args
    .filter((arg, i) => !skipIndices.has(i) && !arg.startsWith("--"))
    .join(" ")
    .trim();
  if (!prompt) {
    throw new Error(USAGE);
  }

  return { prompt, stream, maxIterations, model };
}
