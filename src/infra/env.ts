export function optionalEnv(
  key: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const trimmed = env[key]?.trim();
  return trimmed ? trimmed : fallback;
}
