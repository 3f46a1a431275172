/**
 * Copy of `defaults` with every entry of `overrides` laid over it. Neither input is touched.
 */
export function mergeEnv(
  defaults: Readonly<Record<string, string>>,
  overrides: Readonly<Record<string, string>>,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(defaults)) env[key] = value;
  for (const [key, value] of Object.entries(overrides)) env[key] = value;
  return env;
}

/**
 * `[flag, 'K=V', flag, 'K=V', ...]` in lexicographic key order, so the same
 * env always yields the same command line.
 */
export function envFlags(flag: string, env: Readonly<Record<string, string>>): string[] {
  return Object.keys(env)
    .sort()
    .flatMap((key) => [flag, `${key}=${env[key]}`]);
}
