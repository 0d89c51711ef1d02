/**
 * Resolve an environment variable reference.
 *
 * If ref starts with "env:", strips the prefix and looks up the env var.
 * Returns the raw value otherwise. Returns '' for null/undefined/missing refs.
 *
 * A missing env: target is reported on stderr; the shared logger cannot
 * be used here because it depends on the config module.
 */
export function resolveEnvRef(
  ref: string | undefined | null,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (!ref) return '';
  const trimmed = ref.trim();
  if (trimmed.startsWith('env:')) {
    const varName = trimmed.slice(4);
    const value = env[varName];
    if (value === undefined) {
      console.warn(`resolveEnvRef: environment variable "${varName}" is not set (ref="${trimmed}")`);
      return '';
    }
    return value;
  }
  return trimmed;
}
