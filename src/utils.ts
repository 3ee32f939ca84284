export const envOverrides: string[] = [];

/**
 * Override a value with supplied environment variable if present. A function
 * that returns the environment variable in an acceptable format can be
 * provided. If it throws an error, the default value will be used.
 */
export function envOverride(
  envname: string,
  value: string,
  coerce?: (value: string, defaultValue: string) => string,
): string {
  const currentEnvValue = process.env[envname];
  if (currentEnvValue && currentEnvValue.length) {
    envOverrides.push(envname);
    if (coerce) {
      try {
        return coerce(currentEnvValue, value);
      } catch (e: unknown) {
        return value;
      }
    }
    return currentEnvValue;
  }
  return value;
}

/**
 * Returns the first non-empty value of the given environment variables.
 */
export function firstEnv(...envnames: string[]): string | undefined {
  for (const name of envnames) {
    const value = process.env[name];
    if (value) {
      return value;
    }
  }
  return undefined;
}
