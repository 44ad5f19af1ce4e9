/**
 * Override a value with supplied environment variable if present. A function
 * that returns the environment variable in an acceptable format can be
 * provided. If it throws an error, the default value will be used.
 */
export function envOverride(envname: string, value: string): string;
export function envOverride<T>(
  envname: string,
  value: T,
  coerce: (value: string, defaultValue: T) => T,
): T;
export function envOverride<T>(
  envname: string,
  value: T | string,
  coerce?: (value: string, defaultValue: T | string) => T,
): T | string {
  const currentEnvValue = process.env[envname];
  if (currentEnvValue && currentEnvValue.length) {
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
 * Parses a non-negative integer, throwing if the string is not one.
 * Meant as an `envOverride` coercer.
 */
export function toMillis(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`"${value}" is not a duration in milliseconds`);
  }
  return n;
}

/**
 * Same as toMillis, except that 0 is refused as well.
 */
export function toPositiveMillis(value: string): number {
  const n = toMillis(value);
  if (n === 0) {
    throw new Error(`"${value}" is not a positive duration in milliseconds`);
  }
  return n;
}

export function tryStringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }

  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/**
 * Resolves after the given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
