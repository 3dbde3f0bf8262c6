/**
 * Utility functions for environment variable parsing
 */

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

/**
 * Parse a boolean environment variable that accepts multiple truthy/falsy values:
 * - Truthy: "1", "true", "yes", "on" (case insensitive)
 * - Falsy: "0", "false", "no", "off" (case insensitive)
 * Anything else (including undefined/empty) yields the default.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  return defaultValue;
}

export function getBooleanEnv(name: string, defaultValue = false): boolean {
  return parseBooleanEnv(process.env[name], defaultValue);
}

/**
 * Read an environment variable constrained to a fixed set of values.
 * Comparison is case-insensitive; unknown values fall back to the default.
 */
export function getEnumEnv<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  const hit = allowed.find(v => v === normalized);
  return hit ?? defaultValue;
}

/** Non-empty trimmed string or undefined. */
export function getOptionalStringEnv(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length ? trimmed : undefined;
}
