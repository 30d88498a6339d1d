/**
 * Read an integer variable, falling back when unset or blank.
 * Values are range-checked at boot by `validateEnvironment`.
 */
export function readIntFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}
