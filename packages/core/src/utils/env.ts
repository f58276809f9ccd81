// Environment variable helpers
// Absent values fall back to an explicit default; malformed ones are fatal

export function getEnv(name: string, defaultValue: string): string {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : defaultValue;
}

/**
 * Get environment variable as integer
 * A value that is present but not an integer throws instead of falling back
 */
export function getEnvInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value || value.trim() === '') {
    return defaultValue;
  }

  const intValue = Number(value.trim());
  if (!Number.isInteger(intValue)) {
    throw new Error(`FATAL: ${name} environment variable must be a valid integer. Got: "${value}"`);
  }

  return intValue;
}
