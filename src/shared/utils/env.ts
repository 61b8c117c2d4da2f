/**
 * Environment parsing helpers used by the module config objects
 */

export function parseIntEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseFloatEnv(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Comma-separated list, trimmed and lowercased, empty items dropped
 */
export function parseListEnv(value: string | undefined, fallback: readonly string[]): string[] {
  if (!value || !value.trim()) {
    return [...fallback];
  }
  return value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * JSON object of string values, e.g. TTS_VOICE_MAP={"en":"voice-id"}
 * Throws on malformed JSON so a bad deployment fails at startup.
 */
export function parseRecordEnv(
  name: string,
  value: string | undefined,
  fallback: Readonly<Record<string, string>>
): Record<string, string> {
  if (!value || !value.trim()) {
    return { ...fallback };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new Error(`${name} must be valid JSON`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${name} must be a JSON object of strings`);
  }

  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (typeof entry !== 'string' || !entry.trim()) {
      throw new Error(`${name}.${key} must be a non-empty string`);
    }
    record[key.trim().toLowerCase()] = entry.trim();
  }
  return record;
}
