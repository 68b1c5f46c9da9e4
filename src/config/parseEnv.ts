/**
 * Environment variable parsing utilities with robust boolean/int/string handling
 * Addresses truthy coercion pitfalls where "false" string evaluates to true
 */

/**
 * Parse boolean environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty
 * @returns Parsed boolean
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  // Invalid value - return default
  return defaultValue;
}

/**
 * Parse integer environment variable, clamped to [min, max] when given
 */
export function parseIntEnv(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    return defaultValue;
  }

  let result = parsed;

  if (min !== undefined && result < min) {
    result = min;
  }

  if (max !== undefined && result > max) {
    result = max;
  }

  return result;
}

/**
 * Get string environment variable with optional default
 */
export function getEnvString(
  value: string | undefined,
  defaultValue?: string
): string | undefined {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  return value.trim();
}

/**
 * Parse a `KEY:value,KEY:value` list into an ordered map.
 * Entries without a separator or with an empty side are skipped.
 *
 * @example
 * parsePairListEnv('WETH:0xabc,WBTC:0xdef')
 * // => Map { 'WETH' => '0xabc', 'WBTC' => '0xdef' }
 */
export function parsePairListEnv(value: string | undefined): Map<string, string> {
  const pairs = new Map<string, string>();
  if (value === undefined || value.trim() === '') {
    return pairs;
  }

  for (const entry of value.split(',')) {
    const separator = entry.indexOf(':');
    if (separator <= 0) continue;

    const key = entry.slice(0, separator).trim();
    const pairValue = entry.slice(separator + 1).trim();
    if (key.length > 0 && pairValue.length > 0) {
      pairs.set(key, pairValue);
    }
  }

  return pairs;
}
