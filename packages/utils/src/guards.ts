/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}

export function isDefined<T>(value: T | undefined | null): value is T {
  return value !== undefined && value !== null;
}

/**
 * Parse a numeric string the way ffprobe prints them ("123.456", "N/A").
 * Returns null for anything that is not a finite number.
 */
export function parseNumeric(value: string | number | undefined | null): number | null {
  if (!isDefined(value)) return null;
  if (isNumber(value)) return Number.isFinite(value) ? value : null;
  if (!isNonEmptyString(value)) return null;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}
