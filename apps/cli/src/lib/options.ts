/**
 * Command option parsing
 */

import { SplitError, type SplitUnit } from '@splitwave/core';
import { parseNumeric } from '@splitwave/utils';

export interface TargetOptions {
  seconds?: string;
  megabytes?: string;
}

/**
 * Exactly one of --seconds / --megabytes. The value itself is checked by
 * the engine's request validation.
 */
export function resolveSplitTarget(options: TargetOptions): { unit: SplitUnit; targetValue: number } {
  const { seconds, megabytes } = options;

  if (seconds !== undefined && megabytes === undefined) {
    return { unit: 'seconds', targetValue: Number(seconds) };
  }
  if (megabytes !== undefined && seconds === undefined) {
    return { unit: 'megabytes', targetValue: Number(megabytes) };
  }

  throw SplitError.invalidParameters('target', 'pass exactly one of --seconds or --megabytes');
}

export function parsePositiveInteger(value: string | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;

  const parsed = parseNumeric(value);
  if (parsed === null || !Number.isInteger(parsed) || parsed <= 0) {
    throw SplitError.invalidParameters(field, 'must be a positive whole number');
  }
  return parsed;
}
