/**
 * Split Request Validation
 *
 * Everything a caller hands in is checked here before the engine touches
 * the file system. Failures surface as SplitError INVALID_PARAMETERS naming
 * the offending field.
 */

import { z } from 'zod';
import { SplitError, type RequestLimits, type SplitRequest } from '@splitwave/core';
import { getExtension } from '@splitwave/utils';

export const ALLOWED_AUDIO_EXTENSIONS = ['mp3', 'wav', 'ogg', 'm4a', 'flac', 'aac', 'wma'] as const;

export type AllowedAudioExtension = (typeof ALLOWED_AUDIO_EXTENSIONS)[number];

export const splitRequestSchema = z.object({
  unit: z.enum(['seconds', 'megabytes'], {
    errorMap: () => ({ message: "must be 'seconds' or 'megabytes'" }),
  }),
  targetValue: z
    .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .positive('must be greater than zero'),
});

/**
 * Parse and bound a split request
 */
export function validateSplitRequest(input: unknown, limits: RequestLimits): SplitRequest {
  const parsed = splitRequestSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'request';
    throw SplitError.invalidParameters(field, issue?.message ?? 'malformed request');
  }

  const request = parsed.data;
  const max = request.unit === 'seconds' ? limits.maxSeconds : limits.maxMegabytes;
  if (request.targetValue > max) {
    throw SplitError.invalidParameters('targetValue', `must be at most ${max} ${request.unit}`);
  }

  return request;
}

export function isAllowedAudioExtension(extension: string): extension is AllowedAudioExtension {
  return ALLOWED_AUDIO_EXTENSIONS.some(allowed => allowed === extension);
}

/**
 * Reject inputs whose extension is not a known audio container
 */
export function assertSupportedExtension(filePath: string): AllowedAudioExtension {
  const extension = getExtension(filePath);
  if (!isAllowedAudioExtension(extension)) {
    throw SplitError.invalidParameters(
      'inputPath',
      `unsupported file type '${extension || 'none'}', expected one of ${ALLOWED_AUDIO_EXTENSIONS.join(', ')}`
    );
  }
  return extension;
}
