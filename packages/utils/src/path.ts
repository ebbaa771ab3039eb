/**
 * Path Utilities
 */

import { basename, extname } from 'node:path';

/**
 * Reduce a base name to letters and digits of any script, underscores,
 * dashes and dots so it is safe to hand to ffmpeg and to any filesystem.
 */
export function sanitizeBaseName(name: string): string {
  const cleaned = name
    .replace(/[^\p{L}\p{N}_\-.]/gu, '_')
    .replace(/^\.+/, '')
    .substring(0, 200);
  return cleaned.length > 0 ? cleaned : 'audio';
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Name of the Nth output segment: `{base}_part{NN}.{ext}`, 1-based,
 * zero-padded to at least two digits.
 */
export function segmentFileName(baseName: string, index: number, extension: string): string {
  const number = String(index + 1).padStart(2, '0');
  return `${baseName}_part${number}.${extension}`;
}
