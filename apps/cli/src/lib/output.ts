/**
 * Output Formatter
 *
 * Terminal rendering for the commands. Status lines go through the
 * symbol helpers; tables and detail blocks take rows from ./format.
 */

import chalk from 'chalk';
import type { SegmentFailure } from '@splitwave/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printNote(message: string): void {
  console.log(chalk.gray(message));
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

/**
 * Aligned `key: value` block, keys padded to the longest
 */
export function printDetails(rows: ReadonlyArray<readonly [string, string]>): void {
  const width = Math.max(0, ...rows.map(([key]) => key.length)) + 1;
  for (const [key, value] of rows) {
    console.log(`  ${chalk.gray(`${key}:`.padEnd(width))} ${value}`);
  }
}

export function printTable(rows: Array<Record<string, string | number>>, empty = 'No segments'): void {
  if (rows.length === 0) {
    console.log(chalk.blue('i'), empty);
    return;
  }
  console.table(rows);
}

/**
 * One warning per range the encoder gave up on, with the last cause
 */
export function printSkippedSegments(failures: readonly SegmentFailure[]): void {
  for (const failure of failures) {
    const last = failure.causes[failure.causes.length - 1];
    const detail = last ? ` (${last.strategy}: ${last.message})` : '';
    printWarning(`Segment ${failure.range.index + 1} skipped: ${failure.reason}${detail}`);
  }
}
