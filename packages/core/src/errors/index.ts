/**
 * Custom Error Classes
 */

import type { SplitJobState } from '../stateMachine.js';
import type { StrategyFailure } from '../types/audio.js';

/**
 * Base error class for all splitwave errors
 */
export class SplitwaveError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SplitwaveError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ProbeErrorReason = 'UNREADABLE' | 'ZERO_DURATION';

/**
 * The source could not be described: missing, empty, not audio, or no duration
 */
export class ProbeError extends SplitwaveError {
  public readonly reason: ProbeErrorReason;

  constructor(reason: ProbeErrorReason, filePath: string, detail: string) {
    super(
      `${reason === 'ZERO_DURATION' ? 'Audio has zero duration' : 'Audio is unreadable'}: ${detail}`,
      `PROBE_${reason}`,
      422,
      { filePath, detail }
    );
    this.name = 'ProbeError';
    this.reason = reason;
  }
}

export type PlanErrorReason = 'NO_VIABLE_SEGMENTS';

export class PlanError extends SplitwaveError {
  public readonly reason: PlanErrorReason;

  constructor(durationMs: number, segmentMs: number) {
    super(
      `No segment of ${durationMs}ms audio reaches the minimum length (spacing ${Math.round(segmentMs)}ms)`,
      'NO_VIABLE_SEGMENTS',
      422,
      { durationMs, segmentMs }
    );
    this.name = 'PlanError';
    this.reason = 'NO_VIABLE_SEGMENTS';
  }
}

/**
 * Every strategy on the ladder failed for one segment
 */
export class EncodeError extends SplitwaveError {
  public readonly segmentIndex: number;
  public readonly causes: StrategyFailure[];

  constructor(segmentIndex: number, causes: StrategyFailure[]) {
    super(
      `All ${causes.length} encoding strategies failed for segment ${segmentIndex + 1}`,
      'ALL_STRATEGIES_FAILED',
      500,
      { segmentIndex, causes }
    );
    this.name = 'EncodeError';
    this.segmentIndex = segmentIndex;
    this.causes = causes;
  }
}

export type SplitErrorCode =
  | 'PROBE_FAILED'
  | 'FILE_TOO_SHORT'
  | 'NO_SEGMENTS_PRODUCED'
  | 'INVALID_PARAMETERS'
  | 'CANCELLED';

const SPLIT_ERROR_STATUS: Record<SplitErrorCode, number> = {
  INVALID_PARAMETERS: 400,
  PROBE_FAILED: 422,
  FILE_TOO_SHORT: 422,
  NO_SEGMENTS_PRODUCED: 500,
  CANCELLED: 499,
};

/**
 * Job-fatal error handed to callers. The message is safe to show users.
 */
export class SplitError extends SplitwaveError {
  public readonly reason: SplitErrorCode;

  constructor(reason: SplitErrorCode, message: string, details?: Record<string, unknown>) {
    super(message, reason, SPLIT_ERROR_STATUS[reason], details);
    this.name = 'SplitError';
    this.reason = reason;
  }

  static probeFailed(cause: ProbeError): SplitError {
    const message = cause.reason === 'ZERO_DURATION'
      ? 'The audio file has no playable duration. Check that the upload completed and try again.'
      : 'The audio file could not be read. Make sure it is a valid, non-empty audio file.';
    return new SplitError('PROBE_FAILED', message, {
      probeReason: cause.reason,
      ...cause.details,
    });
  }

  static fileTooShort(cause: PlanError): SplitError {
    return new SplitError(
      'FILE_TOO_SHORT',
      'The audio file is too short to split with the requested segment size.',
      cause.details
    );
  }

  static noSegmentsProduced(failedSegments: number): SplitError {
    return new SplitError(
      'NO_SEGMENTS_PRODUCED',
      'Processing finished but no segments could be produced. Try a different file or format.',
      { failedSegments }
    );
  }

  static invalidParameters(field: string, message: string): SplitError {
    return new SplitError('INVALID_PARAMETERS', `Invalid ${field}: ${message}`, { field, message });
  }

  static cancelled(): SplitError {
    return new SplitError('CANCELLED', 'Splitting was cancelled before it completed.');
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends SplitwaveError {
  constructor(
    jobId: string,
    fromState: SplitJobState,
    toState: SplitJobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      500,
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends SplitwaveError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      500,
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}
