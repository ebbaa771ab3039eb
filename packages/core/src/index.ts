/**
 * @splitwave/core
 *
 * Core package containing:
 * - Split job state machine
 * - Engine configuration
 * - Error taxonomy
 * - Shared audio types
 */

// State machine
export {
  SplitJobStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  SplitJobState,
  SplitJobStateTransition,
} from './stateMachine.js';

// Types
export { SPLIT_UNITS } from './types/audio.js';

export type {
  SourceAudio,
  SplitUnit,
  SplitRequest,
  SegmentRange,
  SegmentPlan,
  EncodedSegment,
  StrategyFailure,
  SegmentFailure,
  ManifestStatus,
  SplitManifest,
  SplitResult,
} from './types/audio.js';

// Errors
export {
  SplitwaveError,
  ProbeError,
  PlanError,
  EncodeError,
  SplitError,
  StateTransitionError,
  CommandExecutionError,
} from './errors/index.js';

export type {
  ProbeErrorReason,
  PlanErrorReason,
  SplitErrorCode,
} from './errors/index.js';

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  loadEngineConfig,
  type EngineConfig,
  type PlannerLimits,
  type RequestLimits,
} from './config/engine.js';
