/**
 * @splitwave/splitter
 *
 * Segmentation engine: plans ranges, drives the encoder and aggregates
 * the manifest.
 */

// Facade
export { split, type SplitOptions } from './split.js';

// Orchestration
export {
  SegmentationOrchestrator,
  type OrchestratorDependencies,
  type SplitJobOptions,
} from './orchestrator.js';

// Planning
export { planSegments, nominalLengthMs, type PlanSource } from './planner.js';

// Manifest
export { aggregateManifest, toSplitResult, type SegmentOutcome } from './manifest.js';

// Validation
export {
  ALLOWED_AUDIO_EXTENSIONS,
  splitRequestSchema,
  validateSplitRequest,
  isAllowedAudioExtension,
  assertSupportedExtension,
  type AllowedAudioExtension,
} from './validation.js';
