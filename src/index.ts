/**
 * ska-stream
 *
 * Exact-discretization harmonic oscillator streamed into a forward-only
 * SKA entropy learner, with bounded buffering and durable checkpoints.
 */

export * from './types.js';
export * from './errors.js';
export { createConfig, parseConfig, loadConfig, mergeConfig, StreamConfigZ } from './config.js';
export type { StreamConfigInput } from './config.js';
export { closedForm, isDegenerate, HarmonicOscillator, DiscretizationEngine, validateOscillatorConfig } from './oscillator.js';
export type { EngineInfo } from './oscillator.js';
export { StreamBuffer } from './buffer.js';
export { mulberry32, randn, GaussianNoise } from './noise.js';
export type { Rng } from './noise.js';
export {
  SkaLearner,
  step,
  sigmoid,
  clip,
  createLearnerState,
  cloneLearnerState,
  positionTransform,
  returnTransform,
  entropyUpdate,
  hebbianUpdate,
  resolveStrategies,
} from './learning.js';
export type { FeatureTransform, UpdateRule, LearnerStrategies, StepResult } from './learning.js';
export { PerformanceWindow } from './analytics.js';
export type { WindowMetrics } from './analytics.js';
export { verifyLearnerState, isConsistentLearnerState, verifyOutputs } from './verify.js';
export {
  CheckpointManager,
  checkpointExpectation,
  checkpointId,
  checkpointProblems,
  configFingerprint,
  hashCheckpoint,
} from './checkpoint.js';
export type {
  CheckpointExpectation,
  CheckpointSummary,
  RestoreResult,
  SaveResult,
} from './checkpoint.js';
export { StreamRunner, runStream } from './pipeline.js';
export type { RunSummary, RunStatus, StreamRunnerOptions } from './pipeline.js';
export { sha256, hashObject, canonicalize } from './hash.js';
export { Logger, createLogger, configureLogger, loggers } from './logger.js';
export type { LogLevel, LoggerConfig } from './logger.js';
