/**
 * Core Types
 *
 * Data model shared by the discretization engine, the buffer,
 * the SKA learner and the checkpoint manager.
 */

// =============================================================================
// Temporal Primitives
// =============================================================================

export type Timestamp = number; // simulated seconds, t_n = n·ε

export type Hash = string; // SHA-256 hex, 64 characters

// =============================================================================
// Oscillator
// =============================================================================

export interface OscillatorComponent {
  omega: number; // angular frequency ω (rad/s)
  x0: number;    // initial position
  v0: number;    // initial velocity
  phi: number;   // phase φ (rad)
}

/**
 * Two consecutive samples of one component.
 * `current` is x_index, `next` is x_{index+1}; `index` is the next index to emit.
 */
export interface DiscretizationState {
  index: number;
  current: number;
  next: number;
}

export interface Sample {
  readonly index: number;
  readonly timestamp: Timestamp;
  readonly value: number;
}

// =============================================================================
// Learner
// =============================================================================

export interface LearnerState {
  weights: number[];
  knowledge: number;     // D
  clipBound: number;     // C
  learningRate: number;  // α
  step: number;          // samples consumed
  lastIndex: number;     // -1 before the first sample
  previousValue: number | null;
  saturations: number;
  gaps: number;
}

export interface StepOutput {
  readonly timestamp: Timestamp;
  readonly index: number;
  readonly value: number;
  readonly decision: number;  // d_n ∈ (0,1)
  readonly entropy: number;   // ΔH_n
  readonly knowledge: number; // D_n
}

export type FeatureTransformName = 'position' | 'return';
export type UpdateRuleName = 'entropy' | 'hebbian';

// =============================================================================
// Checkpoints
// =============================================================================

export interface Checkpoint {
  version: string;
  id: string;
  createdAt: string; // ISO 8601 wall-clock
  lastIndex: number;
  learner: LearnerState;
  generator: DiscretizationState[] | null;
  fingerprint: Hash | null; // configuration the state belongs to
  hash: Hash;
}

// =============================================================================
// Invariants
// =============================================================================

export interface InvariantCheck {
  id: string;
  name: string;
  satisfied: boolean;
  details?: string;
}

// =============================================================================
// Configuration
// =============================================================================

export type BackpressurePolicy = 'block' | 'drop-oldest';

export interface OscillatorConfig {
  components: OscillatorComponent[];
  epsilon: number;
  sampleCount: number | null;
  duration: number | null;
  allowDegenerate: boolean;
}

export interface LearnerConfig {
  initialWeightStd: number;
  initialWeights: number[] | null;
  seed: number;
  learningRate: number;
  clipBound: number;
  bias: boolean;
  featureTransform: FeatureTransformName;
  updateRule: UpdateRuleName;
  performanceWindow: number;
}

export interface BufferConfig {
  maxSize: number;
  policy: BackpressurePolicy;
}

export interface CheckpointConfig {
  enabled: boolean;
  dir: string;
  interval: number;       // steps between checkpoints
  writeTimeoutMs: number;
  retain: number;
  resume: boolean;
}

export interface RuntimeConfig {
  batchSize: number;
  idlePollMs: number;
  shutdownTimeoutMs: number;
}

export interface NoiseConfig {
  amplitude: number;
  seed: number;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  timestamps: boolean;
  colors: boolean;
}

export interface StreamConfig {
  oscillator: OscillatorConfig;
  learner: LearnerConfig;
  buffer: BufferConfig;
  checkpoint: CheckpointConfig;
  runtime: RuntimeConfig;
  noise: NoiseConfig;
  logging: LoggingConfig;
}

/**
 * Largest clip bound for which sigmoid(±C) stays strictly inside (0,1)
 * in double precision with margin.
 */
export const MAX_CLIP_BOUND = 30;

export const DEFAULT_CONFIG: StreamConfig = {
  oscillator: {
    components: [{ omega: 0.15, x0: 1.0, v0: 0.0, phi: 0.0 }],
    epsilon: 0.1,
    sampleCount: 1000,
    duration: null,
    allowDegenerate: false,
  },
  learner: {
    initialWeightStd: 0.1,
    initialWeights: null,
    seed: 42,
    learningRate: 0.01,
    clipBound: 10,
    bias: false,
    featureTransform: 'position',
    updateRule: 'entropy',
    performanceWindow: 100,
  },
  buffer: {
    maxSize: 256,
    policy: 'block',
  },
  checkpoint: {
    enabled: false,
    dir: 'state/checkpoints',
    interval: 500,
    writeTimeoutMs: 2000,
    retain: 5,
    resume: false,
  },
  runtime: {
    batchSize: 32,
    idlePollMs: 10,
    shutdownTimeoutMs: 5000,
  },
  noise: {
    amplitude: 0,
    seed: 7,
  },
  logging: {
    level: 'info',
    timestamps: true,
    colors: true,
  },
};
