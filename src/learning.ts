/**
 * SKA Learning Core
 *
 * Forward-only Structured Knowledge Accumulation. Each sample is folded into
 * the learner state by a pure transition
 *
 *   step(state, sample) -> (state', output)
 *
 * with no lookahead and no retained computation graph:
 *
 *   a_n  = clip(w·φ(x_n), −C, C)
 *   d_n  = sigmoid(a_n)
 *   ΔD_n = |d_n − sigmoid(clip(w·φ(x_{n−1}), −C, C))|
 *   ΔH_n = −(1/ln 2) · z_n · ΔD_n
 *   D_n  = D_{n−1} + ΔD_n
 *   w   ← w + α · g(φ(x_n), d_n, ΔH_n)
 *
 * The feature transform (φ, z) and the update rule g are strategies.
 */

import { ConfigurationError, DivergenceError, SequenceError } from './errors.js';
import { PerformanceWindow, type WindowMetrics } from './analytics.js';
import { mulberry32, randn } from './noise.js';
import type {
  FeatureTransformName,
  LearnerConfig,
  LearnerState,
  Sample,
  StepOutput,
  UpdateRuleName,
} from './types.js';

const INV_LN2 = 1 / Math.LN2;

// =============================================================================
// Strategies
// =============================================================================

export interface FeatureTransform {
  name: string;
  /** Feature vector φ(x) fed to the weighted activation */
  features(value: number): number[];
  /** Entropy driver z_n */
  z(value: number, previousValue: number | null): number;
}

export interface UpdateRule {
  name: string;
  /** Direction g for w ← w + α·g; one entry per feature */
  gradient(features: readonly number[], decision: number, entropy: number): number[];
}

export interface LearnerStrategies {
  transform: FeatureTransform;
  update: UpdateRule;
}

function withBias(value: number, bias: boolean): number[] {
  return bias ? [value, 1] : [value];
}

/**
 * z_n = x_n. Baseline formulation.
 */
export function positionTransform(bias = false): FeatureTransform {
  return {
    name: 'position',
    features: (value) => withBias(value, bias),
    z: (value) => value,
  };
}

/**
 * z_n = −|x_n − x_{n−1}|. ΔH_n is then non-negative, largest where the
 * feature moves fastest and near zero at turning points.
 */
export function returnTransform(bias = false): FeatureTransform {
  return {
    name: 'return',
    features: (value) => withBias(value, bias),
    z: (value, previousValue) =>
      previousValue === null ? 0 : -Math.abs(value - previousValue),
  };
}

/**
 * g = −ΔH_n · d_n(1 − d_n) · φ
 */
export const entropyUpdate: UpdateRule = {
  name: 'entropy',
  gradient: (features, decision, entropy) => {
    const scale = -entropy * decision * (1 - decision);
    return features.map((f) => scale * f);
  },
};

/**
 * g = ΔH_n · (d_n − ½) · φ
 */
export const hebbianUpdate: UpdateRule = {
  name: 'hebbian',
  gradient: (features, decision, entropy) => {
    const scale = entropy * (decision - 0.5);
    return features.map((f) => scale * f);
  },
};

export function resolveTransform(name: FeatureTransformName, bias: boolean): FeatureTransform {
  switch (name) {
    case 'position':
      return positionTransform(bias);
    case 'return':
      return returnTransform(bias);
  }
}

export function resolveUpdateRule(name: UpdateRuleName): UpdateRule {
  switch (name) {
    case 'entropy':
      return entropyUpdate;
    case 'hebbian':
      return hebbianUpdate;
  }
}

export function resolveStrategies(config: LearnerConfig): LearnerStrategies {
  return {
    transform: resolveTransform(config.featureTransform, config.bias),
    update: resolveUpdateRule(config.updateRule),
  };
}

// =============================================================================
// Numerics
// =============================================================================

export function sigmoid(a: number): number {
  return 1 / (1 + Math.exp(-a));
}

export function clip(value: number, bound: number): number {
  return Math.max(-bound, Math.min(bound, value));
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

// =============================================================================
// State
// =============================================================================

export function featureDimension(config: LearnerConfig): number {
  return config.bias ? 2 : 1;
}

/**
 * Cold-start state: explicit initial weights, or seeded N(0, std²) draws
 */
export function createLearnerState(config: LearnerConfig): LearnerState {
  const dim = featureDimension(config);
  let weights: number[];

  if (config.initialWeights !== null) {
    if (config.initialWeights.length !== dim) {
      throw new ConfigurationError('Invalid learner configuration', [
        `initialWeights needs ${dim} entries (got ${config.initialWeights.length})`,
      ]);
    }
    weights = [...config.initialWeights];
  } else {
    const rng = mulberry32(config.seed);
    weights = Array.from({ length: dim }, () => config.initialWeightStd * randn(rng));
  }

  return {
    weights,
    knowledge: 0,
    clipBound: config.clipBound,
    learningRate: config.learningRate,
    step: 0,
    lastIndex: -1,
    previousValue: null,
    saturations: 0,
    gaps: 0,
  };
}

export function cloneLearnerState(state: LearnerState): LearnerState {
  return { ...state, weights: [...state.weights] };
}

// =============================================================================
// Transition
// =============================================================================

export interface StepResult {
  state: LearnerState;
  output: StepOutput;
  saturated: boolean;
}

/**
 * One forward-only learning step. Pure: `state` is not modified.
 */
export function step(
  state: LearnerState,
  sample: Sample,
  strategies: LearnerStrategies
): StepResult {
  if (sample.index <= state.lastIndex) {
    throw new SequenceError(state.lastIndex, sample.index);
  }

  const x = sample.value;
  if (!Number.isFinite(x)) {
    throw new DivergenceError(state.step, sample.index, `non-finite feature value ${x}`);
  }

  const { transform, update } = strategies;
  const { weights, clipBound: C, learningRate: alpha } = state;

  const features = transform.features(x);
  if (features.length !== weights.length) {
    throw new RangeError(
      `Feature transform '${transform.name}' yields ${features.length} features for ${weights.length} weights`
    );
  }

  const raw = dot(weights, features);
  const saturated = Math.abs(raw) > C;
  const decision = sigmoid(clip(raw, C));

  let deltaD = 0;
  if (state.previousValue !== null) {
    const previous = sigmoid(clip(dot(weights, transform.features(state.previousValue)), C));
    deltaD = Math.abs(decision - previous);
  }

  // + 0 folds a negative zero into 0
  const entropy = -INV_LN2 * transform.z(x, state.previousValue) * deltaD + 0;
  const knowledge = state.knowledge + deltaD;

  const g = update.gradient(features, decision, entropy);
  const nextWeights = weights.map((w, i) => w + alpha * g[i]);

  if (!nextWeights.every(Number.isFinite)) {
    throw new DivergenceError(state.step, sample.index, `non-finite weights [${nextWeights.join(', ')}]`);
  }
  if (!Number.isFinite(knowledge)) {
    throw new DivergenceError(state.step, sample.index, `non-finite knowledge ${knowledge}`);
  }

  const gap = state.lastIndex >= 0 ? sample.index - state.lastIndex - 1 : 0;

  return {
    state: {
      weights: nextWeights,
      knowledge,
      clipBound: C,
      learningRate: alpha,
      step: state.step + 1,
      lastIndex: sample.index,
      previousValue: x,
      saturations: state.saturations + (saturated ? 1 : 0),
      gaps: state.gaps + gap,
    },
    output: Object.freeze({
      timestamp: sample.timestamp,
      index: sample.index,
      value: x,
      decision,
      entropy,
      knowledge,
    }),
    saturated,
  };
}

// =============================================================================
// Learner
// =============================================================================

export interface SkaLearnerOptions {
  state?: LearnerState;
  strategies?: Partial<LearnerStrategies>;
}

/**
 * Holds the current state and a performance window around the pure step
 */
export class SkaLearner {
  readonly strategies: LearnerStrategies;
  readonly window: PerformanceWindow;
  private state: LearnerState;

  constructor(config: LearnerConfig, options: SkaLearnerOptions = {}) {
    const defaults = resolveStrategies(config);
    this.strategies = {
      transform: options.strategies?.transform ?? defaults.transform,
      update: options.strategies?.update ?? defaults.update,
    };
    this.state = options.state ? cloneLearnerState(options.state) : createLearnerState(config);
    this.window = new PerformanceWindow(config.performanceWindow);
  }

  process(sample: Sample): StepOutput {
    const result = step(this.state, sample, this.strategies);
    this.state = result.state;
    this.window.push(result.output);
    return result.output;
  }

  getState(): LearnerState {
    return cloneLearnerState(this.state);
  }

  metrics(): WindowMetrics {
    return this.window.metrics();
  }
}
