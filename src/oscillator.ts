/**
 * Discretization Engine
 *
 * Exact discretization of the harmonic oscillator:
 *
 *   x_{n+2} = 2·cos(ωε)·x_{n+1} − x_n
 *
 * seeded from the continuous solution at t = 0 and t = ε. The recurrence
 * reproduces x(nε) at every sample instant and runs backwards as well as
 * forwards. Superposed components are summed per index.
 */

import { ConfigurationError } from './errors.js';
import { loggers } from './logger.js';
import type {
  DiscretizationState,
  OscillatorComponent,
  OscillatorConfig,
  Sample,
} from './types.js';

const log = loggers.oscillator;

// =============================================================================
// Single Component
// =============================================================================

/**
 * Continuous solution x(t) = x0·cos(ωt+φ) + (v0/ω)·sin(ωt+φ).
 * ω = 0 has no oscillation; its limit is x0 + v0·t.
 */
export function closedForm(component: OscillatorComponent, t: number): number {
  const { omega, x0, v0, phi } = component;
  if (omega === 0) return x0 + v0 * t;
  const theta = omega * t + phi;
  return x0 * Math.cos(theta) + (v0 / omega) * Math.sin(theta);
}

/**
 * cos(ωε) = ±1 collapses the recurrence to constant, linear or alternating motion
 */
export function isDegenerate(component: OscillatorComponent, epsilon: number): boolean {
  const c = Math.cos(component.omega * epsilon);
  return c === 1 || c === -1;
}

export class HarmonicOscillator {
  readonly component: Readonly<OscillatorComponent>;
  readonly epsilon: number;
  readonly coefficient: number; // 2·cos(ωε)
  readonly degenerate: boolean;

  constructor(component: OscillatorComponent, epsilon: number) {
    this.component = Object.freeze({ ...component });
    this.epsilon = epsilon;
    this.coefficient = 2 * Math.cos(component.omega * epsilon);
    this.degenerate = isDegenerate(component, epsilon);
  }

  /**
   * Closed-form value at sample index n
   */
  position(index: number): number {
    return closedForm(this.component, index * this.epsilon);
  }

  /**
   * Analytic seed positioned at `index`
   */
  seed(index = 0): DiscretizationState {
    return { index, current: this.position(index), next: this.position(index + 1) };
  }

  advance(state: DiscretizationState): DiscretizationState {
    return {
      index: state.index + 1,
      current: state.next,
      next: this.coefficient * state.next - state.current,
    };
  }

  stepBackward(state: DiscretizationState): DiscretizationState {
    return {
      index: state.index - 1,
      current: this.coefficient * state.current - state.next,
      next: state.current,
    };
  }

  /**
   * Period in samples, or null when the motion does not repeat
   */
  periodSamples(): number | null {
    if (this.component.omega === 0) return null;
    return (2 * Math.PI) / Math.abs(this.component.omega * this.epsilon);
  }
}

// =============================================================================
// Validation
// =============================================================================

export function validateOscillatorConfig(config: OscillatorConfig): string[] {
  const issues: string[] = [];

  const epsilonValid = Number.isFinite(config.epsilon) && config.epsilon > 0;
  if (!epsilonValid) {
    issues.push(`epsilon must be a positive finite number (got ${config.epsilon})`);
  }
  if (config.components.length === 0) {
    issues.push('at least one oscillator component is required');
  }

  config.components.forEach((c, i) => {
    let finite = true;
    for (const key of ['omega', 'x0', 'v0', 'phi'] as const) {
      if (!Number.isFinite(c[key])) {
        issues.push(`components[${i}].${key} must be finite (got ${c[key]})`);
        finite = false;
      }
    }
    if (
      finite &&
      epsilonValid &&
      !config.allowDegenerate &&
      isDegenerate(c, config.epsilon)
    ) {
      issues.push(
        `components[${i}] is degenerate: cos(ωε) = ${Math.cos(c.omega * config.epsilon)} ` +
          `(ω=${c.omega}, ε=${config.epsilon}); set allowDegenerate to accept it`
      );
    }
  });

  if (config.sampleCount !== null && (!Number.isInteger(config.sampleCount) || config.sampleCount < 0)) {
    issues.push(`sampleCount must be a non-negative integer (got ${config.sampleCount})`);
  }
  if (config.duration !== null && (!Number.isFinite(config.duration) || config.duration < 0)) {
    issues.push(`duration must be a non-negative finite number (got ${config.duration})`);
  }

  return issues;
}

// =============================================================================
// Engine
// =============================================================================

export interface EngineInfo {
  index: number;
  epsilon: number;
  components: number;
  degenerate: boolean[];
  limit: number | null;
}

export class DiscretizationEngine {
  readonly epsilon: number;
  readonly oscillators: readonly HarmonicOscillator[];
  readonly limit: number | null;
  private states: DiscretizationState[];

  constructor(config: OscillatorConfig) {
    const issues = validateOscillatorConfig(config);
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid oscillator configuration', issues);
    }

    this.epsilon = config.epsilon;
    this.oscillators = config.components.map((c) => new HarmonicOscillator(c, config.epsilon));
    this.limit = sampleLimit(config);
    this.states = this.oscillators.map((o) => o.seed(0));

    this.oscillators.forEach((o, i) => {
      if (o.degenerate) {
        log.warn(`Component ${i} has a degenerate period (cos(ωε) = ${o.coefficient / 2})`);
      }
    });
  }

  get index(): number {
    return this.states[0].index;
  }

  get exhausted(): boolean {
    return this.limit !== null && this.index >= this.limit;
  }

  /**
   * Emit the sample at the current index and advance every component
   */
  next(): Sample {
    const index = this.index;
    let value = 0;
    for (let i = 0; i < this.states.length; i++) {
      value += this.states[i].current;
      this.states[i] = this.oscillators[i].advance(this.states[i]);
    }
    return Object.freeze({ index, timestamp: index * this.epsilon, value });
  }

  /**
   * Lazy sample sequence from the current index, bounded by the configured
   * limit and by `count` when given
   */
  *samples(count?: number): Generator<Sample, void, undefined> {
    let emitted = 0;
    while (!this.exhausted && (count === undefined || emitted < count)) {
      yield this.next();
      emitted++;
    }
  }

  batch(count: number): number[] {
    return Array.from(this.samples(count), (s) => s.value);
  }

  reset(): void {
    this.seek(0);
  }

  /**
   * Reseed every component from the closed form at `index`
   */
  seek(index: number): void {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Cannot seek to index ${index}`);
    }
    this.states = this.oscillators.map((o) => o.seed(index));
  }

  /**
   * Reinstate saved recurrence states (one per component, same index)
   */
  restore(states: readonly DiscretizationState[]): void {
    if (states.length !== this.oscillators.length) {
      throw new RangeError(
        `Expected ${this.oscillators.length} component states, got ${states.length}`
      );
    }
    const index = states[0].index;
    if (states.some((s) => s.index !== index)) {
      throw new RangeError('Component states disagree on index');
    }
    this.states = states.map((s) => ({ ...s }));
  }

  getState(): DiscretizationState[] {
    return this.states.map((s) => ({ ...s }));
  }

  info(): EngineInfo {
    return {
      index: this.index,
      epsilon: this.epsilon,
      components: this.oscillators.length,
      degenerate: this.oscillators.map((o) => o.degenerate),
      limit: this.limit,
    };
  }
}

function sampleLimit(config: OscillatorConfig): number | null {
  const bounds: number[] = [];
  if (config.sampleCount !== null) bounds.push(config.sampleCount);
  if (config.duration !== null) {
    // samples with t_n = nε ≤ duration
    bounds.push(Math.floor(config.duration / config.epsilon + 1e-9) + 1);
  }
  return bounds.length === 0 ? null : Math.min(...bounds);
}
