/**
 * Stream Runner
 *
 * One producer (discretization engine, optional noise) and one consumer
 * (SKA learner) around a bounded buffer. The learning step never awaits;
 * only enqueueing, idle polling and checkpoint writes do.
 *
 * Events: 'started', 'resumed', 'step', 'checkpoint', 'stopping',
 * 'diverged', 'finished'.
 */

import { EventEmitter } from 'events';
import { setImmediate as yieldToLoop } from 'timers/promises';
import { StreamBuffer } from './buffer.js';
import { CheckpointManager, checkpointExpectation } from './checkpoint.js';
import type { RestoreResult, SaveResult } from './checkpoint.js';
import { DivergenceError } from './errors.js';
import { SkaLearner } from './learning.js';
import type { LearnerStrategies } from './learning.js';
import type { WindowMetrics } from './analytics.js';
import { loggers } from './logger.js';
import { GaussianNoise } from './noise.js';
import { DiscretizationEngine } from './oscillator.js';
import type {
  DiscretizationState,
  LearnerState,
  Sample,
  StepOutput,
  StreamConfig,
} from './types.js';

const log = loggers.runner;

// =============================================================================
// Types
// =============================================================================

export type RunStatus = 'completed' | 'stopped';

export interface RunSummary {
  status: RunStatus;
  produced: number;
  processed: number;
  lastIndex: number;
  dropped: number;           // evicted by drop-oldest backpressure
  droppedAtShutdown: number; // still queued when the shutdown deadline passed
  saturations: number;
  gaps: number;
  checkpoints: number;
  checkpointRetries: number;
  resumedFrom: number | null;
  metrics: WindowMetrics;
}

export interface StreamRunnerOptions {
  baseDir?: string;
  learnerState?: LearnerState;
  strategies?: Partial<LearnerStrategies>;
}

/**
 * A queued sample plus the generator state right after it, so a checkpoint
 * taken when it is consumed resumes the recurrence exactly
 */
interface QueuedSample {
  sample: Sample;
  generator: DiscretizationState[];
}

// =============================================================================
// Runner
// =============================================================================

export class StreamRunner extends EventEmitter {
  readonly config: StreamConfig;
  readonly engine: DiscretizationEngine;
  readonly buffer: StreamBuffer<QueuedSample>;
  readonly checkpoints: CheckpointManager | null;

  private noise: GaussianNoise;
  private options: StreamRunnerOptions;
  private learner: SkaLearner | null = null;
  private generatorState: DiscretizationState[] | null = null;

  private running = false;
  private stopRequested = false;
  private deadline = Infinity;

  private produced = 0;
  private processed = 0;
  private droppedAtShutdown = 0;
  private checkpointCount = 0;
  private checkpointRetries = 0;
  private lastCheckpointStep = 0;

  constructor(config: StreamConfig, options: StreamRunnerOptions = {}) {
    super();
    this.config = config;
    this.options = options;
    this.engine = new DiscretizationEngine(config.oscillator);
    this.buffer = new StreamBuffer<QueuedSample>(config.buffer.maxSize, config.buffer.policy);
    this.noise = new GaussianNoise(config.noise);
    this.checkpoints = config.checkpoint.enabled
      ? new CheckpointManager(config.checkpoint, options.baseDir, checkpointExpectation(config))
      : null;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async run(): Promise<RunSummary> {
    if (this.running) {
      throw new Error('Stream runner is already running');
    }
    this.running = true;

    let resumedFrom: number | null;
    try {
      resumedFrom = await this.prepare();
      this.emit('started', { index: this.engine.index });
      log.info(`Stream started at index ${this.engine.index}`);

      const producer = this.produce();
      try {
        await this.consume();
      } catch (error) {
        this.stopRequested = true;
        this.buffer.close();
        await producer;
        if (error instanceof DivergenceError) {
          log.error(error.message);
          this.emit('diverged', error);
        }
        throw error;
      }
      await producer;

      await this.finalCheckpoint();
    } finally {
      this.running = false;
    }

    const summary = this.summarize(resumedFrom);
    log.info(
      `Stream ${summary.status}: ${summary.processed} processed, ` +
        `${summary.dropped + summary.droppedAtShutdown} dropped`
    );
    this.emit('finished', summary);
    return summary;
  }

  /**
   * Graceful shutdown: stop producing, drain for at most
   * `runtime.shutdownTimeoutMs`, then drop what is left
   */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.deadline = Date.now() + this.config.runtime.shutdownTimeoutMs;
    this.buffer.close();
    log.info(`Shutdown requested; draining ${this.buffer.size} queued samples`);
    this.emit('stopping');
  }

  get isRunning(): boolean {
    return this.running;
  }

  getLearnerState(): LearnerState | null {
    return this.learner ? this.learner.getState() : null;
  }

  // ===========================================================================
  // Tasks
  // ===========================================================================

  private async prepare(): Promise<number | null> {
    let state = this.options.learnerState;
    let resumedFrom: number | null = null;

    if (this.checkpoints && this.config.checkpoint.resume && !state) {
      const restored: RestoreResult = await this.checkpoints.restore();
      if (restored.status === 'restored') {
        const { checkpoint } = restored;
        state = checkpoint.learner;
        resumedFrom = checkpoint.lastIndex;
        this.lastCheckpointStep = checkpoint.learner.step;

        if (checkpoint.generator !== null && checkpoint.generator.length === this.engine.oscillators.length) {
          this.engine.restore(checkpoint.generator);
        } else {
          this.engine.seek(checkpoint.lastIndex + 1);
        }
        this.emit('resumed', { lastIndex: checkpoint.lastIndex, warnings: restored.warnings });
      }
    } else if (state && state.lastIndex >= 0) {
      this.engine.seek(state.lastIndex + 1);
    }

    this.learner = new SkaLearner(this.config.learner, {
      state,
      strategies: this.options.strategies,
    });
    return resumedFrom;
  }

  private async produce(): Promise<void> {
    const { batchSize } = this.config.runtime;
    let sinceYield = 0;

    try {
      for (const sample of this.engine.samples()) {
        if (this.stopRequested) break;

        const accepted = await this.buffer.enqueue({
          sample: this.noise.apply(sample),
          generator: this.engine.getState(),
        });
        if (!accepted) break;
        this.produced++;

        if (++sinceYield >= batchSize) {
          sinceYield = 0;
          await yieldToLoop();
        }
      }
    } finally {
      this.buffer.close();
    }
  }

  private async consume(): Promise<void> {
    const learner = this.requireLearner();
    const { batchSize, idlePollMs } = this.config.runtime;
    const interval = this.config.checkpoint.interval;

    for (;;) {
      if (this.pastDeadline()) {
        this.droppedAtShutdown += this.buffer.drain().length;
        return;
      }

      const batch = this.buffer.takeBatch(batchSize);
      if (batch.length === 0) {
        if (this.buffer.closed) return;
        await this.buffer.waitForItems(idlePollMs);
        continue;
      }

      for (let i = 0; i < batch.length; i++) {
        if (this.pastDeadline()) {
          this.droppedAtShutdown += batch.length - i;
          break;
        }

        const { sample, generator } = batch[i];
        const output: StepOutput = learner.process(sample);
        this.generatorState = generator;
        this.processed++;
        this.emit('step', output);

        if (this.checkpoints && learner.getState().step % interval === 0) {
          await this.checkpoint(this.checkpoints);
        }
      }
    }
  }

  // ===========================================================================
  // Checkpoints
  // ===========================================================================

  private async checkpoint(manager: CheckpointManager): Promise<SaveResult> {
    const state = this.requireLearner().getState();
    const result = await manager.save(state, this.generatorState);

    if (result.status === 'written') {
      this.checkpointCount++;
      this.lastCheckpointStep = state.step;
    } else {
      this.checkpointRetries++;
      if (result.status === 'failed') {
        log.warn(`Checkpoint ${result.id} failed: ${result.error}`);
      }
    }
    this.emit('checkpoint', result);
    return result;
  }

  private async finalCheckpoint(): Promise<void> {
    if (!this.checkpoints) return;
    const step = this.requireLearner().getState().step;

    if (step > this.lastCheckpointStep) {
      await this.checkpoint(this.checkpoints);
    }
    await this.checkpoints.flush();
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private pastDeadline(): boolean {
    return this.stopRequested && Date.now() >= this.deadline;
  }

  private requireLearner(): SkaLearner {
    if (!this.learner) {
      throw new Error('Stream runner has not been prepared');
    }
    return this.learner;
  }

  private summarize(resumedFrom: number | null): RunSummary {
    const learner = this.requireLearner();
    const state = learner.getState();
    return {
      status: this.stopRequested ? 'stopped' : 'completed',
      produced: this.produced,
      processed: this.processed,
      lastIndex: state.lastIndex,
      dropped: this.buffer.dropped,
      droppedAtShutdown: this.droppedAtShutdown,
      saturations: state.saturations,
      gaps: state.gaps,
      checkpoints: this.checkpointCount,
      checkpointRetries: this.checkpointRetries,
      resumedFrom,
      metrics: learner.metrics(),
    };
  }
}

/**
 * Run a stream to completion and collect every step output
 */
export async function runStream(
  config: StreamConfig,
  options: StreamRunnerOptions = {}
): Promise<{ summary: RunSummary; outputs: StepOutput[] }> {
  const runner = new StreamRunner(config, options);
  const outputs: StepOutput[] = [];
  runner.on('step', (output: StepOutput) => outputs.push(output));
  const summary = await runner.run();
  return { summary, outputs };
}
