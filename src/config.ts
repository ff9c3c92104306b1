/**
 * Configuration
 *
 * Partial JSON configuration merged over DEFAULT_CONFIG and validated once,
 * before any stream starts. Invalid settings raise ConfigurationError; nothing
 * is silently replaced by a default.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { validateOscillatorConfig } from './oscillator.js';
import { featureDimension } from './learning.js';
import { DEFAULT_CONFIG, MAX_CLIP_BOUND } from './types.js';
import type { StreamConfig } from './types.js';

const d = DEFAULT_CONFIG;

const finite = () => z.number().finite();

export const OscillatorComponentZ = z
  .object({
    omega: finite(),
    x0: finite().default(1),
    v0: finite().default(0),
    phi: finite().default(0),
  })
  .strict();

export const OscillatorConfigZ = z
  .object({
    components: z.array(OscillatorComponentZ).default(d.oscillator.components),
    epsilon: finite().default(d.oscillator.epsilon),
    sampleCount: z.number().int().nonnegative().nullable().default(d.oscillator.sampleCount),
    duration: finite().nonnegative().nullable().default(d.oscillator.duration),
    allowDegenerate: z.boolean().default(d.oscillator.allowDegenerate),
  })
  .strict();

export const LearnerConfigZ = z
  .object({
    initialWeightStd: finite().nonnegative().default(d.learner.initialWeightStd),
    initialWeights: z.array(finite()).nullable().default(d.learner.initialWeights),
    seed: z.number().int().default(d.learner.seed),
    learningRate: finite().nonnegative().default(d.learner.learningRate),
    clipBound: finite().positive().max(MAX_CLIP_BOUND).default(d.learner.clipBound),
    bias: z.boolean().default(d.learner.bias),
    featureTransform: z.enum(['position', 'return']).default(d.learner.featureTransform),
    updateRule: z.enum(['entropy', 'hebbian']).default(d.learner.updateRule),
    performanceWindow: z.number().int().min(2).default(d.learner.performanceWindow),
  })
  .strict();

export const BufferConfigZ = z
  .object({
    maxSize: z.number().int().positive().default(d.buffer.maxSize),
    policy: z.enum(['block', 'drop-oldest']).default(d.buffer.policy),
  })
  .strict();

export const CheckpointConfigZ = z
  .object({
    enabled: z.boolean().default(d.checkpoint.enabled),
    dir: z.string().min(1).default(d.checkpoint.dir),
    interval: z.number().int().positive().default(d.checkpoint.interval),
    writeTimeoutMs: z.number().int().positive().default(d.checkpoint.writeTimeoutMs),
    retain: z.number().int().positive().default(d.checkpoint.retain),
    resume: z.boolean().default(d.checkpoint.resume),
  })
  .strict();

export const RuntimeConfigZ = z
  .object({
    batchSize: z.number().int().positive().default(d.runtime.batchSize),
    idlePollMs: z.number().int().nonnegative().default(d.runtime.idlePollMs),
    shutdownTimeoutMs: z.number().int().nonnegative().default(d.runtime.shutdownTimeoutMs),
  })
  .strict();

export const NoiseConfigZ = z
  .object({
    amplitude: finite().nonnegative().default(d.noise.amplitude),
    seed: z.number().int().default(d.noise.seed),
  })
  .strict();

export const LoggingConfigZ = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default(d.logging.level),
    timestamps: z.boolean().default(d.logging.timestamps),
    colors: z.boolean().default(d.logging.colors),
  })
  .strict();

export const StreamConfigZ = z
  .object({
    oscillator: OscillatorConfigZ.default({}),
    learner: LearnerConfigZ.default({}),
    buffer: BufferConfigZ.default({}),
    checkpoint: CheckpointConfigZ.default({}),
    runtime: RuntimeConfigZ.default({}),
    noise: NoiseConfigZ.default({}),
    logging: LoggingConfigZ.default({}),
  })
  .strict();

export type StreamConfigInput = z.input<typeof StreamConfigZ>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a (partial) configuration and fill in defaults
 */
export function parseConfig(input: unknown): StreamConfig {
  const result = StreamConfigZ.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(result.error));
  }

  const config: StreamConfig = result.data;
  const issues = validateOscillatorConfig(config.oscillator).map((i) => `oscillator: ${i}`);

  const dim = featureDimension(config.learner);
  if (config.learner.initialWeights !== null && config.learner.initialWeights.length !== dim) {
    issues.push(
      `learner.initialWeights: needs ${dim} entries (got ${config.learner.initialWeights.length})`
    );
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid configuration', issues);
  }
  return config;
}

export function createConfig(input: StreamConfigInput = {}): StreamConfig {
  return parseConfig(input);
}

/**
 * Load and validate a JSON configuration file
 */
export async function loadConfig(path: string): Promise<StreamConfig> {
  const content = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${path}`, [String(error)]);
  }
  return parseConfig(raw);
}

const OverridesZ = z.record(z.record(z.unknown()));

/**
 * Apply partial section overrides on top of an already valid configuration
 */
export function mergeConfig(base: StreamConfig, overrides: unknown): StreamConfig {
  const parsed = OverridesZ.safeParse(overrides ?? {});
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration overrides', formatIssues(parsed.error));
  }

  const merged: Record<string, Record<string, unknown>> = {
    oscillator: { ...base.oscillator },
    learner: { ...base.learner },
    buffer: { ...base.buffer },
    checkpoint: { ...base.checkpoint },
    runtime: { ...base.runtime },
    noise: { ...base.noise },
    logging: { ...base.logging },
  };
  for (const [section, values] of Object.entries(parsed.data)) {
    merged[section] = { ...merged[section], ...values };
  }
  return parseConfig(merged);
}
