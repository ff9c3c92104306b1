/**
 * Checkpoint Manager
 *
 * Durable snapshots of learner state (and the generator's recurrence state)
 * for restart without recomputation. Restoring does NOT replay entropy
 * history - it only restores state.
 *
 * Writes go through a scoped handle: advisory lock, temp file, fsync,
 * close, atomic rename, unlock - released on every exit path.
 */

import { randomUUID } from 'crypto';
import { mkdir, open, readFile, readdir, rename, stat, unlink, writeFile } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { isAbsolute, join } from 'path';
import { z } from 'zod';
import { CheckpointError } from './errors.js';
import { hashObject } from './hash.js';
import { featureDimension } from './learning.js';
import { loggers } from './logger.js';
import { verifyLearnerState } from './verify.js';
import type {
  Checkpoint,
  CheckpointConfig,
  DiscretizationState,
  Hash,
  LearnerState,
  StreamConfig,
} from './types.js';

const log = loggers.checkpoint;

export const CHECKPOINT_VERSION = '1.1.0';

const LOCK_FILE = '.lock';
const LOCK_TIMEOUT = 5000; // 5 seconds
const LOCK_RETRY_INTERVAL = 50; // 50ms
const ID_PATTERN = /^ckpt-\d{12}$/;

// =============================================================================
// Types
// =============================================================================

export type SaveResult =
  | { status: 'written'; checkpoint: Checkpoint }
  | { status: 'timeout'; id: string }
  | { status: 'failed'; id: string; error: string };

export type RestoreResult =
  | { status: 'restored'; checkpoint: Checkpoint; warnings: string[] }
  | { status: 'cold'; warnings: string[] };

/**
 * What a checkpoint must match to seed the stream it is restored into
 */
export interface CheckpointExpectation {
  fingerprint: Hash;
  featureDimension: number;
}

export interface CheckpointSummary {
  id: string;
  lastIndex: number;
}

const LearnerStateZ = z.object({
  weights: z.array(z.number()),
  knowledge: z.number(),
  clipBound: z.number(),
  learningRate: z.number(),
  step: z.number(),
  lastIndex: z.number(),
  previousValue: z.number().nullable(),
  saturations: z.number(),
  gaps: z.number(),
});

const DiscretizationStateZ = z.object({
  index: z.number(),
  current: z.number(),
  next: z.number(),
});

const LockZ = z.object({
  token: z.string().optional(),
  timestamp: z.number(),
});

const CheckpointZ = z.object({
  version: z.string(),
  id: z.string(),
  createdAt: z.string(),
  lastIndex: z.number(),
  learner: LearnerStateZ,
  generator: z.array(DiscretizationStateZ).nullable(),
  fingerprint: z.string().nullable(),
  hash: z.string(),
});

// =============================================================================
// Helpers
// =============================================================================

export function checkpointId(lastIndex: number): string {
  return 'ckpt-' + String(lastIndex).padStart(12, '0');
}

export function hashCheckpoint(checkpoint: Omit<Checkpoint, 'hash'>): Hash {
  return hashObject({
    version: checkpoint.version,
    id: checkpoint.id,
    createdAt: checkpoint.createdAt,
    lastIndex: checkpoint.lastIndex,
    learner: checkpoint.learner,
    generator: checkpoint.generator,
    fingerprint: checkpoint.fingerprint,
  });
}

/**
 * Hash of the settings that shape the trajectory and the weight layout.
 * Run length, buffering and noise may change between restarts.
 */
export function configFingerprint(config: Pick<StreamConfig, 'oscillator' | 'learner'>): Hash {
  return hashObject({
    oscillator: {
      components: config.oscillator.components,
      epsilon: config.oscillator.epsilon,
    },
    learner: {
      bias: config.learner.bias,
      featureTransform: config.learner.featureTransform,
    },
  });
}

export function checkpointExpectation(
  config: Pick<StreamConfig, 'oscillator' | 'learner'>
): CheckpointExpectation {
  return {
    fingerprint: configFingerprint(config),
    featureDimension: featureDimension(config.learner),
  };
}

/**
 * Reasons a parsed checkpoint must not be resumed from; empty when valid.
 * With an expectation, the checkpoint must also belong to that configuration.
 */
export function checkpointProblems(checkpoint: Checkpoint, expected?: CheckpointExpectation): string[] {
  const problems: string[] = [];

  if (hashCheckpoint(checkpoint) !== checkpoint.hash) {
    problems.push('hash mismatch');
  }
  for (const inv of verifyLearnerState(checkpoint.learner)) {
    if (!inv.satisfied) problems.push(`${inv.id}: ${inv.details ?? inv.name}`);
  }
  if (checkpoint.learner.lastIndex !== checkpoint.lastIndex) {
    problems.push(`lastIndex ${checkpoint.lastIndex} disagrees with learner ${checkpoint.learner.lastIndex}`);
  }
  if (checkpoint.generator !== null) {
    const expected = checkpoint.lastIndex + 1;
    for (const s of checkpoint.generator) {
      if (s.index !== expected || !Number.isFinite(s.current) || !Number.isFinite(s.next)) {
        problems.push(`generator state inconsistent at index ${s.index}`);
        break;
      }
    }
  }
  if (expected) {
    if (checkpoint.fingerprint !== expected.fingerprint) {
      problems.push('configuration fingerprint mismatch');
    }
    if (checkpoint.learner.weights.length !== expected.featureDimension) {
      problems.push(
        `weights: expected ${expected.featureDimension}, found ${checkpoint.learner.weights.length}`
      );
    }
  }
  return problems;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

// =============================================================================
// Manager
// =============================================================================

export class CheckpointManager {
  readonly dir: string;
  private config: CheckpointConfig;
  private expected: CheckpointExpectation | undefined;
  private inflight = new Set<Promise<void>>();

  /**
   * With an expectation, written checkpoints carry its fingerprint and only
   * checkpoints matching it are verified or restored.
   */
  constructor(
    config: CheckpointConfig,
    baseDir: string = process.cwd(),
    expected?: CheckpointExpectation
  ) {
    this.config = config;
    this.expected = expected;
    this.dir = isAbsolute(config.dir) ? config.dir : join(baseDir, config.dir);
  }

  /**
   * Write a checkpoint, waiting at most `writeTimeoutMs`. A write that
   * outlives the bound keeps running and is awaited by `flush()`.
   */
  async save(
    learner: LearnerState,
    generator: DiscretizationState[] | null = null
  ): Promise<SaveResult> {
    const id = checkpointId(learner.lastIndex);
    const write = this.write(learner, generator);

    const tracked: Promise<void> = write.then(
      () => undefined,
      (error: unknown) => log.error(`Checkpoint ${id} failed`, String(error))
    );
    this.inflight.add(tracked);
    void tracked.then(() => this.inflight.delete(tracked));

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.config.writeTimeoutMs);
    });

    try {
      const result = await Promise.race([write, timeout]);
      if (result === 'timeout') {
        log.warn(`Checkpoint ${id} exceeded ${this.config.writeTimeoutMs}ms; retrying next interval`);
        return { status: 'timeout', id };
      }
      return { status: 'written', checkpoint: result };
    } catch (error) {
      return { status: 'failed', id, error: String(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Wait for writes that outlived their time bound
   */
  async flush(): Promise<void> {
    await Promise.all([...this.inflight]);
  }

  /**
   * Write a checkpoint without a time bound
   */
  async write(
    learner: LearnerState,
    generator: DiscretizationState[] | null = null
  ): Promise<Checkpoint> {
    if (learner.lastIndex < 0) {
      throw new CheckpointError('Nothing to checkpoint before the first step');
    }

    const body: Omit<Checkpoint, 'hash'> = {
      version: CHECKPOINT_VERSION,
      id: checkpointId(learner.lastIndex),
      createdAt: new Date().toISOString(),
      lastIndex: learner.lastIndex,
      learner: { ...learner, weights: [...learner.weights] },
      generator: generator === null ? null : generator.map((s) => ({ ...s })),
      fingerprint: this.expected?.fingerprint ?? null,
    };
    const checkpoint: Checkpoint = { ...body, hash: hashCheckpoint(body) };

    await this.withHandle(checkpoint.id, async (handle) => {
      await handle.writeFile(JSON.stringify(checkpoint, null, 2), 'utf-8');
    });
    await this.prune();

    log.debug(`Checkpoint ${checkpoint.id} written (step ${learner.step})`);
    return checkpoint;
  }

  /**
   * Newest first
   */
  async list(): Promise<CheckpointSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return [];
      throw error;
    }

    return entries
      .filter((f) => f.endsWith('.json'))
      .map((f) => f.slice(0, -'.json'.length))
      .filter((id) => ID_PATTERN.test(id))
      .sort()
      .reverse()
      .map((id) => ({ id, lastIndex: Number(id.slice('ckpt-'.length)) }));
  }

  /**
   * Parse a checkpoint file; throws CheckpointError on unreadable or malformed content
   */
  async load(id: string): Promise<Checkpoint> {
    let content: string;
    try {
      content = await readFile(this.pathFor(id), 'utf-8');
    } catch (error) {
      throw new CheckpointError(`Cannot read checkpoint ${id}: ${String(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new CheckpointError(`Checkpoint ${id} is not valid JSON`);
    }

    const parsed = CheckpointZ.safeParse(raw);
    if (!parsed.success) {
      throw new CheckpointError(`Checkpoint ${id} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return parsed.data;
  }

  async verify(id: string): Promise<{ valid: boolean; details: string }> {
    try {
      const checkpoint = await this.load(id);
      const problems = checkpointProblems(checkpoint, this.expected);
      if (problems.length > 0) {
        return { valid: false, details: problems.join('; ') };
      }
      return {
        valid: true,
        details: `Verified: index ${checkpoint.lastIndex}, step ${checkpoint.learner.step}, hash ${checkpoint.hash.substring(0, 16)}...`,
      };
    } catch (error) {
      return { valid: false, details: String(error) };
    }
  }

  /**
   * Most recent valid checkpoint, or a cold start when none passes verification
   */
  async restore(): Promise<RestoreResult> {
    const warnings: string[] = [];

    for (const { id } of await this.list()) {
      try {
        const checkpoint = await this.load(id);
        const problems = checkpointProblems(checkpoint, this.expected);
        if (problems.length === 0) {
          log.info(`Restored checkpoint ${id} (step ${checkpoint.learner.step})`);
          return { status: 'restored', checkpoint, warnings };
        }
        warnings.push(`${id}: ${problems.join('; ')}`);
      } catch (error) {
        warnings.push(`${id}: ${error instanceof Error ? error.message : String(error)}`);
      }
      log.warn(`Rejected checkpoint ${id}`, warnings[warnings.length - 1]);
    }

    if (warnings.length > 0) {
      log.warn(`No valid checkpoint in ${this.dir}; cold start`);
    }
    return { status: 'cold', warnings };
  }

  // ===========================================================================
  // Storage
  // ===========================================================================

  private pathFor(id: string): string {
    return join(this.dir, `${id}.json`);
  }

  private async prune(): Promise<void> {
    const stale = (await this.list()).slice(this.config.retain);
    for (const { id } of stale) {
      try {
        await unlink(this.pathFor(id));
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') throw error;
      }
    }
  }

  private async withHandle(id: string, operation: (handle: FileHandle) => Promise<void>): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const token = await this.acquireLock(id);

    const tmpPath = join(this.dir, `${id}.json.tmp`);
    try {
      const handle = await open(tmpPath, 'w');
      try {
        await operation(handle);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.pathFor(id));
    } finally {
      await this.releaseLock(token);
    }
  }

  private async acquireLock(owner: string): Promise<string> {
    const lockPath = join(this.dir, LOCK_FILE);
    const startTime = Date.now();

    const token = randomUUID();

    while (Date.now() - startTime < LOCK_TIMEOUT) {
      try {
        await writeFile(
          lockPath,
          JSON.stringify({ owner, token, pid: process.pid, timestamp: Date.now() }),
          { flag: 'wx' }
        );
        return token;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') throw error;
      }

      if (await this.lockIsStale(lockPath)) {
        await unlink(lockPath).catch((error: unknown) => {
          if (errorCode(error) !== 'ENOENT') throw error;
        });
        continue;
      }
      await sleep(LOCK_RETRY_INTERVAL);
    }

    throw new CheckpointError(`Failed to acquire checkpoint lock for ${owner} (timeout)`);
  }

  private async readLock(lockPath: string): Promise<{ token?: string; timestamp: number } | null> {
    let content: string;
    try {
      content = await readFile(lockPath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw error;
    }
    const lock = LockZ.safeParse(parseJson(content));
    if (lock.success) return lock.data;

    // still being written, or left half-written by a killed process
    const { mtimeMs } = await stat(lockPath);
    return { timestamp: mtimeMs };
  }

  private async lockIsStale(lockPath: string): Promise<boolean> {
    try {
      const lock = await this.readLock(lockPath);
      return lock !== null && Date.now() - lock.timestamp > LOCK_TIMEOUT;
    } catch (error) {
      // vanished between read and stat
      if (errorCode(error) === 'ENOENT') return false;
      throw error;
    }
  }

  /**
   * Remove the lock only while it still carries this write's token
   */
  private async releaseLock(token: string): Promise<void> {
    const lockPath = join(this.dir, LOCK_FILE);
    try {
      const lock = await this.readLock(lockPath);
      if (lock === null) return;
      if (lock.token !== token) {
        log.warn(`Checkpoint lock in ${this.dir} was taken over; leaving it in place`);
        return;
      }
      await unlink(lockPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }
}
