/**
 * Checkpoint Manager Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, readFile, readdir, rm, unlink, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { randomUUID } from 'crypto';
import {
  CheckpointManager,
  checkpointExpectation,
  checkpointId,
  configFingerprint,
  hashCheckpoint,
  checkpointProblems,
} from '../src/checkpoint.js';
import { CheckpointError } from '../src/errors.js';
import { configureLogger } from '../src/logger.js';
import { DEFAULT_CONFIG } from '../src/types.js';
import type { CheckpointConfig, DiscretizationState, LearnerState } from '../src/types.js';

configureLogger({ level: 'silent' });

function learnerState(lastIndex: number, overrides: Partial<LearnerState> = {}): LearnerState {
  return {
    weights: [0.25, -0.5],
    knowledge: 1.5,
    clipBound: 10,
    learningRate: 0.01,
    step: lastIndex + 1,
    lastIndex,
    previousValue: 0.75,
    saturations: 0,
    gaps: 0,
    ...overrides,
  };
}

function generatorState(lastIndex: number): DiscretizationState[] {
  return [{ index: lastIndex + 1, current: 0.5, next: 0.49 }];
}

describe('checkpointId', () => {
  it('should zero-pad the last index so names sort by position', () => {
    assert.strictEqual(checkpointId(499), 'ckpt-000000000499');
  });
});

describe('CheckpointManager', () => {
  let baseDir: string;
  let config: CheckpointConfig;
  let manager: CheckpointManager;

  beforeEach(async () => {
    baseDir = join(tmpdir(), `ska-checkpoint-${randomUUID()}`);
    await mkdir(baseDir, { recursive: true });
    config = { ...DEFAULT_CONFIG.checkpoint, enabled: true, dir: 'ckpt', retain: 3 };
    manager = new CheckpointManager(config, baseDir);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('should resolve the directory against the base directory', () => {
    assert.strictEqual(manager.dir, join(baseDir, 'ckpt'));
  });

  it('should write a hashed checkpoint and leave no lock or temp file', async () => {
    const result = await manager.save(learnerState(99), generatorState(99));
    assert.strictEqual(result.status, 'written');
    if (result.status !== 'written') return;

    const { checkpoint } = result;
    assert.strictEqual(checkpoint.id, 'ckpt-000000000099');
    assert.strictEqual(checkpoint.lastIndex, 99);
    assert.strictEqual(checkpoint.hash, hashCheckpoint(checkpoint));
    assert.deepStrictEqual(await readdir(manager.dir), ['ckpt-000000000099.json']);
  });

  it('should round-trip the learner and generator state', async () => {
    await manager.save(learnerState(99), generatorState(99));
    const loaded = await manager.load('ckpt-000000000099');
    assert.deepStrictEqual(loaded.learner, learnerState(99));
    assert.deepStrictEqual(loaded.generator, generatorState(99));
    assert.deepStrictEqual(checkpointProblems(loaded), []);
  });

  it('should refuse a state that has seen no samples', async () => {
    await assert.rejects(
      manager.write(learnerState(-1, { step: 0, previousValue: null })),
      CheckpointError
    );
  });

  it('should list newest first and keep only the retained count', async () => {
    for (const index of [9, 19, 29, 39, 49]) {
      await manager.save(learnerState(index));
    }
    const ids = (await manager.list()).map((c) => c.id);
    assert.deepStrictEqual(ids, ['ckpt-000000000049', 'ckpt-000000000039', 'ckpt-000000000029']);
  });

  it('should list nothing for a missing directory', async () => {
    assert.deepStrictEqual(await manager.list(), []);
  });

  it('should take over a stale lock', async () => {
    await mkdir(manager.dir, { recursive: true });
    await writeFile(
      join(manager.dir, '.lock'),
      JSON.stringify({ owner: 'gone', pid: 1, timestamp: Date.now() - 60_000 })
    );
    const result = await manager.save(learnerState(5));
    assert.strictEqual(result.status, 'written');
  });

  it('should wait for a fresh lock even when its content is unreadable', async () => {
    const lockPath = join(manager.dir, '.lock');
    await mkdir(manager.dir, { recursive: true });
    await writeFile(lockPath, '');
    const bounded = new CheckpointManager({ ...config, writeTimeoutMs: 100 }, baseDir);

    const result = await bounded.save(learnerState(5));
    assert.deepStrictEqual(result, { status: 'timeout', id: 'ckpt-000000000005' });
    assert.strictEqual(await readFile(lockPath, 'utf-8'), '');

    await unlink(lockPath);
    await bounded.flush();
  });

  it('should take over an unreadable lock once it is old', async () => {
    const lockPath = join(manager.dir, '.lock');
    await mkdir(manager.dir, { recursive: true });
    await writeFile(lockPath, '');
    const minuteAgo = Date.now() / 1000 - 60;
    await utimes(lockPath, minuteAgo, minuteAgo);

    const result = await manager.save(learnerState(5));
    assert.strictEqual(result.status, 'written');
    assert.deepStrictEqual(await readdir(manager.dir), ['ckpt-000000000005.json']);
  });

  it('should report a timeout and finish the write on flush', async () => {
    const lockPath = join(manager.dir, '.lock');
    await mkdir(manager.dir, { recursive: true });
    await writeFile(lockPath, JSON.stringify({ owner: 'other', pid: 1, timestamp: Date.now() }));
    const bounded = new CheckpointManager({ ...config, writeTimeoutMs: 100 }, baseDir);

    const result = await bounded.save(learnerState(0));
    assert.deepStrictEqual(result, { status: 'timeout', id: 'ckpt-000000000000' });
    assert.deepStrictEqual(await readdir(manager.dir), ['.lock']);

    await unlink(lockPath);
    await bounded.flush();
    assert.deepStrictEqual(await readdir(manager.dir), ['ckpt-000000000000.json']);
  });

  it('should wait on flush for tracked writes', async () => {
    const pending = manager.save(learnerState(7));
    await manager.flush();
    assert.strictEqual((await pending).status, 'written');
  });

  describe('verify', () => {
    it('should accept an intact checkpoint', async () => {
      await manager.save(learnerState(10));
      const result = await manager.verify('ckpt-000000000010');
      assert.strictEqual(result.valid, true);
      assert.match(result.details, /^Verified: index 10, step 11, hash [0-9a-f]{16}\.\.\.$/);
    });

    it('should detect tampering', async () => {
      await manager.save(learnerState(10));
      const path = join(manager.dir, 'ckpt-000000000010.json');
      const tampered = (await readFile(path, 'utf-8')).replace('"knowledge": 1.5', '"knowledge": 2.5');
      await writeFile(path, tampered);

      const result = await manager.verify('ckpt-000000000010');
      assert.deepStrictEqual(result, { valid: false, details: 'hash mismatch' });
    });

    it('should report a missing checkpoint', async () => {
      const result = await manager.verify('ckpt-000000000001');
      assert.strictEqual(result.valid, false);
    });
  });

  describe('configuration fingerprint', () => {
    it('should ignore run length and buffering', () => {
      const longer = {
        ...DEFAULT_CONFIG,
        oscillator: { ...DEFAULT_CONFIG.oscillator, sampleCount: 5000 },
        buffer: { maxSize: 8, policy: 'drop-oldest' as const },
      };
      assert.strictEqual(configFingerprint(longer), configFingerprint(DEFAULT_CONFIG));
    });

    it('should change with the features', () => {
      const biased = { ...DEFAULT_CONFIG, learner: { ...DEFAULT_CONFIG.learner, bias: true } };
      assert.notStrictEqual(configFingerprint(biased), configFingerprint(DEFAULT_CONFIG));
      assert.strictEqual(checkpointExpectation(biased).featureDimension, 2);
    });

    it('should be stored with the checkpoint and covered by its hash', async () => {
      const expected = checkpointExpectation(DEFAULT_CONFIG);
      const owned = new CheckpointManager(config, baseDir, expected);
      await owned.save(learnerState(10, { weights: [0.25] }));

      const loaded = await owned.load('ckpt-000000000010');
      assert.strictEqual(loaded.fingerprint, expected.fingerprint);
      assert.deepStrictEqual(checkpointProblems(loaded, expected), []);
      assert.deepStrictEqual(checkpointProblems({ ...loaded, fingerprint: null }), ['hash mismatch']);
    });

    it('should reject a checkpoint written for another configuration', async () => {
      const biased = { ...DEFAULT_CONFIG, learner: { ...DEFAULT_CONFIG.learner, bias: true } };
      await new CheckpointManager(config, baseDir, checkpointExpectation(biased)).save(learnerState(10));

      const other = new CheckpointManager(config, baseDir, checkpointExpectation(DEFAULT_CONFIG));
      assert.deepStrictEqual(await other.restore(), {
        status: 'cold',
        warnings: ['ckpt-000000000010: configuration fingerprint mismatch; weights: expected 1, found 2'],
      });
    });

    it('should reject weights of the wrong dimension', () => {
      const expected = { fingerprint: 'f'.repeat(64), featureDimension: 1 };
      const body = {
        version: '1.1.0',
        id: 'ckpt-000000000010',
        createdAt: '2024-01-01T00:00:00.000Z',
        lastIndex: 10,
        learner: learnerState(10),
        generator: null,
        fingerprint: expected.fingerprint,
      };
      assert.deepStrictEqual(checkpointProblems({ ...body, hash: hashCheckpoint(body) }, expected), [
        'weights: expected 1, found 2',
      ]);
    });
  });

  describe('restore', () => {
    it('should cold-start when nothing was saved', async () => {
      assert.deepStrictEqual(await manager.restore(), { status: 'cold', warnings: [] });
    });

    it('should return the newest valid checkpoint', async () => {
      await manager.save(learnerState(10));
      await manager.save(learnerState(20), generatorState(20));

      const restored = await manager.restore();
      assert.strictEqual(restored.status, 'restored');
      if (restored.status !== 'restored') return;
      assert.strictEqual(restored.checkpoint.lastIndex, 20);
      assert.deepStrictEqual(restored.warnings, []);
    });

    it('should skip a corrupted newest checkpoint', async () => {
      await manager.save(learnerState(10));
      await manager.save(learnerState(20));
      await writeFile(join(manager.dir, 'ckpt-000000000020.json'), '{"truncated": ');

      const restored = await manager.restore();
      assert.strictEqual(restored.status, 'restored');
      if (restored.status !== 'restored') return;
      assert.strictEqual(restored.checkpoint.lastIndex, 10);
      assert.deepStrictEqual(restored.warnings, [
        'ckpt-000000000020: Checkpoint ckpt-000000000020 is not valid JSON',
      ]);
    });

    it('should reject a checkpoint whose state is inconsistent', async () => {
      await manager.save(learnerState(10));
      const path = join(manager.dir, 'ckpt-000000000010.json');

      // rehash a state with a negative knowledge so only the consistency check fails
      const loaded = await manager.load('ckpt-000000000010');
      const broken = { ...loaded, learner: { ...loaded.learner, knowledge: -1 } };
      const rehashed = { ...broken, hash: hashCheckpoint(broken) };
      await writeFile(path, JSON.stringify(rehashed));

      const restored = await manager.restore();
      assert.strictEqual(restored.status, 'cold');
      assert.deepStrictEqual(restored.warnings, [
        'ckpt-000000000010: knowledge-finite: knowledge = -1',
      ]);
    });
  });
});
