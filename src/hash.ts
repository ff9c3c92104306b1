/**
 * Hashing
 *
 * Deterministic content hashes used to detect corrupted checkpoints.
 */

import { createHash } from 'crypto';
import type { Hash } from './types.js';

/**
 * Compute SHA-256 hash of data
 */
export function sha256(data: string | Buffer): Hash {
  return createHash('sha256').update(data).digest('hex');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Canonical JSON: object keys sorted at every depth
 */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (!isRecord(value)) return value;
  return Object.keys(value)
    .sort()
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = canonicalize(value[key]);
      return acc;
    }, {});
}

/**
 * Compute deterministic hash of object
 * Keys are sorted for determinism
 */
export function hashObject(obj: unknown): Hash {
  return sha256(JSON.stringify(canonicalize(obj)));
}
