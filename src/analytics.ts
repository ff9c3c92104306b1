/**
 * Performance Window
 *
 * Rolling statistics over the most recent learning steps. Entropy variance
 * and irregularity separate a clean feed from a noisy one.
 */

import type { StepOutput } from './types.js';

export interface WindowMetrics {
  count: number;
  entropyMean: number;
  entropyVariance: number;
  irregularity: number; // mean |ΔH_n − 2ΔH_{n−1} + ΔH_{n−2}|
  decisionMean: number;
  knowledgeRate: number; // ΔD per step across the window
}

export class PerformanceWindow {
  readonly size: number;
  private entropies: number[] = [];
  private decisions: number[] = [];
  private knowledge: number[] = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 2) {
      throw new RangeError(`Performance window must hold at least 2 steps (got ${size})`);
    }
    this.size = size;
  }

  push(output: StepOutput): void {
    this.entropies.push(output.entropy);
    this.decisions.push(output.decision);
    this.knowledge.push(output.knowledge);
    if (this.entropies.length > this.size) {
      this.entropies.shift();
      this.decisions.shift();
      this.knowledge.shift();
    }
  }

  get count(): number {
    return this.entropies.length;
  }

  clear(): void {
    this.entropies = [];
    this.decisions = [];
    this.knowledge = [];
  }

  metrics(): WindowMetrics {
    const n = this.entropies.length;
    if (n === 0) {
      return {
        count: 0,
        entropyMean: 0,
        entropyVariance: 0,
        irregularity: 0,
        decisionMean: 0,
        knowledgeRate: 0,
      };
    }

    const entropyMean = mean(this.entropies);
    const entropyVariance =
      this.entropies.reduce((acc, h) => acc + (h - entropyMean) ** 2, 0) / n;

    let irregularity = 0;
    if (n >= 3) {
      let total = 0;
      for (let i = 2; i < n; i++) {
        total += Math.abs(this.entropies[i] - 2 * this.entropies[i - 1] + this.entropies[i - 2]);
      }
      irregularity = total / (n - 2);
    }

    const knowledgeRate =
      n >= 2 ? (this.knowledge[n - 1] - this.knowledge[0]) / (n - 1) : 0;

    return {
      count: n,
      entropyMean,
      entropyVariance,
      irregularity,
      decisionMean: mean(this.decisions),
      knowledgeRate,
    };
  }
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}
