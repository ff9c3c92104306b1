/**
 * Error taxonomy
 *
 * Structural problems surface before a stream starts; divergence ends a run.
 * Saturation, drops and checkpoint corruption are counted or logged instead.
 */

export type ErrorCode = 'CONFIG_INVALID' | 'DIVERGED' | 'SEQUENCE' | 'CHECKPOINT';

export class SkaError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends SkaError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

/**
 * Non-finite weight, knowledge or input. The learner cannot be resumed from here.
 */
export class DivergenceError extends SkaError {
  readonly step: number;
  readonly index: number;

  constructor(step: number, index: number, detail: string) {
    super('DIVERGED', `Learner diverged at step ${step} (index ${index}): ${detail}`);
    this.step = step;
    this.index = index;
  }
}

export class SequenceError extends SkaError {
  constructor(expectedAfter: number, received: number) {
    super('SEQUENCE', `Sample ${received} does not follow ${expectedAfter}`);
  }
}

export class CheckpointError extends SkaError {
  constructor(message: string) {
    super('CHECKPOINT', message);
  }
}

export function isSkaError(error: unknown): error is SkaError {
  return error instanceof SkaError;
}
