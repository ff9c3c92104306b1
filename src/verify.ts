/**
 * Invariant Verification
 *
 * Consistency checks over learner state and step outputs. A checkpoint is
 * only restored when every state invariant holds.
 */

import { MAX_CLIP_BOUND } from './types.js';
import type { InvariantCheck, LearnerState, StepOutput } from './types.js';

function check(id: string, name: string, satisfied: boolean, details: string): InvariantCheck {
  return satisfied ? { id, name, satisfied } : { id, name, satisfied, details };
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

export function verifyLearnerState(state: LearnerState): InvariantCheck[] {
  return [
    check(
      'weights-finite',
      'Weights are finite',
      state.weights.length > 0 && state.weights.every(Number.isFinite),
      `weights = [${state.weights.join(', ')}]`
    ),
    check(
      'knowledge-finite',
      'Knowledge is finite and non-negative',
      Number.isFinite(state.knowledge) && state.knowledge >= 0,
      `knowledge = ${state.knowledge}`
    ),
    check(
      'clip-bound',
      'Clip bound within (0, MAX_CLIP_BOUND]',
      Number.isFinite(state.clipBound) && state.clipBound > 0 && state.clipBound <= MAX_CLIP_BOUND,
      `clipBound = ${state.clipBound}`
    ),
    check(
      'learning-rate',
      'Learning rate finite and non-negative',
      Number.isFinite(state.learningRate) && state.learningRate >= 0,
      `learningRate = ${state.learningRate}`
    ),
    check(
      'step-counter',
      'Step counter consistent with last index',
      isCount(state.step) &&
        Number.isInteger(state.lastIndex) &&
        state.lastIndex >= -1 &&
        (state.step === 0) === (state.lastIndex === -1),
      `step = ${state.step}, lastIndex = ${state.lastIndex}`
    ),
    check(
      'previous-value',
      'Previous feature present exactly after the first step',
      state.step === 0
        ? state.previousValue === null
        : state.previousValue !== null && Number.isFinite(state.previousValue),
      `previousValue = ${state.previousValue}`
    ),
    check(
      'counters',
      'Saturation and gap counters are non-negative integers',
      isCount(state.saturations) && isCount(state.gaps),
      `saturations = ${state.saturations}, gaps = ${state.gaps}`
    ),
  ];
}

export function isConsistentLearnerState(state: LearnerState): boolean {
  return verifyLearnerState(state).every((c) => c.satisfied);
}

/**
 * Checks over an emitted output sequence: bounded decisions, accumulating
 * knowledge, strictly increasing indices
 */
export function verifyOutputs(outputs: readonly StepOutput[]): InvariantCheck[] {
  let boundedDecisions = true;
  let finiteEntropy = true;
  let accumulating = true;
  let increasing = true;

  outputs.forEach((o, i) => {
    if (!(o.decision > 0 && o.decision < 1)) boundedDecisions = false;
    if (!Number.isFinite(o.entropy)) finiteEntropy = false;
    if (i > 0) {
      if (o.knowledge < outputs[i - 1].knowledge) accumulating = false;
      if (o.index <= outputs[i - 1].index) increasing = false;
    }
  });

  return [
    check('decision-bounded', 'Decisions lie in (0,1)', boundedDecisions, 'decision outside (0,1)'),
    check('entropy-finite', 'Entropy increments are finite', finiteEntropy, 'non-finite entropy'),
    check('knowledge-accumulates', 'Knowledge never decreases', accumulating, 'knowledge decreased'),
    check('index-increasing', 'Indices strictly increase', increasing, 'index repeated or reordered'),
  ];
}
