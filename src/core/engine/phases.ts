import type { PhaseKind, SessionPhase, TeachingStep } from '../@types';
import { IllegalPhaseTransitionError } from '../shared/errors/engine-errors';
import { phaseLabel } from './sessionState';

export const PHASE_EDGES: Readonly<Record<PhaseKind, ReadonlyArray<PhaseKind>>> = {
  load_context: ['intro'],
  intro: ['prerequisite_check', 'teaching'],
  prerequisite_check: ['recap', 'quiz', 'teaching'],
  recap: ['teaching'],
  quiz: ['teaching'],
  teaching: ['testing'],
  testing: ['grading', 'wrap_up'],
  grading: ['wrap_up'],
  wrap_up: ['completed'],
  completed: [],
};

export const TEACHING_STEP_EDGES: Readonly<Record<TeachingStep, ReadonlyArray<TeachingStep>>> = {
  probe_ask: ['probe_respond'],
  probe_respond: ['explain_present', 'quiz_ask'],
  explain_present: ['explain_respond'],
  explain_respond: ['quiz_ask'],
  quiz_ask: ['quiz_evaluate'],
  quiz_evaluate: ['probe_ask'],
};

/** Staying in place is always allowed; anything else must be a declared edge. */
export const isDeclaredTransition = (from: SessionPhase, to: SessionPhase): boolean => {
  if (from.kind === 'teaching' && to.kind === 'teaching') {
    return from.step === to.step || TEACHING_STEP_EDGES[from.step].includes(to.step);
  }

  if (from.kind === to.kind) {
    return true;
  }

  return PHASE_EDGES[from.kind].includes(to.kind);
};

export const assertTransition = (from: SessionPhase, to: SessionPhase): void => {
  if (!isDeclaredTransition(from, to)) {
    throw new IllegalPhaseTransitionError(phaseLabel(from), phaseLabel(to));
  }
};
