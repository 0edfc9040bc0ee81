import { describe, expect, it } from 'vitest';

import { assertTransition, isDeclaredTransition } from '../../../src/core/engine/phases';
import { IllegalPhaseTransitionError } from '../../../src/core/shared/errors/engine-errors';

describe('phase transitions', () => {
  it('allows the declared phase edges', () => {
    expect(isDeclaredTransition({ kind: 'intro' }, { kind: 'teaching', step: 'probe_ask' })).toBe(true);
    expect(isDeclaredTransition({ kind: 'prerequisite_check' }, { kind: 'recap' })).toBe(true);
    expect(isDeclaredTransition({ kind: 'prerequisite_check' }, { kind: 'teaching', step: 'probe_ask' })).toBe(true);
    expect(isDeclaredTransition({ kind: 'testing' }, { kind: 'wrap_up' })).toBe(true);
    expect(isDeclaredTransition({ kind: 'wrap_up' }, { kind: 'completed' })).toBe(true);
  });

  it('allows staying in place', () => {
    expect(isDeclaredTransition({ kind: 'recap' }, { kind: 'recap' })).toBe(true);
    expect(isDeclaredTransition({ kind: 'teaching', step: 'quiz_ask' }, { kind: 'teaching', step: 'quiz_ask' })).toBe(
      true,
    );
  });

  it('follows the teaching micro-cycle', () => {
    expect(
      isDeclaredTransition({ kind: 'teaching', step: 'probe_respond' }, { kind: 'teaching', step: 'quiz_ask' }),
    ).toBe(true);
    expect(
      isDeclaredTransition({ kind: 'teaching', step: 'quiz_evaluate' }, { kind: 'teaching', step: 'probe_ask' }),
    ).toBe(true);
    expect(
      isDeclaredTransition({ kind: 'teaching', step: 'probe_ask' }, { kind: 'teaching', step: 'quiz_evaluate' }),
    ).toBe(false);
  });

  it('rejects undeclared edges', () => {
    expect(isDeclaredTransition({ kind: 'intro' }, { kind: 'grading' })).toBe(false);
    expect(isDeclaredTransition({ kind: 'completed' }, { kind: 'intro' })).toBe(false);
    expect(() => assertTransition({ kind: 'recap' }, { kind: 'testing' })).toThrow(IllegalPhaseTransitionError);
    expect(() => assertTransition({ kind: 'teaching', step: 'explain_present' }, { kind: 'grading' })).toThrow(
      'Transition teaching:explain_present -> grading is not a declared edge.',
    );
  });
});
