import { describe, expect, it } from 'vitest';

import type { SessionState } from '../../../src/core/@types';
import { SessionDriver } from '../../../src/core/engine/driver';
import { ALL_OBJECTIVES_DONE_MESSAGE } from '../../../src/core/engine/handlers/teaching';
import { createHarness, newSession, seedStore, withLearnerTurn } from '../helpers/fixtures';

const settle = async (driver: SessionDriver, state: SessionState): Promise<SessionState> => {
  const outcome = await driver.run(state);
  if (!outcome.ok) {
    throw new Error(`Driver failed: ${outcome.failure.code} ${outcome.failure.message}`);
  }
  return outcome.state;
};

describe('teaching micro-cycle', () => {
  it('skips the explanation when the probe answer already shows mastery', async () => {
    const { context, llm, log } = createHarness();
    llm.enqueue('probe_response', 'Spot on.\n<control>{"objective_complete": true}</control>');
    const driver = new SessionDriver(context);

    const started = await settle(driver, newSession());
    const state = await settle(driver, withLearnerTurn(started, 'The base case returns without recursing.'));

    expect(state.phase).toEqual({ kind: 'teaching', step: 'quiz_evaluate' });
    expect(state.history.map((turn) => turn.content).slice(-2)).toEqual(['Spot on.', '**Quick check:** Quick question?']);
    expect(llm.callsFor('explain')).toHaveLength(0);
    expect(log.eventsOfType('explanation_skipped')[0]?.payload).toEqual({
      phase: 'teaching:probe_respond',
      objectiveId: 'obj-base-case',
    });
  });

  it('logs the raw model text but keeps the control block out of the transcript', async () => {
    const { context, llm, log } = createHarness();
    llm.enqueue('probe_response', 'Spot on.\n<control>{"objective_complete": true}</control>');
    const driver = new SessionDriver(context);

    const started = await settle(driver, newSession());
    await settle(driver, withLearnerTurn(started, 'It stops.'));

    expect(log.messages.map((message) => message.text)).toContain(
      'Spot on.\n<control>{"objective_complete": true}</control>',
    );
  });

  it('moves on without a model call when a respond step finds no learner reply', async () => {
    const { context, llm, log } = createHarness();
    const driver = new SessionDriver(context);

    const started = await settle(driver, newSession());
    const state = await settle(driver, started);

    expect(state.phase).toEqual({ kind: 'teaching', step: 'explain_respond' });
    expect(llm.callsFor('probe_response')).toHaveLength(0);
    expect(log.eventsOfType('learner_message_missing')[0]?.payload).toEqual({
      phase: 'teaching:probe_respond',
      objectiveId: 'obj-base-case',
    });
  });

  it('records the micro quiz answer and feedback', async () => {
    const store = seedStore({ objectives: [{ id: 'obj-base-case', description: 'Identify the base case' }] });
    const { context } = createHarness({ store });
    const driver = new SessionDriver(context);

    let state = await settle(driver, newSession());
    state = await settle(driver, withLearnerTurn(state, 'No idea.'));
    state = await settle(driver, withLearnerTurn(state, 'Yes, thanks.'));
    state = await settle(driver, withLearnerTurn(state, 'When n is zero.'));

    expect(state.microQuizzes).toEqual([
      {
        objectiveId: 'obj-base-case',
        question: {
          prompt: 'Quick question?',
          type: 'short_answer',
          expectedAnswer: 'A short answer.',
          objectiveIds: ['obj-base-case'],
        },
        askedAt: '2026-03-02T10:00:00.000Z',
        answer: 'When n is zero.',
        feedback: 'Nice work.',
      },
    ]);
    expect(state.history.map((turn) => turn.content)).toContain(ALL_OBJECTIVES_DONE_MESSAGE);
    expect(state.phase).toEqual({ kind: 'testing' });
  });
});
