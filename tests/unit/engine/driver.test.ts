import { describe, expect, it } from 'vitest';

import type { SessionState, TeachingStep } from '../../../src/core/@types';
import { continueWith, PROVIDER_FALLBACK_MESSAGE, waitForLearner } from '../../../src/core/engine/context';
import { SessionDriver } from '../../../src/core/engine/driver';
import { PHASE_HANDLERS } from '../../../src/core/engine/handlers';
import { EXIT_ACKNOWLEDGEMENT, handleTeaching } from '../../../src/core/engine/handlers/teaching';
import { ContextNotFoundError, ProviderTimeoutError } from '../../../src/core/shared/errors/engine-errors';
import { createHarness, FIXED_NOW, newSession, PROJECT_ID, withLearnerTurn } from '../helpers/fixtures';
import { InMemoryKnowledgeStore } from '../helpers/inMemoryKnowledgeStore';

const settle = async (driver: SessionDriver, state: SessionState): Promise<SessionState> => {
  const outcome = await driver.run(state);
  if (!outcome.ok) {
    throw new Error(`Driver failed: ${outcome.failure.code} ${outcome.failure.message}`);
  }
  return outcome.state;
};

const reply = (driver: SessionDriver, state: SessionState, message: string): Promise<SessionState> => {
  return settle(driver, withLearnerTurn(state, message));
};

/** Takes the current objective from probe_respond through quiz_evaluate. */
const completeObjective = async (driver: SessionDriver, state: SessionState): Promise<SessionState> => {
  const explained = await reply(driver, state, 'I think it has to stop somewhere.');
  const quizzed = await reply(driver, explained, 'That makes sense.');
  return reply(driver, quizzed, 'When n reaches zero.');
};

describe('SessionDriver', () => {
  it('goes from intro straight to teaching when the node has no prerequisites', async () => {
    const { context, llm, log } = createHarness();
    const driver = new SessionDriver(context);

    const outcome = await driver.run(newSession());

    expect(outcome.ok).toBe(true);
    expect(outcome.ticks).toBe(3);
    expect(outcome.state.phase).toEqual({ kind: 'teaching', step: 'probe_respond' });
    expect(outcome.state.history.map((turn) => [turn.phase, turn.content])).toEqual([
      [
        'intro',
        "Today we'll explore Recursion. We'll cover: Identify the base case of a recursive function, Write the recursive step, Trace the call stack.\n\nLet's begin.",
      ],
      ['teaching:probe_ask', 'What do you already know about this?'],
    ]);
    expect(llm.callsFor('intro')).toHaveLength(0);
    expect(log.eventsOfType('phase_changed').map((event) => event.payload)).toEqual([
      { phase: 'intro', from: 'load_context', to: 'intro' },
      { phase: 'teaching:probe_ask', from: 'intro', to: 'teaching:probe_ask' },
    ]);
  });

  it('runs the six teaching steps once per objective, in order, then starts the test', async () => {
    const { context } = createHarness();
    const steps: TeachingStep[] = [];
    const driver = new SessionDriver(context, {
      ...PHASE_HANDLERS,
      teaching: (state, engineContext) => {
        if (state.phase.kind === 'teaching') {
          steps.push(state.phase.step);
        }
        return handleTeaching(state, engineContext);
      },
    });

    let state = await settle(driver, newSession());
    for (let index = 0; index < 3; index += 1) {
      if (index > 0) {
        state = await reply(driver, state, 'Ready for the next one.');
      }
      state = await completeObjective(driver, state);
    }

    const cycle: TeachingStep[] = [
      'probe_ask',
      'probe_respond',
      'explain_present',
      'explain_respond',
      'quiz_ask',
      'quiz_evaluate',
    ];
    expect(steps).toEqual([...cycle, ...cycle, ...cycle]);
    expect(state.phase).toEqual({ kind: 'testing' });
    expect(state.objectiveIndex).toBe(3);
    expect(state.completedObjectiveIds).toEqual(['obj-base-case', 'obj-recursive-step', 'obj-call-stack']);
    expect(state.testQuestions).toHaveLength(3);
    expect(state.autoAdvance).toBe(false);
  });

  it('keeps the step and parks the session when the model times out', async () => {
    const { context, llm, log } = createHarness();
    llm.enqueue('micro_quiz_question', new ProviderTimeoutError());
    const driver = new SessionDriver(context);

    const started = await settle(driver, newSession());
    const explained = await reply(driver, started, 'I think it has to stop somewhere.');
    const outcome = await driver.run(withLearnerTurn(explained, 'That makes sense.'));

    expect(outcome.ok).toBe(true);
    expect(outcome.state.phase).toEqual({ kind: 'teaching', step: 'quiz_ask' });
    expect(outcome.state.objectiveIndex).toBe(0);
    expect(outcome.state.autoAdvance).toBe(false);
    expect(outcome.state.history[outcome.state.history.length - 1]?.content).toBe(PROVIDER_FALLBACK_MESSAGE);
    expect(log.eventsOfType('provider_error').map((event) => event.payload)).toEqual([
      {
        phase: 'teaching:quiz_ask',
        kind: 'timeout',
        retryable: true,
        error: 'Language model call timed out.',
      },
    ]);

    const retried = await reply(driver, outcome.state, 'Please try again.');
    expect(retried.phase).toEqual({ kind: 'teaching', step: 'quiz_evaluate' });
    expect(retried.history[retried.history.length - 1]?.content).toBe('**Quick check:** Quick question?');
  });

  it('builds the final test from the completed objectives only after an early exit', async () => {
    const { context, llm, log } = createHarness();
    const driver = new SessionDriver(context);

    const started = await settle(driver, newSession());
    const atBoundary = await completeObjective(driver, started);
    expect(atBoundary.phase).toEqual({ kind: 'teaching', step: 'probe_ask' });
    expect(atBoundary.history[atBoundary.history.length - 1]?.content).toBe(
      "Let's move to the next objective: Write the recursive step",
    );

    const outcome = await driver.run({ ...atBoundary, exitRequested: true, exitRequestedDuring: 'teaching' });

    expect(outcome.ok).toBe(true);
    expect(outcome.ticks).toBe(2);
    expect(outcome.state.phase).toEqual({ kind: 'testing' });
    expect(outcome.state.history[atBoundary.history.length]?.content).toBe(EXIT_ACKNOWLEDGEMENT);
    expect(llm.callsFor('test_builder')[0]?.history[0]?.content).toBe(
      'Learning objectives (numbered in this order):\n- Identify the base case of a recursive function',
    );
    expect(outcome.state.testQuestions.map((question) => question.objectiveIds)).toEqual([['obj-base-case']]);
    expect(log.eventsOfType('final_test_built')[0]?.payload.objectiveIds).toEqual(['obj-base-case']);
  });

  it('reports a structured failure when the tick limit is reached', async () => {
    const { context, log } = createHarness({ settings: { tickLimit: 2 } });

    const outcome = await new SessionDriver(context).run(newSession());

    expect(outcome.ok).toBe(false);
    expect(outcome.ticks).toBe(2);
    expect(outcome.state.phase).toEqual({ kind: 'teaching', step: 'probe_ask' });
    if (!outcome.ok) {
      expect(outcome.failure).toEqual({
        code: 'TICK_LIMIT_EXCEEDED',
        message: 'Session did not settle within 2 ticks (stuck in teaching:probe_ask).',
        phase: 'teaching:probe_ask',
      });
    }
    expect(log.eventsOfType('tick_failed')).toHaveLength(1);
  });

  it('rejects an undeclared transition and keeps the last good state', async () => {
    const { context, log } = createHarness();
    const persisted: SessionState[] = [];
    const driver = new SessionDriver(context, {
      ...PHASE_HANDLERS,
      intro: (state) => Promise.resolve(continueWith(state, { phase: { kind: 'grading' } })),
    });

    const outcome = await driver.run(newSession(), {
      onTick: (state) => {
        persisted.push(state);
      },
    });

    expect(outcome.ok).toBe(false);
    expect(outcome.state.phase).toEqual({ kind: 'intro' });
    expect(persisted.map((state) => state.phase.kind)).toEqual(['intro']);
    if (!outcome.ok) {
      expect(outcome.failure.code).toBe('ILLEGAL_PHASE_TRANSITION');
      expect(outcome.failure.message).toBe('Transition intro -> grading is not a declared edge.');
    }
    expect(log.eventsOfType('tick_failed')[0]?.payload).toEqual({
      phase: 'intro',
      code: 'ILLEGAL_PHASE_TRANSITION',
      message: 'Transition intro -> grading is not a declared edge.',
    });
  });

  it('rejects a tick that moves the objective index backwards', async () => {
    const { context } = createHarness();
    const driver = new SessionDriver(context, {
      ...PHASE_HANDLERS,
      teaching: (state) => Promise.resolve(waitForLearner(state, { objectiveIndex: 0 })),
    });
    const state: SessionState = { ...newSession(), phase: { kind: 'teaching', step: 'probe_ask' }, objectiveIndex: 1 };

    const outcome = await driver.run(state);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure).toEqual({
        code: 'SESSION_INVARIANT_VIOLATED',
        message: 'objectiveIndex moved backwards.',
        phase: 'teaching:probe_ask',
      });
    }
  });

  it('rejects a tick that rewrites earlier turns', async () => {
    const { context } = createHarness();
    const driver = new SessionDriver(context, {
      ...PHASE_HANDLERS,
      recap: (state) =>
        Promise.resolve(waitForLearner({ ...state, history: state.history.map((turn) => ({ ...turn })) })),
    });
    const state = withLearnerTurn({ ...newSession(), phase: { kind: 'recap' } }, 'summary please');

    const outcome = await driver.run(state);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.message).toBe('Conversation history was rewritten.');
    }
  });

  it('turns an unexpected handler error into a failure', async () => {
    const { context } = createHarness();
    const driver = new SessionDriver(context, {
      ...PHASE_HANDLERS,
      intro: () => Promise.reject(new Error('disk full')),
    });

    const outcome = await driver.run(newSession());

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure).toEqual({ code: 'TICK_FAILED', message: 'disk full', phase: 'intro' });
    }
  });

  it('rethrows when the node cannot be found', async () => {
    const store = new InMemoryKnowledgeStore().addProject(PROJECT_ID, 'Programming basics');
    const { context, log } = createHarness({ store });

    await expect(new SessionDriver(context).run(newSession())).rejects.toBeInstanceOf(ContextNotFoundError);
    expect(store.sessions.size).toBe(0);
    expect(log.events).toHaveLength(0);
  });

  it('treats a node of another project as missing', async () => {
    const store = new InMemoryKnowledgeStore().addNode({
      id: 'node-recursion',
      projectId: 'project-2',
      title: 'Recursion',
      objectives: [],
    });
    const { context } = createHarness({ store });

    await expect(new SessionDriver(context).run(newSession())).rejects.toThrow('Node node-recursion was not found.');
  });

  it('stamps every turn with the injected clock', async () => {
    const { context } = createHarness();

    const state = await settle(new SessionDriver(context), newSession());

    expect(new Set(state.history.map((turn) => turn.createdAt))).toEqual(new Set([FIXED_NOW]));
  });
});
