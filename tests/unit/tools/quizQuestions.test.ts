import { describe, expect, it } from 'vitest';

import {
  buildFallbackMicroQuizQuestion,
  buildFallbackPrerequisiteQuestions,
  parseMicroQuizQuestion,
  parsePrerequisiteQuizQuestions,
  readJsonObject,
} from '../../../src/core/tools/quizQuestions';
import { objective } from '../helpers/fixtures';

const prerequisites = [
  objective('p1', 'Pass parameters to a function.', 0, 'node-functions'),
  objective('p2', 'Return a value from a function', 0, 'node-functions'),
];

describe('readJsonObject', () => {
  it('reads JSON wrapped in a code fence and prose', () => {
    expect(readJsonObject('Here you go:\n```json\n{"prompt": "Why?"}\n```')).toEqual({ prompt: 'Why?' });
  });

  it('returns null when there is no object', () => {
    expect(readJsonObject('no json at all')).toBeNull();
    expect(readJsonObject('{ not: json }')).toBeNull();
  });
});

describe('parsePrerequisiteQuizQuestions', () => {
  it('maps questions onto prerequisites round-robin', () => {
    const text = JSON.stringify({
      questions: [
        { prompt: 'What is a parameter?', expectedAnswer: 'An input.' },
        { prompt: 'What does return do?' },
        { prompt: 'Can a function take no parameters?', expectedAnswer: 'Yes.' },
      ],
    });

    expect(parsePrerequisiteQuizQuestions(text, prerequisites, 4)).toEqual([
      { prompt: 'What is a parameter?', type: 'free_response', expectedAnswer: 'An input.', objectiveIds: ['p1'] },
      { prompt: 'What does return do?', type: 'free_response', expectedAnswer: '', objectiveIds: ['p2'] },
      { prompt: 'Can a function take no parameters?', type: 'free_response', expectedAnswer: 'Yes.', objectiveIds: ['p1'] },
    ]);
  });

  it('caps the number of questions', () => {
    const text = JSON.stringify({ questions: [{ prompt: 'A?' }, { prompt: 'B?' }, { prompt: 'C?' }] });

    expect(parsePrerequisiteQuizQuestions(text, prerequisites, 2)).toHaveLength(2);
  });

  it('returns null for output that does not match the expected shape', () => {
    expect(parsePrerequisiteQuizQuestions('{"questions": []}', prerequisites, 4)).toBeNull();
    expect(parsePrerequisiteQuizQuestions('Sorry, I cannot help.', prerequisites, 4)).toBeNull();
  });
});

describe('fallback questions', () => {
  it('asks one question per prerequisite', () => {
    expect(buildFallbackPrerequisiteQuestions(prerequisites, 1)).toEqual([
      {
        prompt: 'Can you explain what you know about: Pass parameters to a function?',
        type: 'free_response',
        expectedAnswer: 'Pass parameters to a function.',
        objectiveIds: ['p1'],
      },
    ]);
  });

  it('builds an application question for the micro quiz', () => {
    expect(buildFallbackMicroQuizQuestion(objective('p2', 'Return a value from a function')).prompt).toBe(
      'How would you apply Return a value from a function in a situation of your own?',
    );
  });
});

describe('parseMicroQuizQuestion', () => {
  it('reads a single short-answer question', () => {
    const target = objective('o1', 'Write the recursive step');

    expect(parseMicroQuizQuestion('{"prompt": "What shrinks each call?", "expectedAnswer": "n"}', target)).toEqual({
      prompt: 'What shrinks each call?',
      type: 'short_answer',
      expectedAnswer: 'n',
      objectiveIds: ['o1'],
    });
    expect(parseMicroQuizQuestion('{"question": "wrong key"}', target)).toBeNull();
  });
});
