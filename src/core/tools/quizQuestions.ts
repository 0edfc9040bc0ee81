import { z } from 'zod';

import type { Objective, QuizQuestion } from '../@types';
import { stripTrailingPunctuation } from '../shared/text';

const questionPayloadSchema = z.object({
  prompt: z.string().trim().min(1),
  expectedAnswer: z.string().trim().default(''),
});

const questionListPayloadSchema = z.object({
  questions: z.array(questionPayloadSchema).min(1),
});

/** Reads the first JSON object out of model text, tolerating code fences and prose around it. */
export const readJsonObject = (text: string): unknown => {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');

  if (start === -1 || end <= start) {
    return null;
  }

  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
};

export const parsePrerequisiteQuizQuestions = (
  text: string,
  prerequisites: Objective[],
  maxQuestions: number,
): QuizQuestion[] | null => {
  const parsed = questionListPayloadSchema.safeParse(readJsonObject(text));
  if (!parsed.success) {
    return null;
  }

  return parsed.data.questions.slice(0, maxQuestions).map((question, index) => {
    const objective = prerequisites.length > 0 ? prerequisites[index % prerequisites.length] : undefined;
    return {
      prompt: question.prompt,
      type: 'free_response',
      expectedAnswer: question.expectedAnswer,
      objectiveIds: objective ? [objective.id] : [],
    };
  });
};

export const buildFallbackPrerequisiteQuestions = (
  prerequisites: Objective[],
  maxQuestions: number,
): QuizQuestion[] => {
  return prerequisites.slice(0, maxQuestions).map((objective) => ({
    prompt: `Can you explain what you know about: ${stripTrailingPunctuation(objective.description)}?`,
    type: 'free_response',
    expectedAnswer: objective.description,
    objectiveIds: [objective.id],
  }));
};

export const parseMicroQuizQuestion = (text: string, objective: Objective): QuizQuestion | null => {
  const parsed = questionPayloadSchema.safeParse(readJsonObject(text));
  if (!parsed.success) {
    return null;
  }

  return {
    prompt: parsed.data.prompt,
    type: 'short_answer',
    expectedAnswer: parsed.data.expectedAnswer,
    objectiveIds: [objective.id],
  };
};

export const buildFallbackMicroQuizQuestion = (objective: Objective): QuizQuestion => ({
  prompt: `How would you apply ${stripTrailingPunctuation(objective.description)} in a situation of your own?`,
  type: 'short_answer',
  expectedAnswer: objective.description,
  objectiveIds: [objective.id],
});
