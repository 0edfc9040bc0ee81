import type { GradedQuestion, QuizQuestion, TestAnswer } from '../@types';
import { GradingParseError, isProviderError } from '../shared/errors/engine-errors';
import { logger } from '../shared/logger';
import { buildGraderSystemPrompt } from '../shared/prompts';
import { clampMastery } from './mastery';
import type { LlmTool } from './llm';

export const DEFAULT_GRADE = 0.5;
export const NEUTRAL_REASONING = 'The grading response could not be read, so a neutral score was recorded.';
export const PROVIDER_FAILURE_REASONING = 'Unable to grade automatically.';
export const UNANSWERED_REASONING = 'No answer was given.';

const SCORE_FIELD = /SCORE\s*:\s*(-?(?:\d+(?:\.\d+)?|\.\d+))\s*(%)?/i;
const REASONING_FIELD = /REASONING\s*:\s*([\s\S]*)$/i;

export interface ParsedGrade {
  score: number;
  reasoning: string;
}

export const parseGraderOutput = (text: string): ParsedGrade => {
  const scoreMatch = SCORE_FIELD.exec(text);
  const rawScore = scoreMatch ? Number.parseFloat(scoreMatch[1] ?? '') : Number.NaN;

  if (!Number.isFinite(rawScore)) {
    throw new GradingParseError(text, 'SCORE');
  }

  const reasoning = (REASONING_FIELD.exec(text)?.[1] ?? '').trim();
  if (!reasoning) {
    throw new GradingParseError(text, 'REASONING');
  }

  return {
    score: clampMastery(scoreMatch?.[2] ? rawScore / 100 : rawScore),
    reasoning,
  };
};

export interface SessionScores {
  objectiveScores: Record<string, number>;
  finalScore: number;
}

const mean = (values: number[]): number => {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
};

/**
 * Objective score is the mean of every question that references it. The session
 * score is the mean of the objective scores, or of the question scores when no
 * question references an objective.
 */
export const aggregateScores = (questions: QuizQuestion[], graded: GradedQuestion[]): SessionScores => {
  const byObjective = new Map<string, number[]>();

  for (const grade of graded) {
    const question = questions[grade.questionIndex];
    for (const objectiveId of question?.objectiveIds ?? []) {
      const scores = byObjective.get(objectiveId) ?? [];
      scores.push(grade.score);
      byObjective.set(objectiveId, scores);
    }
  }

  const objectiveScores: Record<string, number> = {};
  for (const [objectiveId, scores] of byObjective) {
    objectiveScores[objectiveId] = Number(mean(scores).toFixed(4));
  }

  const objectiveValues = Object.values(objectiveScores);
  const finalScore = objectiveValues.length > 0 ? mean(objectiveValues) : mean(graded.map((grade) => grade.score));

  return { objectiveScores, finalScore: Number(finalScore.toFixed(4)) };
};

export class Grader {
  public constructor(private readonly llm: LlmTool) {}

  public async gradeQuestion(question: QuizQuestion, questionIndex: number, answer: string): Promise<GradedQuestion> {
    if (answer.trim().length === 0) {
      return { questionIndex, score: 0, reasoning: UNANSWERED_REASONING, source: 'unanswered' };
    }

    const choices = question.choices && question.choices.length > 0 ? `\nOptions:\n${question.choices.join('\n')}` : '';

    try {
      const response = await this.llm.invoke(
        buildGraderSystemPrompt(),
        [{ role: 'user', content: `Question:\n${question.prompt}${choices}\n\nLearner answer:\n${answer}` }],
        { purpose: 'grader', temperature: 0, maxTokens: 200 },
      );
      const parsed = parseGraderOutput(response.text);

      return { questionIndex, score: parsed.score, reasoning: parsed.reasoning, source: 'model' };
    } catch (error: unknown) {
      if (error instanceof GradingParseError) {
        logger.warn('grading_output_rejected', {
          questionIndex,
          error: error.message,
          rawOutput: error.rawOutput.slice(0, 300),
        });
        return { questionIndex, score: DEFAULT_GRADE, reasoning: NEUTRAL_REASONING, source: 'default' };
      }

      if (isProviderError(error)) {
        logger.warn('grading_provider_failed', { questionIndex, kind: error.kind, error: error.message });
        return { questionIndex, score: DEFAULT_GRADE, reasoning: PROVIDER_FAILURE_REASONING, source: 'default' };
      }

      throw error;
    }
  }

  /** Grades every question; a question without a recorded answer is graded as blank. */
  public async gradeTest(questions: QuizQuestion[], answers: TestAnswer[]): Promise<GradedQuestion[]> {
    const answerByIndex = new Map(answers.map((answer) => [answer.questionIndex, answer.text]));
    const graded: GradedQuestion[] = [];

    for (const [index, question] of questions.entries()) {
      graded.push(await this.gradeQuestion(question, index, answerByIndex.get(index) ?? ''));
    }

    return graded;
  }
}
