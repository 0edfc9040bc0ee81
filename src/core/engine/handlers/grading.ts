import type { Objective, SessionState } from '../../@types';
import { formatPercent } from '../../shared/text';
import { aggregateScores } from '../../tools/grader';
import { continueWith, emitEvent, sayAsTutor, type PhaseHandler } from '../context';

export const buildResultsMessage = (scores: number[], finalScore: number): string => {
  const lines = scores.map((score, index) => `Q${index + 1}: ${formatPercent(score)}`);
  return ['### Test Results', ...lines, '', `**Overall score:** ${formatPercent(finalScore)}`].join('\n');
};

const withMastery = (objectives: Objective[], updated: Map<string, number>): Objective[] => {
  return objectives.map((objective) => {
    const mastery = updated.get(objective.id);
    return mastery === undefined ? objective : { ...objective, mastery };
  });
};

/**
 * Grades every test question, folds the per-objective scores into stored
 * mastery and reports the results.
 */
export const handleGrading: PhaseHandler = async (state, context): Promise<SessionState> => {
  const graded = await context.grader.gradeTest(state.testQuestions, state.testAnswers);

  for (const grade of graded) {
    if (grade.source === 'default') {
      emitEvent(context, state, 'grading_output_rejected', {
        questionIndex: grade.questionIndex,
        reasoning: grade.reasoning,
      });
    }
  }

  const { objectiveScores, finalScore } = aggregateScores(state.testQuestions, graded);
  const update = await context.mastery.applyObjectiveScores(
    state.nodeId,
    [...state.objectivesToTeach, ...state.objectivesKnown],
    objectiveScores,
  );
  const masteryById = new Map(update.changed.map((change) => [change.objectiveId, change.next]));

  const scored: SessionState = {
    ...state,
    gradedQuestions: graded,
    objectiveScores,
    finalScore,
    objectivesToTeach: withMastery(state.objectivesToTeach, masteryById),
    objectivesKnown: withMastery(state.objectivesKnown, masteryById),
  };

  emitEvent(context, scored, 'mastery_updated', {
    nodeMastery: update.nodeMastery,
    objectives: update.changed,
  });
  emitEvent(context, scored, 'grading_completed', {
    finalScore,
    questionCount: graded.length,
    answered: state.testAnswers.length,
  });

  const reported = sayAsTutor(context, scored, buildResultsMessage(graded.map((grade) => grade.score), finalScore));
  return continueWith(reported, { phase: { kind: 'wrap_up' } });
};
