import type { PhaseKind } from '../../@types';
import type { PhaseHandler } from '../context';
import { loadContext } from '../contextLoader';
import { handleCompleted } from './completed';
import { handleGrading } from './grading';
import { handleIntro } from './intro';
import { handlePrerequisiteCheck } from './prerequisiteCheck';
import { handlePrerequisiteQuiz } from './prerequisiteQuiz';
import { handleRecap } from './recap';
import { handleTeaching } from './teaching';
import { handleTesting } from './testing';
import { handleWrapUp } from './wrapUp';

export const PHASE_HANDLERS: Readonly<Record<PhaseKind, PhaseHandler>> = {
  load_context: loadContext,
  intro: handleIntro,
  prerequisite_check: handlePrerequisiteCheck,
  recap: handleRecap,
  quiz: handlePrerequisiteQuiz,
  teaching: handleTeaching,
  testing: handleTesting,
  grading: handleGrading,
  wrap_up: handleWrapUp,
  completed: handleCompleted,
};
