import type { SessionState } from '../@types';
import {
  extractControlSignal,
  objectiveCompleteSchema,
  prereqCompleteSchema,
} from '../tools/controlSignals';
import { ControlParseError, ControlValidationError } from '../shared/errors/engine-errors';
import { emitEvent, type EngineContext } from './context';

export type CompletionFlag = 'objective_complete' | 'prereq_complete';

/**
 * Reads a completion directive from model text. A malformed or invalid block is
 * logged and counts as "not complete".
 */
export const readCompletionFlag = (
  context: EngineContext,
  state: SessionState,
  text: string,
  flag: CompletionFlag,
): boolean => {
  try {
    if (flag === 'objective_complete') {
      return extractControlSignal(text, objectiveCompleteSchema)?.objective_complete === true;
    }

    return extractControlSignal(text, prereqCompleteSchema)?.prereq_complete === true;
  } catch (error: unknown) {
    if (error instanceof ControlParseError || error instanceof ControlValidationError) {
      emitEvent(context, state, 'control_block_rejected', {
        flag,
        code: error.code,
        error: error.message,
      });
      return false;
    }

    throw error;
  }
};
