import type { SessionState } from '../../@types';
import { waitForLearner, type PhaseHandler } from '../context';

export const handleCompleted: PhaseHandler = (state): Promise<SessionState> => Promise.resolve(waitForLearner(state));
