import type { AssessmentSchema } from '../types/questions';
import {
  assertValidResponse,
  EMPTY_RESPONSES,
  isAssessmentComplete,
  isCategoryComplete,
  recordResponse,
  ResponseSet
} from './answerStore';

export interface SessionState {
  responses: ResponseSet;
  currentCategoryIndex: number;
  assessmentComplete: boolean;
}

export type NavigationPhase =
  | { status: 'in-progress'; categoryIndex: number }
  | { status: 'complete' };

export type RejectionReason =
  | 'category-incomplete'
  | 'assessment-incomplete'
  | 'first-category'
  | 'assessment-complete';

export type TransitionResult =
  | { accepted: true; state: SessionState }
  | { accepted: false; state: SessionState; reason: RejectionReason };

export const createSession = (): SessionState => ({
  responses: EMPTY_RESPONSES,
  currentCategoryIndex: 0,
  assessmentComplete: false
});

export const getPhase = (state: SessionState): NavigationPhase =>
  state.assessmentComplete
    ? { status: 'complete' }
    : { status: 'in-progress', categoryIndex: state.currentCategoryIndex };

export const isLastCategory = (state: SessionState, schema: AssessmentSchema): boolean =>
  state.currentCategoryIndex === schema.categories.length - 1;

const accept = (state: SessionState): TransitionResult => ({ accepted: true, state });
const reject = (state: SessionState, reason: RejectionReason): TransitionResult => ({
  accepted: false,
  state,
  reason
});

// Why `next` would be refused right now, or undefined when it is allowed.
const nextBlocker = (state: SessionState, schema: AssessmentSchema): RejectionReason | undefined => {
  if (state.assessmentComplete) return 'assessment-complete';
  if (isLastCategory(state, schema)) {
    // The final step checks every category, not just the current one.
    return isAssessmentComplete(state.responses, schema) ? undefined : 'assessment-incomplete';
  }
  return isCategoryComplete(state.responses, schema, state.currentCategoryIndex)
    ? undefined
    : 'category-incomplete';
};

export const canGoNext = (state: SessionState, schema: AssessmentSchema): boolean =>
  nextBlocker(state, schema) === undefined;

export const canGoPrevious = (state: SessionState): boolean =>
  !state.assessmentComplete && state.currentCategoryIndex > 0;

export const next = (state: SessionState, schema: AssessmentSchema): TransitionResult => {
  const blocker = nextBlocker(state, schema);
  if (blocker) return reject(state, blocker);
  if (isLastCategory(state, schema)) {
    return accept({ ...state, assessmentComplete: true });
  }
  return accept({ ...state, currentCategoryIndex: state.currentCategoryIndex + 1 });
};

export const previous = (state: SessionState): TransitionResult => {
  if (state.assessmentComplete) return reject(state, 'assessment-complete');
  if (state.currentCategoryIndex === 0) return reject(state, 'first-category');
  return accept({ ...state, currentCategoryIndex: state.currentCategoryIndex - 1 });
};

export const restart = (): SessionState => createSession();

/**
 * Records an answer. Structural problems (bad index or weight) throw;
 * answering after completion is a rejected transition.
 */
export const answer = (
  state: SessionState,
  schema: AssessmentSchema,
  categoryIndex: number,
  questionIndex: number,
  weight: number
): TransitionResult => {
  assertValidResponse(schema, categoryIndex, questionIndex, weight);
  if (state.assessmentComplete) return reject(state, 'assessment-complete');
  const responses = recordResponse(state.responses, schema, categoryIndex, questionIndex, weight);
  return accept(responses === state.responses ? state : { ...state, responses });
};
