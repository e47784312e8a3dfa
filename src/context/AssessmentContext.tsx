import React, { createContext, useContext, useEffect, useMemo, useState } from 'react';
import type { AssessmentSchema } from '../types/questions';
import type { RecommendationTable } from '../types/recommendations';
import { APP_CONFIG } from '../config/appConfig';
import { ASSESSMENT_CATALOG, AssessmentVariant } from '../utils/assessmentCatalog';
import { totalAnswered, totalQuestions } from '../utils/answerStore';
import { getScoringPolicy, ScoringPolicy } from '../utils/classifier';
import {
  answer,
  canGoNext,
  canGoPrevious,
  createSession,
  getPhase,
  isLastCategory,
  NavigationPhase,
  next,
  previous,
  restart,
  SessionState
} from '../utils/navigation';
import { computeResult, OverallResult, ScoringMode } from '../utils/scoring';
import { EMPTY_SELECTION, RecommendationSelection, selectRecommendations } from '../utils/recommendations';
import {
  initAnalytics,
  trackAnswer,
  trackAssessmentCompleted,
  trackNavigation,
  trackRestart
} from '../utils/analytics';

interface AssessmentContextValue {
  schema: AssessmentSchema;
  policy: ScoringPolicy;
  recommendationTable: RecommendationTable;
  session: SessionState;
  phase: NavigationPhase;
  answeredCount: number;
  totalQuestions: number;
  isFinalStep: boolean;
  canGoNext: boolean;
  canGoPrevious: boolean;
  recordAnswer: (categoryIndex: number, questionIndex: number, weight: number) => void;
  goNext: () => boolean;
  goPrevious: () => boolean;
  restart: () => void;
  // Defined once at least one answer exists
  result?: OverallResult;
  // Only populated after completion
  recommendations: RecommendationSelection;
}

export type { AssessmentContextValue };

const AssessmentContext = createContext<AssessmentContextValue | undefined>(undefined);

interface AssessmentProviderProps {
  children: React.ReactNode;
  variant?: AssessmentVariant;
  mode?: ScoringMode;
  initialSession?: SessionState;
}

export const AssessmentProvider: React.FC<AssessmentProviderProps> = ({
  children,
  variant = APP_CONFIG.assessmentVariant,
  mode,
  initialSession
}) => {
  const entry = ASSESSMENT_CATALOG[variant];
  const { schema, recommendations: recommendationTable } = entry;
  // An explicit variant without an explicit mode uses that variant's own polarity.
  const scoringMode = mode
    ?? (variant === APP_CONFIG.assessmentVariant ? APP_CONFIG.scoringMode : entry.defaultMode);
  const policy = getScoringPolicy(scoringMode);

  const [session, setSession] = useState<SessionState>(() => initialSession ?? createSession());

  useEffect(() => {
    initAnalytics(APP_CONFIG.amplitudeApiKey);
  }, []);

  const result = useMemo(
    () => computeResult(session.responses, schema, policy),
    [session.responses, schema, policy]
  );

  const recommendations = useMemo(
    () => (session.assessmentComplete && result ? selectRecommendations(result, recommendationTable) : EMPTY_SELECTION),
    [session.assessmentComplete, result, recommendationTable]
  );

  const recordAnswer = (categoryIndex: number, questionIndex: number, weight: number) => {
    // Structural errors throw here, in the caller's handler, not during render.
    const transition = answer(session, schema, categoryIndex, questionIndex, weight);
    if (!transition.accepted) return;
    setSession(transition.state);
    trackAnswer(categoryIndex, questionIndex, weight);
  };

  const goNext = (): boolean => {
    const transition = next(session, schema);
    if (!transition.accepted) {
      trackNavigation('next', session.currentCategoryIndex, transition.reason);
      return false;
    }
    setSession(transition.state);
    trackNavigation('next', session.currentCategoryIndex);
    if (transition.state.assessmentComplete) {
      const finalResult = computeResult(transition.state.responses, schema, policy);
      if (finalResult) trackAssessmentCompleted(finalResult);
    }
    return true;
  };

  const goPrevious = (): boolean => {
    const transition = previous(session);
    if (!transition.accepted) {
      trackNavigation('previous', session.currentCategoryIndex, transition.reason);
      return false;
    }
    setSession(transition.state);
    trackNavigation('previous', session.currentCategoryIndex);
    return true;
  };

  const restartAssessment = () => {
    trackRestart(totalAnswered(session.responses), session.assessmentComplete);
    setSession(restart());
  };

  return (
    <AssessmentContext.Provider
      value={{
        schema,
        policy,
        recommendationTable,
        session,
        phase: getPhase(session),
        answeredCount: totalAnswered(session.responses),
        totalQuestions: totalQuestions(schema),
        isFinalStep: isLastCategory(session, schema),
        canGoNext: canGoNext(session, schema),
        canGoPrevious: canGoPrevious(session),
        recordAnswer,
        goNext,
        goPrevious,
        restart: restartAssessment,
        result,
        recommendations
      }}
    >
      {children}
    </AssessmentContext.Provider>
  );
};

export const useAssessment = () => {
  const ctx = useContext(AssessmentContext);
  if (!ctx) throw new Error('useAssessment must be used within an AssessmentProvider');
  return ctx;
};
