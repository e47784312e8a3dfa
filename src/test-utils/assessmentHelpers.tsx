// Test utilities for the assessment core and for components that read useAssessment.

import React from 'react';
import { render, RenderOptions } from '@testing-library/react';
import { MemoryRouter } from 'react-router-dom';
import { AssessmentProvider } from '../context/AssessmentContext';
import type { AssessmentContextValue } from '../context/AssessmentContext';
import type { AssessmentSchema, RawAssessment } from '../types/questions';
import type { RecommendationTable } from '../types/recommendations';
import { buildAssessmentSchema } from '../utils/schema';
import { recordResponse, ResponseSet, EMPTY_RESPONSES } from '../utils/answerStore';
import { getScoringPolicy } from '../utils/classifier';
import { createSession, SessionState } from '../utils/navigation';
import { EMPTY_SELECTION } from '../utils/recommendations';
import type { AssessmentVariant } from '../utils/assessmentCatalog';
import type { ScoringMode } from '../utils/scoring';

const threeOptions = [
  { text: 'Formal, documented practice', risk: 0 },
  { text: 'Informal practice', risk: 1 },
  { text: 'No practice in place', risk: 2 }
];

// Smallest useful schema: two categories with two questions each.
export const SMALL_RAW_ASSESSMENT: RawAssessment = {
  id: 'small',
  title: 'Small Assessment',
  subtitle: 'Two categories, two questions each',
  categories: [
    {
      name: 'Oversight Tenet',
      tenet: 'Oversight',
      description: 'Human oversight of AI decisions',
      hoverDescription: 'Who reviews AI output',
      questions: [
        { text: 'Is AI output reviewed?', options: threeOptions },
        { text: 'Are reviews documented?', options: threeOptions }
      ]
    },
    {
      name: 'Privacy Tenet',
      tenet: 'Privacy',
      description: 'Protection of personal data',
      hoverDescription: 'How data reaches AI tools',
      questions: [
        { text: 'Is PII filtered before prompts?', options: threeOptions },
        { text: 'Are providers bound by data agreements?', options: threeOptions }
      ]
    }
  ]
};

export const createSmallSchema = (): AssessmentSchema => buildAssessmentSchema(SMALL_RAW_ASSESSMENT);

// weights[c][q]; undefined leaves the question unanswered
export const responsesFrom = (
  schema: AssessmentSchema,
  weights: ReadonlyArray<ReadonlyArray<number | undefined>>
): ResponseSet => weights.reduce<ResponseSet>(
  (acc, row, c) => row.reduce<ResponseSet>(
    (inner, w, q) => (w === undefined ? inner : recordResponse(inner, schema, c, q, w)),
    acc
  ),
  EMPTY_RESPONSES
);

export const sessionWith = (
  schema: AssessmentSchema,
  weights: ReadonlyArray<ReadonlyArray<number | undefined>>,
  overrides: Partial<Omit<SessionState, 'responses'>> = {}
): SessionState => ({
  ...createSession(),
  responses: responsesFrom(schema, weights),
  ...overrides
});

export const SAMPLE_RECOMMENDATIONS: RecommendationTable = {
  tenets: {
    Oversight: {
      icon: '📋',
      immediate: {
        focus: 'Establish review ownership',
        controls: { 'Governance Controls': ['Name an accountable reviewer'] },
        standards: 'NIST RMF GOVERN-2.1'
      },
      recommended: {
        focus: 'Mature the review process',
        controls: { 'Operational Controls': ['Track review coverage'] },
        standards: 'NIST RMF MANAGE-1.1'
      }
    },
    Privacy: {
      icon: '🔒',
      recommended: {
        focus: 'Harden data handling',
        controls: { 'Technical Controls': ['Add PII scanning to prompts'] },
        standards: 'GDPR Article 25'
      }
    }
  },
  general: [
    { title: 'Adopt a governance framework', description: 'Set up an AI review board.', sources: 'NIST AI RMF GOVERN' }
  ],
  priority: {
    middle: 'Start with governance.',
    worst: 'Act on governance and privacy now.'
  }
};

export const createMockAssessment = (
  overrides: Partial<AssessmentContextValue> = {}
): AssessmentContextValue => {
  const schema = overrides.schema ?? createSmallSchema();
  const session = overrides.session ?? createSession();
  return {
    schema,
    policy: getScoringPolicy('readiness'),
    recommendationTable: SAMPLE_RECOMMENDATIONS,
    session,
    phase: { status: 'in-progress', categoryIndex: 0 },
    answeredCount: 0,
    totalQuestions: 4,
    isFinalStep: false,
    canGoNext: false,
    canGoPrevious: false,
    recordAnswer: () => {},
    goNext: () => false,
    goPrevious: () => false,
    restart: () => {},
    result: undefined,
    recommendations: EMPTY_SELECTION,
    ...overrides
  };
};

interface ProviderOptions {
  variant?: AssessmentVariant;
  mode?: ScoringMode;
  initialSession?: SessionState;
  route?: string;
}

// Full integration render with the real provider and an in-memory router.
export const renderWithAssessment = (
  ui: React.ReactElement,
  { variant, mode, initialSession, route = '/' }: ProviderOptions = {},
  options?: Omit<RenderOptions, 'wrapper'>
) => {
  const Wrapper: React.FC<{ children: React.ReactNode }> = ({ children }) => (
    <AssessmentProvider variant={variant} mode={mode} initialSession={initialSession}>
      <MemoryRouter initialEntries={[route]}>{children}</MemoryRouter>
    </AssessmentProvider>
  );
  return render(ui, { wrapper: Wrapper, ...options });
};

// jsdom has no showModal/close on <dialog>
export const installDialogPolyfill = () => {
  HTMLDialogElement.prototype.showModal = function (this: HTMLDialogElement) {
    this.open = true;
  };
  HTMLDialogElement.prototype.close = function (this: HTMLDialogElement) {
    this.open = false;
  };
};

// Recharts' ResponsiveContainer needs ResizeObserver
export class ResizeObserverMock {
  observe() { /* noop */ }
  unobserve() { /* noop */ }
  disconnect() { /* noop */ }
}
