import { render, screen, cleanup } from '@testing-library/react';
import RecommendedActions from './index';
import { READINESS_POLICY, RISK_POLICY, ScoringPolicy } from '../../utils/classifier';
import { EMPTY_SELECTION, RecommendationSelection, selectRecommendations } from '../../utils/recommendations';
import { computeResult } from '../../utils/scoring';
import { ASSESSMENT_CATALOG } from '../../utils/assessmentCatalog';
import type { RecommendationTable } from '../../types/recommendations';
import { createSmallSchema, responsesFrom, SAMPLE_RECOMMENDATIONS } from '../../test-utils/assessmentHelpers';

const schema = createSmallSchema();

const selectionFor = (
  weights: number[][],
  policy: ScoringPolicy = READINESS_POLICY,
  table: RecommendationTable = SAMPLE_RECOMMENDATIONS
): RecommendationSelection => {
  const result = computeResult(responsesFrom(schema, weights), schema, policy);
  return result ? selectRecommendations(result, table) : EMPTY_SELECTION;
};

describe('RecommendedActions', () => {
  afterEach(() => {
    cleanup();
  });

  it('reports that nothing is required at the best level', () => {
    render(<RecommendedActions selection={EMPTY_SELECTION} policy={READINESS_POLICY} allCategoriesAtBest />);
    expect(screen.getByText('No actions required. Every category is at the advanced level.')).toBeDefined();
  });

  it('uses the risk level names under risk scoring', () => {
    render(<RecommendedActions selection={EMPTY_SELECTION} policy={RISK_POLICY} allCategoriesAtBest />);
    expect(screen.getByText('No actions required. Every category is at the low level.')).toBeDefined();
  });

  describe('with a basic tenet', () => {
    beforeEach(() => {
      // Oversight 0% (Basic), Privacy 50% (Developing), overall 25% (Basic)
      render(<RecommendedActions selection={selectionFor([[2, 2], [1, 1]])} policy={READINESS_POLICY} allCategoriesAtBest={false} />);
    });

    it('lists immediate actions under the worst level heading', () => {
      expect(screen.getByText('Immediate Actions Required (Basic Level)')).toBeDefined();
      expect(screen.getByText('Oversight: Establish review ownership')).toBeDefined();
      expect(screen.getByText('Name an accountable reviewer')).toBeDefined();
      expect(screen.getByText('NIST RMF GOVERN-2.1')).toBeDefined();
    });

    it('lists recommended improvements for every tenet below the best level', () => {
      expect(screen.getByText('Recommended Improvements')).toBeDefined();
      expect(screen.getByText('Oversight: Mature the review process')).toBeDefined();
      expect(screen.getByText('Privacy: Harden data handling')).toBeDefined();
    });

    it('shows the general list and the priority note', () => {
      expect(screen.getByText('Adopt a governance framework')).toBeDefined();
      expect(screen.getByText('NIST AI RMF GOVERN')).toBeDefined();
      expect(screen.getByText('🎯 Priority Implementation')).toBeDefined();
      expect(screen.getByText('Act on governance and privacy now.')).toBeDefined();
    });
  });

  it('says when no tenet needs immediate action', () => {
    render(<RecommendedActions selection={selectionFor([[1, 1], [1, 1]])} policy={READINESS_POLICY} allCategoriesAtBest={false} />);

    expect(screen.getByText(
      'No immediate actions required. All tenets are at developing or advanced levels.'
    )).toBeDefined();
    expect(screen.getByText('Start with governance.')).toBeDefined();
  });

  it('shows only the general list when the content has no tenet guidance', () => {
    const table: RecommendationTable = { ...SAMPLE_RECOMMENDATIONS, tenets: {} };
    render(<RecommendedActions selection={selectionFor([[2, 2], [2, 2]], RISK_POLICY, table)} policy={RISK_POLICY} allCategoriesAtBest={false} />);

    expect(screen.queryByText(/Immediate Actions Required/)).toBeNull();
    expect(screen.queryByText('Recommended Improvements')).toBeNull();
    expect(screen.getByText('Adopt a governance framework')).toBeDefined();
  });

  it('does not claim every category is best when one is not', () => {
    // Control content has no tenet guidance. Privacy at 50% risk (Medium), overall 10% (Low).
    const { schema: controls, recommendations: table } = ASSESSMENT_CATALOG.controls;
    const result = computeResult(
      responsesFrom(controls, [[0, 0], [0, 0], [0, 0], [0, 0], [1, 1]]),
      controls,
      RISK_POLICY
    );
    if (!result) throw new Error('expected a result');
    expect(result.levelCounts).toEqual({ best: 4, middle: 1, worst: 0 });

    render(
      <RecommendedActions
        selection={selectRecommendations(result, table)}
        policy={RISK_POLICY}
        allCategoriesAtBest={result.levelCounts.middle === 0 && result.levelCounts.worst === 0}
      />
    );

    expect(screen.getByText('No guidance applies at the low overall level.')).toBeDefined();
    expect(screen.queryByText(/Every category is at the low level/)).toBeNull();
  });
});
