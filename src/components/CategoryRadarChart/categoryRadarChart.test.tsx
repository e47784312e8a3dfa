import React from 'react';
import { render, screen, cleanup } from '@testing-library/react';
import CategoryRadarChart, { buildChartData, CustomTooltip } from './index';
import { computeResult, CategoryScore } from '../../utils/scoring';
import { READINESS_POLICY, RISK_POLICY, ScoringPolicy } from '../../utils/classifier';
import { createSmallSchema, responsesFrom, ResizeObserverMock } from '../../test-utils/assessmentHelpers';

// Mock Recharts to avoid dimension warnings in tests
vi.mock('recharts', async () => {
  const actual = await vi.importActual('recharts');
  return {
    ...actual,
    ResponsiveContainer: ({ children }: { children: React.ReactNode }) => (
      <div style={{ width: 400, height: 300 }}>{children}</div>
    )
  };
});

(global as unknown as { ResizeObserver: typeof ResizeObserverMock }).ResizeObserver = ResizeObserverMock;

const schema = createSmallSchema();

const scoresFor = (policy: ScoringPolicy): CategoryScore[] => {
  // Oversight average 0.5, Privacy average 2
  const result = computeResult(responsesFrom(schema, [[0, 1], [2, 2]]), schema, policy);
  return result ? result.categories : [];
};

describe('CategoryRadarChart', () => {
  afterEach(() => {
    cleanup();
  });

  it('renders the radar chart container', () => {
    render(<CategoryRadarChart categories={scoresFor(READINESS_POLICY)} schemaCategories={schema.categories} />);
    expect(document.querySelector('.radar-chart-container')).toBeTruthy();
  });

  describe('buildChartData', () => {
    it('plots performance per tenet with its hover description', () => {
      expect(buildChartData(scoresFor(READINESS_POLICY), schema.categories)).toEqual([
        { tenet: 'Oversight', performance: 75, hoverDescription: 'Who reviews AI output' },
        { tenet: 'Privacy', performance: 0, hoverDescription: 'How data reaches AI tools' }
      ]);
    });

    it('plots the same performance under risk scoring', () => {
      const data = buildChartData(scoresFor(RISK_POLICY), schema.categories);
      expect(data.map((d) => d.performance)).toEqual([75, 0]);
    });

    it('rounds to one decimal place', () => {
      const [score] = scoresFor(READINESS_POLICY);
      const [datum] = buildChartData([{ ...score, averageRisk: 2 / 3 }], schema.categories);
      expect(datum.performance).toBe(66.7);
    });
  });

  describe('CustomTooltip', () => {
    it('renders nothing when inactive', () => {
      const { container } = render(<CustomTooltip active={false} />);
      expect(container.firstChild).toBeNull();
    });

    it('shows tenet, score and description', () => {
      const payload = [{ payload: { tenet: 'Oversight', performance: 75, hoverDescription: 'Who reviews AI output' } }];
      render(<CustomTooltip active payload={payload} />);

      expect(screen.getByText('Oversight')).toBeDefined();
      expect(screen.getByText('Performance: 75%')).toBeDefined();
      expect(screen.getByText('Who reviews AI output')).toBeDefined();
    });
  });
});
