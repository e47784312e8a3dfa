import React from 'react';
import { PolarAngleAxis, PolarGrid, PolarRadiusAxis, Radar, RadarChart, ResponsiveContainer, Tooltip } from 'recharts';
import type { Category } from '../../types/questions';
import { categoryPercentage, CategoryScore } from '../../utils/scoring';
import { getChartTheme } from '../../utils/theme';

interface CategoryRadarChartProps {
  categories: CategoryScore[];
  schemaCategories: readonly Category[];
}

export interface RadarDatum {
  tenet: string;
  performance: number;
  hoverDescription: string;
}

// The radar always plots performance (higher is better), whatever the scoring polarity.
export const buildChartData = (
  scores: CategoryScore[],
  schemaCategories: readonly Category[]
): RadarDatum[] => scores.map((s) => ({
  tenet: s.tenet,
  performance: +categoryPercentage(s.averageRisk, 'readiness').toFixed(1),
  hoverDescription: schemaCategories[s.categoryIndex]?.hoverDescription ?? ''
}));

interface TooltipProps {
  active?: boolean;
  payload?: Array<{ payload: RadarDatum }>;
}

export const CustomTooltip: React.FC<TooltipProps> = ({ active, payload }) => {
  if (!active || !payload || payload.length === 0) return null;
  const datum = payload[0].payload;
  return (
    <div className='radar-tooltip'>
      <p className='radar-tooltip-title'>{datum.tenet}</p>
      <p className='radar-tooltip-score'>Performance: {datum.performance}%</p>
      {datum.hoverDescription && <p className='radar-tooltip-description'>{datum.hoverDescription}</p>}
    </div>
  );
};

const CategoryRadarChart: React.FC<CategoryRadarChartProps> = ({ categories, schemaCategories }) => {
  const theme = getChartTheme();
  const chartData = buildChartData(categories, schemaCategories);

  return (
    <div className='radar-chart-container'>
      <ResponsiveContainer width='100%' height={400}>
        <RadarChart data={chartData}>
          <PolarGrid stroke={theme.grid} />
          <PolarAngleAxis dataKey='tenet' tick={{ fill: theme.text, fontSize: 12 }} />
          <PolarRadiusAxis angle={90} domain={[0, 100]} tick={{ fill: theme.text, fontSize: 10 }} />
          <Radar
            name='Performance Score'
            dataKey='performance'
            stroke={theme.stroke}
            fill={theme.fill}
            fillOpacity={0.3}
            strokeWidth={3}
          />
          <Tooltip content={<CustomTooltip />} />
        </RadarChart>
      </ResponsiveContainer>
    </div>
  );
};

export default CategoryRadarChart;
