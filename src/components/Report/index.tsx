import React, { useState } from 'react';
import { Link, useNavigate } from 'react-router-dom';
import { useAssessment } from '../../context/AssessmentContext';
import CategoryRadarChart from '../CategoryRadarChart';
import RecommendedActions from '../RecommendedActions';
import RestartDialog from '../RestartDialog';
import { TrackedButton } from '../TrackedButton';

export const formatPercent = (value: number): string => `${value.toFixed(1)}%`;

const Report: React.FC = () => {
  const { schema, policy, session, result, recommendations, answeredCount, restart } = useAssessment();
  const [showRestartConfirm, setShowRestartConfirm] = useState(false);
  const navigate = useNavigate();

  if (!session.assessmentComplete || !result) {
    return (
      <div className='panel report-panel'>
        <h2>Assessment Results</h2>
        <p className='no-results'>
          No assessment data available yet. <Link to='/assessment'>Finish the assessment</Link> to see your results.
        </p>
      </div>
    );
  }

  const handleRestart = () => {
    setShowRestartConfirm(false);
    restart();
    navigate('/assessment');
  };

  const { presentation } = policy;

  return (
    <div className='panel report-panel'>
      <h2>{schema.title} Results</h2>

      <div
        className={`level-banner severity-${result.severity}`}
        style={{ backgroundColor: presentation[result.severity].color }}
      >
        🎯 {policy.levelLabel}: {result.level} ({formatPercent(result.percentage)} {policy.scoreLabel})
      </div>

      <section className='level-summary' aria-label='Level summary'>
        {(['best', 'middle', 'worst'] as const).map((severity) => (
          <div key={severity} className={`stat-card severity-${severity}`}>
            <div className='stat-value'>{result.levelCounts[severity]}</div>
            <div className='stat-label'>{presentation[severity].title}</div>
          </div>
        ))}
      </section>

      <div className='results-grid'>
        <section className='report-categories-section'>
          <h3>📊 Tenets Overview</h3>
          <CategoryRadarChart categories={result.categories} schemaCategories={schema.categories} />
        </section>

        <section className='classification-levels'>
          <h3>📈 Classification Levels</h3>
          <ul>
            {result.categories.map((c) => (
              <li
                key={c.category}
                className='classification-row'
                title={schema.categories[c.categoryIndex].hoverDescription}
              >
                <span className='level-dot' style={{ backgroundColor: presentation[c.severity].color }} />
                <span className='classification-tenet'>{c.tenet}</span>
                <span className='classification-score'>{formatPercent(c.percentage)}</span>
                <span className='classification-level'>{presentation[c.severity].title}</span>
              </li>
            ))}
          </ul>
        </section>
      </div>

      <RecommendedActions
        selection={recommendations}
        policy={policy}
        allCategoriesAtBest={result.levelCounts.middle === 0 && result.levelCounts.worst === 0}
      />

      <TrackedButton
        className='btn-primary restart-btn'
        trackingName='take_again'
        trackingProperties={{ level: result.level }}
        onClick={() => setShowRestartConfirm(true)}
      >
        🔄 Take Assessment Again
      </TrackedButton>

      <RestartDialog
        isOpen={showRestartConfirm}
        answeredCount={answeredCount}
        onConfirm={handleRestart}
        onCancel={() => setShowRestartConfirm(false)}
      />
    </div>
  );
};

export default Report;
