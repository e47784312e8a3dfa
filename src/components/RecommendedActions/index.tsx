import React from 'react';
import type { ScoringPolicy } from '../../utils/classifier';
import type { RecommendationSelection, TenetAction } from '../../utils/recommendations';

interface RecommendedActionsProps {
  selection: RecommendationSelection;
  policy: ScoringPolicy;
  // False when some category sits below the best level even though nothing was selected
  allCategoriesAtBest: boolean;
}

const TenetActionCard: React.FC<{ action: TenetAction }> = ({ action }) => (
  <article className={`tenet-action ${action.urgency}`}>
    <h4>
      {action.icon && <span className='tenet-icon'>{action.icon}</span>} {action.tenet}: {action.focus}
    </h4>
    {Object.entries(action.controls).map(([controlType, items]) => (
      <div key={controlType} className='control-group'>
        <h5>{controlType}</h5>
        <ul>
          {items.map((item) => <li key={item}>{item}</li>)}
        </ul>
      </div>
    ))}
    <p className='standards'><strong>Standards:</strong> {action.standards}</p>
  </article>
);

const RecommendedActions: React.FC<RecommendedActionsProps> = ({ selection, policy, allCategoriesAtBest }) => {
  const { immediate, recommended, general, priority } = selection;
  const worst = policy.presentation.worst.title;
  const middle = policy.presentation.middle.title.toLowerCase();
  const best = policy.presentation.best.title.toLowerCase();
  const hasTenetGuidance = immediate.length > 0 || recommended.length > 0;

  if (!hasTenetGuidance && general.length === 0) {
    return (
      <section className='recommended-actions'>
        <h3>Recommended Actions</h3>
        <p className='no-actions'>
          {allCategoriesAtBest
            ? `No actions required. Every category is at the ${best} level.`
            : `No guidance applies at the ${best} overall level.`}
        </p>
      </section>
    );
  }

  return (
    <section className='recommended-actions'>
      <h3>Recommended Actions</h3>

      {hasTenetGuidance && (
        <div className='immediate-actions'>
          <h4 className='section-heading worst'>Immediate Actions Required ({worst} Level)</h4>
          {immediate.length === 0
            ? <p className='no-actions'>No immediate actions required. All tenets are at {middle} or {best} levels.</p>
            : immediate.map((a) => <TenetActionCard key={a.tenet} action={a} />)}
        </div>
      )}

      {recommended.length > 0 && (
        <div className='recommended-improvements'>
          <h4 className='section-heading middle'>Recommended Improvements</h4>
          {recommended.map((a) => <TenetActionCard key={a.tenet} action={a} />)}
        </div>
      )}

      {general.length > 0 && (
        <ol className='general-recommendations'>
          {general.map((r) => (
            <li key={r.title} className='recommendation-card'>
              <h4>{r.title}</h4>
              <p>{r.description}</p>
              <p className='sources'><strong>Sources:</strong> {r.sources}</p>
            </li>
          ))}
        </ol>
      )}

      {priority && (
        <div className='priority-note'>
          <h4>🎯 Priority Implementation</h4>
          <p>{priority}</p>
        </div>
      )}
    </section>
  );
};

export default RecommendedActions;
