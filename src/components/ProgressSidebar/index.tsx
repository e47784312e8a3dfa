import React from 'react';
import { useAssessment } from '../../context/AssessmentContext';
import { answeredInCategory } from '../../utils/answerStore';

export type CategoryStatus = 'complete' | 'partial' | 'empty';

export const getCategoryStatus = (answered: number, total: number): CategoryStatus => {
  if (answered === total) return 'complete';
  return answered > 0 ? 'partial' : 'empty';
};

const STATUS_ICONS: Record<CategoryStatus, string> = {
  complete: '✅',
  partial: '⏳',
  empty: '⭕'
};

const ProgressSidebar: React.FC = () => {
  const { schema, session, phase, answeredCount, totalQuestions } = useAssessment();
  const progressPercent = totalQuestions > 0 ? Math.round((answeredCount / totalQuestions) * 100) : 0;

  return (
    <aside className='progress-sidebar' aria-label='Assessment progress'>
      <h3>📊 Assessment Progress</h3>
      <div
        className='progress-bar-container'
        role='progressbar'
        aria-valuenow={progressPercent}
        aria-valuemin={0}
        aria-valuemax={100}
      >
        <div className='progress-bar' style={{ width: `${progressPercent}%` }} />
      </div>
      <p className='progress-count'>
        <strong>{answeredCount}/{totalQuestions}</strong> questions answered
      </p>
      <ul className='category-status-list'>
        {schema.categories.map((c, i) => {
          const answered = answeredInCategory(session.responses, schema, i);
          const status = getCategoryStatus(answered, c.questions.length);
          const isCurrent = phase.status === 'in-progress' && phase.categoryIndex === i;
          return (
            <li
              key={c.name}
              className={`category-status ${status}${isCurrent ? ' current' : ''}`}
              aria-current={isCurrent ? 'step' : undefined}
            >
              <span className='status-icon'>{STATUS_ICONS[status]}</span>
              {isCurrent && <span className='current-indicator'>👉</span>}
              <span className='category-status-name'>{c.tenet}</span>
              <span className='category-status-count'>({answered}/{c.questions.length})</span>
            </li>
          );
        })}
      </ul>
    </aside>
  );
};

export default ProgressSidebar;
