import React from 'react';
import { Navigate, useNavigate } from 'react-router-dom';
import { useAssessment } from '../../context/AssessmentContext';
import { getResponse } from '../../utils/answerStore';
import ProgressSidebar from '../ProgressSidebar';
import { TrackedButton } from '../TrackedButton';

const Questionnaire: React.FC = () => {
  const {
    schema,
    session,
    phase,
    isFinalStep,
    canGoNext,
    canGoPrevious,
    recordAnswer,
    goNext,
    goPrevious
  } = useAssessment();
  const navigate = useNavigate();

  if (phase.status === 'complete') {
    return <Navigate to='/results' replace />;
  }

  const categoryIndex = phase.categoryIndex;
  const category = schema.categories[categoryIndex];

  const handleNext = () => {
    if (goNext() && isFinalStep) navigate('/results');
  };

  return (
    <div className='assessment-layout'>
      <ProgressSidebar />
      <div className='panel questionnaire-panel'>
        <div className='assessment-card'>
          <span className='step-label'>
            Step {categoryIndex + 1} of {schema.categories.length}
          </span>
          <h2>{category.name}</h2>
          <p className='category-description'>{category.description}</p>
        </div>

        <form className='question-list' onSubmit={(e) => e.preventDefault()}>
          {category.questions.map((q, questionIndex) => {
            const selected = getResponse(session.responses, categoryIndex, questionIndex);
            return (
              <fieldset key={q.id} className='question-container'>
                <legend>
                  <span className='question-number'>Question {questionIndex + 1}:</span>{' '}
                  <span className='question-text'>{q.text}</span>
                </legend>
                {q.controlFocus && <p className='control-focus'>{q.controlFocus}</p>}
                {q.options.map((o) => (
                  <label key={o.risk} className='option-label'>
                    <input
                      type='radio'
                      name={`q_${q.id}`}
                      value={o.risk}
                      checked={selected === o.risk}
                      onChange={() => recordAnswer(categoryIndex, questionIndex, o.risk)}
                    />
                    {o.label}
                  </label>
                ))}
              </fieldset>
            );
          })}
        </form>

        <div className='step-actions'>
          {canGoPrevious ? (
            <TrackedButton
              className='btn-secondary'
              trackingName='previous_category'
              trackingProperties={{ category_index: categoryIndex }}
              onClick={goPrevious}
            >
              ← Previous
            </TrackedButton>
          ) : <span />}
          <TrackedButton
            className='btn-primary'
            trackingName={isFinalStep ? 'view_results' : 'next_category'}
            trackingProperties={{ category_index: categoryIndex }}
            disabled={!canGoNext}
            title={canGoNext ? undefined : isFinalStep
              ? 'Please answer all questions to see results'
              : 'Please answer all questions to continue'}
            onClick={handleNext}
          >
            {isFinalStep ? 'View Results' : 'Next →'}
          </TrackedButton>
        </div>
      </div>
    </div>
  );
};

export default Questionnaire;
