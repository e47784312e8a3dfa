import { useNavigate } from 'react-router-dom';
import { useAssessment } from '../../context/AssessmentContext';

const Home = () => {
  const navigate = useNavigate();
  const { schema, policy, answeredCount, totalQuestions } = useAssessment();

  return (
    <section className='home-panel'>
      <header className='home-header'>
        <h1>{schema.title}</h1>
        <p className='subtitle'>{schema.subtitle}</p>
      </header>
      <main className='home-main'>
        <div className='feature-grid'>
          {schema.categories.map((c) => (
            <div key={c.name} className='feature-card' title={c.hoverDescription}>
              <h2>{c.tenet}</h2>
              <p>{c.description}</p>
            </div>
          ))}
        </div>
        <p className='home-summary'>
          {totalQuestions} questions across {schema.categories.length} categories. Results are reported as a{' '}
          {policy.scoreLabel.toLowerCase()}.
        </p>
        <button className='btn-primary' onClick={() => navigate('/assessment')}>
          {answeredCount > 0 ? 'Continue Assessment' : 'Start Assessment'}
        </button>
        <div className='home-notes'>
          <span className='note-icon'>🔒</span>
          <span className='note-text'>
            Answers stay in this browser tab and are cleared when you restart or close it.
          </span>
        </div>
      </main>
    </section>
  );
};

export default Home;
