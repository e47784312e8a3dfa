import { BrowserRouter as Router, NavLink, Route, Routes } from 'react-router-dom';
import Home from './Home';
import PageNotFound from './NotFound';
import Questionnaire from './Questionnaire';
import Report from './Report';
import { AssessmentProvider, useAssessment } from '../context/AssessmentContext';
import '../styles.css';

const AppContent = () => {
  const { schema, phase } = useAssessment();

  return (
    <section className='app-panel panel'>
      <header className='header-container'>
        <div className='app-title'>{schema.title}</div>
      </header>
      <nav>
        <NavLink to='/' end>Home</NavLink>
        <NavLink to='/assessment'>Assessment</NavLink>
        <NavLink to='/results' aria-disabled={phase.status !== 'complete'}>Results</NavLink>
      </nav>
      <Routes>
        <Route path='/' element={<Home />} />
        <Route path='/assessment' element={<Questionnaire />} />
        <Route path='/results' element={<Report />} />
        <Route path='*' element={<PageNotFound />} />
      </Routes>
    </section>
  );
};

const App = () => (
  <AssessmentProvider>
    <Router>
      <AppContent />
    </Router>
  </AssessmentProvider>
);

export default App;
