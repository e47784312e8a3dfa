import { Link } from 'react-router-dom';

const PageNotFound = () => (
  <div className='wrapper'>
    <section>
      Page not found - head back to the
      {' '}
      <Link to='/'>start page</Link>
      {' '}
      to continue your assessment.
    </section>
  </div>
);

export default PageNotFound;
