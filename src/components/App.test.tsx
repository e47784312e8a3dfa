import { render, screen, fireEvent, cleanup } from '@testing-library/react';
import App from './App';

vi.mock('@amplitude/analytics-browser', () => ({
  init: vi.fn(),
  logEvent: vi.fn()
}));

describe('App', () => {
  beforeEach(() => {
    window.history.pushState({}, '', '/');
  });

  afterEach(() => {
    cleanup();
    vi.clearAllMocks();
  });

  it('opens on the start page of the configured assessment', () => {
    render(<App />);

    expect(screen.getAllByText('AI Development Readiness Assessment')).toHaveLength(2);
    expect(screen.getByRole('heading', { name: 'Fairness' })).toBeDefined();
    expect(screen.getByText(/10 questions across 5 categories/)).toBeDefined();
  });

  it('starts the assessment from the start page', () => {
    render(<App />);

    fireEvent.click(screen.getByRole('button', { name: 'Start Assessment' }));

    expect(screen.getByText('Step 1 of 5')).toBeDefined();
    expect(screen.getByRole('heading', { name: 'Fairness Tenet' })).toBeDefined();
    expect(screen.getByText('0/10')).toBeDefined();
  });

  it('marks Results unavailable until the assessment is complete', () => {
    render(<App />);
    expect(screen.getByRole('link', { name: 'Results' }).getAttribute('aria-disabled')).toBe('true');
  });

  it('shows the empty report before completion', () => {
    window.history.pushState({}, '', '/results');
    render(<App />);
    expect(screen.getByText(/No assessment data available yet/)).toBeDefined();
  });

  it('shows a not-found page for unknown routes', () => {
    window.history.pushState({}, '', '/nowhere');
    render(<App />);
    expect(screen.getByRole('link', { name: 'start page' }).getAttribute('href')).toBe('/');
  });
});
