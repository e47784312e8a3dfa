// Chart colors come from CSS variables so the radar chart follows the active stylesheet.
// Override the variables in styles.css to restyle it.

export interface ChartTheme {
  stroke: string;
  fill: string;
  grid: string;
  text: string;
}

const VAR_MAP: Record<keyof ChartTheme, string> = {
  stroke: '--accent',
  fill: '--accent',
  grid: '--grid-line',
  text: '--text-primary'
};

const DEFAULT_THEME: ChartTheme = {
  stroke: '#3B82F6',
  fill: '#3B82F6',
  grid: '#D1D5DB',
  text: '#1F2937'
};

const readVar = (varName: string, fallback: string): string => {
  if (typeof window === 'undefined' || !window.document?.documentElement) return fallback;
  const value = getComputedStyle(document.documentElement).getPropertyValue(varName).trim();
  return value || fallback;
};

export const getChartTheme = (): ChartTheme => ({
  stroke: readVar(VAR_MAP.stroke, DEFAULT_THEME.stroke),
  fill: readVar(VAR_MAP.fill, DEFAULT_THEME.fill),
  grid: readVar(VAR_MAP.grid, DEFAULT_THEME.grid),
  text: readVar(VAR_MAP.text, DEFAULT_THEME.text)
});
