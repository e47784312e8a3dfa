import tenetsAssessment from '../data/assessments/tenets.json';
import controlsAssessment from '../data/assessments/controls.json';
import tenetsRecommendations from '../data/recommendations/tenets.json';
import controlsRecommendations from '../data/recommendations/controls.json';
import type { AssessmentSchema } from '../types/questions';
import type { RecommendationTable } from '../types/recommendations';
import { buildAssessmentSchema } from './schema';
import type { ScoringMode } from './scoring';

export type AssessmentVariant = 'tenets' | 'controls';

export interface CatalogEntry {
  schema: AssessmentSchema;
  recommendations: RecommendationTable;
  // The polarity the content was written for; any mode can still be selected.
  defaultMode: ScoringMode;
}

const tenetsTable: RecommendationTable = tenetsRecommendations;
const controlsTable: RecommendationTable = controlsRecommendations;

// Loaded once at startup and never mutated.
export const ASSESSMENT_CATALOG: Readonly<Record<AssessmentVariant, CatalogEntry>> = Object.freeze({
  tenets: {
    schema: buildAssessmentSchema(tenetsAssessment),
    recommendations: tenetsTable,
    defaultMode: 'readiness'
  },
  controls: {
    schema: buildAssessmentSchema(controlsAssessment),
    recommendations: controlsTable,
    defaultMode: 'risk'
  }
});

export const isAssessmentVariant = (value: unknown): value is AssessmentVariant =>
  value === 'tenets' || value === 'controls';

export const isScoringMode = (value: unknown): value is ScoringMode =>
  value === 'risk' || value === 'readiness';
