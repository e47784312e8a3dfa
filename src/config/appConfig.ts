import { ASSESSMENT_CATALOG, isAssessmentVariant, isScoringMode } from '../utils/assessmentCatalog';
import type { AssessmentVariant } from '../utils/assessmentCatalog';
import type { ScoringMode } from '../utils/scoring';

export interface AppConfig {
  amplitudeApiKey?: string;
  assessmentVariant: AssessmentVariant;
  scoringMode: ScoringMode;
}

type EnvSource = Pick<ImportMetaEnv, 'VITE_AMPLITUDE_API_KEY' | 'VITE_ASSESSMENT_VARIANT' | 'VITE_SCORING_MODE'>;

// Unknown or empty values fall back to the defaults rather than failing startup.
export const readAppConfig = (env: EnvSource): AppConfig => {
  const variantValue = env.VITE_ASSESSMENT_VARIANT?.trim();
  const assessmentVariant: AssessmentVariant = isAssessmentVariant(variantValue) ? variantValue : 'tenets';
  const modeValue = env.VITE_SCORING_MODE?.trim();
  return {
    amplitudeApiKey: env.VITE_AMPLITUDE_API_KEY?.trim() || undefined,
    assessmentVariant,
    scoringMode: isScoringMode(modeValue) ? modeValue : ASSESSMENT_CATALOG[assessmentVariant].defaultMode
  };
};

export const APP_CONFIG: AppConfig = readAppConfig(import.meta.env);
