import type { GeneralRecommendation, RecommendationTable, TenetGuidance } from '../types/recommendations';
import type { OverallResult } from './scoring';

export type ActionUrgency = 'immediate' | 'recommended';

export interface TenetAction extends TenetGuidance {
  tenet: string;
  icon?: string;
  urgency: ActionUrgency;
}

export interface RecommendationSelection {
  immediate: TenetAction[];
  recommended: TenetAction[];
  general: GeneralRecommendation[];
  priority?: string;
}

export const EMPTY_SELECTION: RecommendationSelection = {
  immediate: [],
  recommended: [],
  general: []
};

/**
 * Picks guidance for a finished assessment.
 * Logic:
 *  - Tenets at the worst level get their "immediate" entry.
 *  - Tenets below the best level (worst included) get their "recommended" entry.
 *  - The general list and the priority note follow the overall level and are skipped at the best level.
 *  - When every category sits at the best level nothing is selected.
 * Tenets missing from the table contribute nothing.
 */
export const selectRecommendations = (
  result: OverallResult,
  table: RecommendationTable
): RecommendationSelection => {
  if (result.categories.every((c) => c.severity === 'best')) return EMPTY_SELECTION;

  const immediate: TenetAction[] = [];
  const recommended: TenetAction[] = [];
  for (const c of result.categories) {
    const entry = table.tenets[c.tenet];
    if (!entry) continue;
    if (c.severity === 'worst' && entry.immediate) {
      immediate.push({ ...entry.immediate, tenet: c.tenet, icon: entry.icon, urgency: 'immediate' });
    }
    if (c.severity !== 'best' && entry.recommended) {
      recommended.push({ ...entry.recommended, tenet: c.tenet, icon: entry.icon, urgency: 'recommended' });
    }
  }

  if (result.severity === 'best') {
    return { immediate, recommended, general: [] };
  }
  return {
    immediate,
    recommended,
    general: [...table.general],
    priority: table.priority[result.severity]
  };
};
