export interface TenetGuidance {
  focus: string;
  controls: Record<string, string[]>; // control category -> actions
  standards: string;
}

export interface TenetGuidanceEntry {
  icon?: string;
  immediate?: TenetGuidance;
  recommended?: TenetGuidance;
}

export interface GeneralRecommendation {
  title: string;
  description: string;
  sources: string;
}

export interface RecommendationTable {
  tenets: Record<string, TenetGuidanceEntry>;
  general: GeneralRecommendation[];
  priority: {
    middle?: string;
    worst?: string;
  };
}
