export interface RawOption {
  text?: string;
  risk?: number;
}
export interface RawQuestion {
  text: string;
  controlFocus?: string;
  options?: RawOption[];
}
export interface RawCategory {
  name: string;
  tenet: string;
  description?: string;
  hoverDescription?: string;
  controlCategories?: string[];
  questions?: RawQuestion[];
}
export interface RawAssessment {
  id: string;
  title: string;
  subtitle?: string;
  categories?: RawCategory[];
}

// 0 = best practice, 2 = weakest practice
export type RiskWeight = 0 | 1 | 2;

export interface AnswerOption {
  label: string;
  risk: RiskWeight;
}

export interface Question {
  id: string; // "<categoryIndex>_<questionIndex>", same shape as a response key
  text: string;
  controlFocus?: string;
  options: readonly AnswerOption[];
}

export interface Category {
  name: string; // Display name, e.g. "Fairness Tenet"
  tenet: string; // Short label; also the recommendation lookup key
  description: string;
  hoverDescription: string;
  controlCategories: readonly string[];
  questions: readonly Question[];
}

export interface AssessmentSchema {
  id: string;
  title: string;
  subtitle: string;
  categories: readonly Category[];
}
