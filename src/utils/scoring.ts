import type { AssessmentSchema } from '../types/questions';
import { assertCategoryIndex, getResponse, ResponseSet, totalAnswered } from './answerStore';
import type { ClassificationLevel, ScoringPolicy, Severity } from './classifier';

export type ScoringMode = 'risk' | 'readiness';

export const MAX_RISK_WEIGHT = 2;

export interface CategoryScore {
  categoryIndex: number;
  category: string;
  tenet: string;
  averageRisk: number; // 0-2
  percentage: number; // 0-100, in the policy's polarity
  level: ClassificationLevel;
  severity: Severity;
}

export interface OverallResult {
  mode: ScoringMode;
  percentage: number;
  level: ClassificationLevel;
  severity: Severity;
  categories: CategoryScore[];
  levelCounts: Record<Severity, number>;
}

/**
 * Mean risk weight for one category.
 * Divides by the category's question count, so unanswered questions count as 0.
 */
export const categoryAverage = (
  responses: ResponseSet,
  schema: AssessmentSchema,
  categoryIndex: number
): number => {
  assertCategoryIndex(schema, categoryIndex);
  const { questions } = schema.categories[categoryIndex];
  if (questions.length === 0) return 0;
  const sum = questions.reduce((acc, _, q) => acc + (getResponse(responses, categoryIndex, q) ?? 0), 0);
  return sum / questions.length;
};

export const categoryPercentage = (averageRisk: number, mode: ScoringMode): number => {
  const riskPercent = (averageRisk / MAX_RISK_WEIGHT) * 100;
  return mode === 'risk' ? riskPercent : 100 - riskPercent;
};

/**
 * Overall score over the answered questions only.
 * Returns undefined when nothing has been answered yet.
 */
export const overallPercentage = (responses: ResponseSet, mode: ScoringMode): number | undefined => {
  const answered = totalAnswered(responses);
  if (answered === 0) return undefined;

  const total = Object.values(responses).reduce<number>((sum, w) => sum + (w ?? 0), 0);
  const max = answered * MAX_RISK_WEIGHT;
  return mode === 'risk'
    ? (total / max) * 100
    : ((max - total) / max) * 100;
};

export const computeResult = (
  responses: ResponseSet,
  schema: AssessmentSchema,
  policy: ScoringPolicy
): OverallResult | undefined => {
  const percentage = overallPercentage(responses, policy.mode);
  if (percentage === undefined) return undefined;

  const categories: CategoryScore[] = schema.categories.map((c, i) => {
    const averageRisk = categoryAverage(responses, schema, i);
    const categoryPercent = categoryPercentage(averageRisk, policy.mode);
    return {
      categoryIndex: i,
      category: c.name,
      tenet: c.tenet,
      averageRisk,
      percentage: categoryPercent,
      ...policy.classifyCategory(categoryPercent)
    };
  });

  const levelCounts: Record<Severity, number> = { best: 0, middle: 0, worst: 0 };
  for (const c of categories) levelCounts[c.severity] += 1;

  return {
    mode: policy.mode,
    percentage,
    ...policy.classify(percentage),
    categories,
    levelCounts
  };
};
