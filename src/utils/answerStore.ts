import type { AssessmentSchema, RiskWeight } from '../types/questions';
import { InvalidIndexError, InvalidWeightError } from './errors';

export type ResponseKey = `${number}_${number}`;

// Selected risk weight per question. Immutable: every write returns a new set.
export type ResponseSet = Readonly<Partial<Record<ResponseKey, RiskWeight>>>;

export const EMPTY_RESPONSES: ResponseSet = Object.freeze({});

export const responseKey = (categoryIndex: number, questionIndex: number): ResponseKey =>
  `${categoryIndex}_${questionIndex}`;

export const isRiskWeight = (value: unknown): value is RiskWeight =>
  value === 0 || value === 1 || value === 2;

const isIndexWithin = (index: number, length: number) =>
  Number.isInteger(index) && index >= 0 && index < length;

export const assertCategoryIndex = (schema: AssessmentSchema, categoryIndex: number): void => {
  if (!isIndexWithin(categoryIndex, schema.categories.length)) {
    throw new InvalidIndexError(categoryIndex);
  }
};

/**
 * Throws InvalidIndexError / InvalidWeightError when the response does not fit the schema.
 * Exposed separately so callers can fail inside their own event handler before touching state.
 */
export function assertValidResponse(
  schema: AssessmentSchema,
  categoryIndex: number,
  questionIndex: number,
  weight: unknown
): asserts weight is RiskWeight {
  assertCategoryIndex(schema, categoryIndex);
  if (!isIndexWithin(questionIndex, schema.categories[categoryIndex].questions.length)) {
    throw new InvalidIndexError(categoryIndex, questionIndex);
  }
  if (!isRiskWeight(weight)) {
    throw new InvalidWeightError(weight);
  }
}

export const recordResponse = (
  responses: ResponseSet,
  schema: AssessmentSchema,
  categoryIndex: number,
  questionIndex: number,
  weight: number
): ResponseSet => {
  assertValidResponse(schema, categoryIndex, questionIndex, weight);
  const key = responseKey(categoryIndex, questionIndex);
  if (responses[key] === weight) return responses;
  return { ...responses, [key]: weight };
};

export const getResponse = (
  responses: ResponseSet,
  categoryIndex: number,
  questionIndex: number
): RiskWeight | undefined => responses[responseKey(categoryIndex, questionIndex)];

export const answeredInCategory = (
  responses: ResponseSet,
  schema: AssessmentSchema,
  categoryIndex: number
): number => {
  assertCategoryIndex(schema, categoryIndex);
  return schema.categories[categoryIndex].questions
    .filter((_, q) => getResponse(responses, categoryIndex, q) !== undefined)
    .length;
};

export const isCategoryComplete = (
  responses: ResponseSet,
  schema: AssessmentSchema,
  categoryIndex: number
): boolean =>
  answeredInCategory(responses, schema, categoryIndex) === schema.categories[categoryIndex].questions.length;

export const isAssessmentComplete = (responses: ResponseSet, schema: AssessmentSchema): boolean =>
  schema.categories.every((_, c) => isCategoryComplete(responses, schema, c));

export const totalAnswered = (responses: ResponseSet): number =>
  Object.values(responses).filter((w) => w !== undefined).length;

export const totalQuestions = (schema: AssessmentSchema): number =>
  schema.categories.reduce((sum, c) => sum + c.questions.length, 0);
