import type {
  AnswerOption,
  AssessmentSchema,
  Category,
  Question,
  RawAssessment,
  RawCategory,
  RawOption
} from '../types/questions';
import { isRiskWeight, responseKey } from './answerStore';
import { InvalidWeightError, SchemaError } from './errors';

const buildOption = (raw: RawOption, where: string): AnswerOption => {
  if (!isRiskWeight(raw.risk)) {
    throw new InvalidWeightError(raw.risk);
  }
  const label = (raw.text || '').trim();
  if (!label) throw new SchemaError(`${where} has an option without text`);
  return { label, risk: raw.risk };
};

const buildCategory = (raw: RawCategory, categoryIndex: number): Category => {
  const questions = raw.questions || [];
  if (questions.length === 0) {
    throw new SchemaError(`Category "${raw.name}" has no questions`);
  }
  return Object.freeze({
    name: raw.name,
    tenet: raw.tenet || raw.name,
    description: raw.description || '',
    hoverDescription: raw.hoverDescription || raw.description || '',
    controlCategories: Object.freeze([...(raw.controlCategories || [])]),
    questions: Object.freeze(questions.map((q, questionIndex): Question => {
      const id = responseKey(categoryIndex, questionIndex);
      const options = q.options || [];
      if (options.length === 0) throw new SchemaError(`Question ${id} has no options`);
      // A response stores only the weight, so it must identify the option.
      const weights = options.map((o) => o.risk);
      if (new Set(weights).size !== weights.length) {
        throw new SchemaError(`Question ${id} has options sharing a risk weight`);
      }
      return Object.freeze({
        id,
        text: q.text,
        controlFocus: q.controlFocus,
        // Options stay in authored order (best practice first).
        options: Object.freeze(options.map((o) => buildOption(o, `Question ${id}`)))
      });
    }))
  });
};

/**
 * Normalizes raw assessment content into an immutable schema.
 * Throws SchemaError (or InvalidWeightError for an out-of-range option weight).
 */
export const buildAssessmentSchema = (raw: RawAssessment): AssessmentSchema => {
  const categories = raw.categories || [];
  if (categories.length === 0) {
    throw new SchemaError(`Assessment "${raw.id}" has no categories`);
  }
  return Object.freeze({
    id: raw.id,
    title: raw.title,
    subtitle: raw.subtitle || '',
    categories: Object.freeze(categories.map(buildCategory))
  });
};
