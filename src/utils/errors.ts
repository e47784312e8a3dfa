// Structural errors raised by the answer store and schema loader.
// These indicate a wiring defect, not a user mistake; nothing in the core catches them.

export class AssessmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidIndexError extends AssessmentError {
  constructor(readonly categoryIndex: number, readonly questionIndex?: number) {
    super(
      questionIndex === undefined
        ? `Category index ${categoryIndex} is outside the assessment schema`
        : `Question ${categoryIndex}_${questionIndex} is outside the assessment schema`
    );
  }
}

export class InvalidWeightError extends AssessmentError {
  constructor(readonly weight: unknown) {
    super(`Risk weight ${String(weight)} is not one of 0, 1, 2`);
  }
}

export class SchemaError extends AssessmentError {}
