/**
 * Raised when a row does not carry a value for a column declared in the table schema.
 */
export class TableShapeError extends Error {
  constructor(
    public column: string,
    public rowIndex: number,
  ) {
    super(`Row ${rowIndex} has no value for column "${column}"`);
    this.name = "TableShapeError";
  }
}

/**
 * Raised by `check` when an exercise assertion does not hold.
 */
export class CheckFailedError extends Error {
  constructor(public label: string) {
    super(`Check failed: ${label}`);
    this.name = "CheckFailedError";
  }
}

/**
 * Raised by `todo` where the learner still has to fill in an answer.
 */
export class ExerciseIncompleteError extends Error {
  constructor(public hint?: string) {
    super(hint ? `Not completed yet: ${hint}` : "Not completed yet");
    this.name = "ExerciseIncompleteError";
  }
}
