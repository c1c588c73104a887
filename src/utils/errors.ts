export type YoloDecodeErrorCode =
  | 'SHAPE_MISMATCH'
  | 'MISSING_PROTOTYPE'
  | 'COORDINATE_SPACE'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_CONFIGURATION'
  | 'MODEL_LOAD';

export class YoloDecodeError extends Error {
  readonly code: YoloDecodeErrorCode;

  constructor(code: YoloDecodeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The tensor layout does not match what the task expects.
 */
export class ShapeMismatchError extends YoloDecodeError {
  readonly expected: string;
  readonly actual: readonly number[];

  constructor(task: string, expected: string, actual: readonly number[]) {
    super('SHAPE_MISMATCH', `Unexpected ${task} output shape [${actual.join(', ')}], expected ${expected}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class MissingPrototypeError extends YoloDecodeError {
  constructor() {
    super('MISSING_PROTOTYPE', 'Segment decode needs a mask prototype tensor as second output');
  }
}

export class CoordinateSpaceError extends YoloDecodeError {
  constructor(expected: string, actual: string) {
    super('COORDINATE_SPACE', `Expected a box in ${expected} space, got ${actual}`);
  }
}

export class InvariantViolationError extends YoloDecodeError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
  }
}

export class ConfigurationError extends YoloDecodeError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
  }
}

export class ModelLoadError extends YoloDecodeError {
  constructor(message: string, cause?: unknown) {
    super('MODEL_LOAD', message, { cause });
  }
}
