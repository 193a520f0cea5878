export type QueryStringErrorKind =
  | 'malformed-input'
  | 'array-limit-exceeded'
  | 'unbalanced-brackets'
  | 'disallowed-empty-key'
  | 'invalid-option';

export abstract class QueryStringError extends Error {
  abstract readonly kind: QueryStringErrorKind;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad percent-encoding, a broken nesting tail, or an unusable value. */
export class MalformedInputError extends QueryStringError {
  override readonly name = 'MalformedInputError';
  override readonly kind = 'malformed-input';

  constructor(
    readonly input: string,
    message?: string,
    cause?: unknown,
  ) {
    super(message ?? `Malformed input: ${input}`, cause);
  }
}

export class ArrayLimitError extends QueryStringError {
  override readonly name = 'ArrayLimitError';
  override readonly kind = 'array-limit-exceeded';

  constructor(
    readonly index: number,
    readonly limit: number,
    message?: string,
  ) {
    super(message ?? `Array index ${index} exceeds array limit ${limit}`);
  }
}

export class UnbalancedBracketsError extends QueryStringError {
  override readonly name = 'UnbalancedBracketsError';
  override readonly kind = 'unbalanced-brackets';

  constructor(
    readonly key: string,
    message?: string,
  ) {
    super(message ?? `Unbalanced brackets in key: ${key}`);
  }
}

export class EmptyKeyError extends QueryStringError {
  override readonly name = 'EmptyKeyError';
  override readonly kind = 'disallowed-empty-key';

  constructor(
    readonly key: string,
    message?: string,
  ) {
    super(message ?? `Empty key segment is not allowed: ${key}`);
  }
}

export class InvalidOptionError extends QueryStringError {
  override readonly name = 'InvalidOptionError';
  override readonly kind = 'invalid-option';

  constructor(
    readonly option: string,
    readonly value: unknown,
    message?: string,
  ) {
    super(message ?? `Invalid value for option "${option}": ${String(value)}`);
  }
}
