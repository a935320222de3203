export type UnsupportedShapeReason = 'delete' | 'distinct' | 'disjunction';

const SHAPE_MESSAGES: Record<UnsupportedShapeReason, (methodName: string) => string> = {
  delete: (methodName) => `Delete queries are not supported: ${methodName}`,
  distinct: (methodName) => `Structured queries do not support the Distinct keyword: ${methodName}`,
  disjunction: (methodName) =>
    `Only multiple filters combined with AND are supported: ${methodName}`,
};

export class UnsupportedQueryShapeError extends Error {
  override readonly name = 'UnsupportedQueryShapeError';

  constructor(
    readonly methodName: string,
    readonly reason: UnsupportedShapeReason,
  ) {
    super(SHAPE_MESSAGES[reason](methodName));
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedPredicateOperatorError extends Error {
  override readonly name = 'UnsupportedPredicateOperatorError';

  constructor(
    readonly methodName: string,
    readonly operator: string,
  ) {
    super(
      `Unsupported operator ${operator} in ${methodName}: only equals, greater-than-or-equals, ` +
        'greater-than, less-than-or-equals, less-than, is-null and is-empty are supported filters.',
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TooFewArgumentsError extends Error {
  override readonly name = 'TooFewArgumentsError';

  constructor(readonly methodName: string) {
    super(`Too few parameters are provided for query method: ${methodName}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownPropertyError extends Error {
  override readonly name = 'UnknownPropertyError';

  constructor(
    readonly kind: string,
    readonly property: string,
  ) {
    super(`No property "${property}" found on entity kind "${kind}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidMethodNameError extends Error {
  override readonly name = 'InvalidMethodNameError';

  constructor(
    readonly methodName: string,
    detail: string,
  ) {
    super(`Invalid query method name "${methodName}": ${detail}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EntityDefinitionError extends Error {
  override readonly name = 'EntityDefinitionError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DatastoreDataError extends Error {
  override readonly name = 'DatastoreDataError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DatastoreError extends Error {
  override readonly name = 'DatastoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
