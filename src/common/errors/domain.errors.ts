export type FieldErrors = Record<string, string[]>;

export abstract class DomainError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or out-of-range input, rejected before any mutation.
 */
export class ValidationError extends DomainError {
  constructor(
    message: string,
    readonly fields: FieldErrors = {},
  ) {
    super(message);
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError(message, { [field]: [message] });
  }
}

export class NotFoundError extends DomainError {
  constructor(message = 'Not found.') {
    super(message);
  }
}

/**
 * Acting on another user's resource. Rendered like NotFoundError so the
 * resource's existence is not disclosed.
 */
export class PermissionError extends DomainError {
  constructor(message = 'You do not have permission to perform this action.') {
    super(message);
  }
}

export class InvalidStateError extends DomainError {
  constructor(message: string) {
    super(message);
  }
}
