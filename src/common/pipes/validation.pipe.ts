import { ValidationPipe } from '@nestjs/common';
import type { ValidationError as ConstraintViolation } from 'class-validator';
import { FieldErrors, ValidationError } from '../errors/domain.errors';

const toWireName = (property: string): string =>
  property.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);

/**
 * Flattens class-validator output into `{ field: [messages] }`, keyed by the
 * snake_case names clients send.
 */
export function collectFieldErrors(violations: ConstraintViolation[], prefix = ''): FieldErrors {
  const fields: FieldErrors = {};
  for (const violation of violations) {
    const name = prefix + toWireName(violation.property);
    const messages = Object.values(violation.constraints ?? {});
    if (messages.length > 0) {
      fields[name] = messages;
    }
    if (violation.children && violation.children.length > 0) {
      Object.assign(fields, collectFieldErrors(violation.children, `${name}.`));
    }
  }
  return fields;
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    // keep DTO defaults for fields the client left out
    transformOptions: { exposeUnsetFields: false },
    exceptionFactory: (violations: ConstraintViolation[]) =>
      new ValidationError('Invalid request data.', collectFieldErrors(violations)),
  });
}
