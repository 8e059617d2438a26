import { registerDecorator, ValidationOptions } from 'class-validator';

function hasPosition(value: unknown, position: number): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pos' in value &&
    value.pos === position
  );
}

/**
 * Checks that a token list is non-empty and that every `pos` equals the
 * token's index, i.e. positions start at 0, are unique and step by 1.
 */
export function isTokenSequence(value: unknown): boolean {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((token: unknown, index) => hasPosition(token, index))
  );
}

export function IsTokenSequence(validationOptions?: ValidationOptions) {
  return (target: object, propertyName: string) => {
    registerDecorator({
      name: 'isTokenSequence',
      target: target.constructor,
      propertyName,
      options: {
        message: `${propertyName} positions must start at 0 and increase by 1 without gaps or repeats`,
        ...validationOptions,
      },
      validator: {
        validate: isTokenSequence,
      },
    });
  };
}
