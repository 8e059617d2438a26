import { registerDecorator, ValidationOptions } from 'class-validator';

/**
 * The value must be a string with at least one non-whitespace character.
 * The value itself is left untouched.
 */
export function IsNotBlank(validationOptions?: ValidationOptions) {
  return (target: object, propertyName: string) => {
    registerDecorator({
      name: 'isNotBlank',
      target: target.constructor,
      propertyName,
      options: {
        message: `${propertyName} must not be blank`,
        ...validationOptions,
      },
      validator: {
        validate(value: unknown): boolean {
          return typeof value === 'string' && value.trim().length > 0;
        },
      },
    });
  };
}
