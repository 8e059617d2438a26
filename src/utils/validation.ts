import { ClassConstructor, plainToInstance } from 'class-transformer';
import {
  validate,
  ValidationError as ClassValidationError,
} from 'class-validator';
import { ValidationError } from '../dal/database.errors';

function collectMessages(error: ClassValidationError): string[] {
  const own = Object.values(error.constraints ?? {});
  const nested = (error.children ?? []).flatMap(collectMessages);
  return [...own, ...nested];
}

/**
 * Turns a plain payload into an instance of `dto` and validates it.
 * Unknown properties are rejected.
 *
 * @param resource - Entity name used in the error message.
 * @throws ValidationError naming every offending top-level property.
 */
export async function validatePayload<T extends object>(
  dto: ClassConstructor<T>,
  payload: object,
  resource: string,
): Promise<T> {
  const instance = plainToInstance(dto, payload);
  const errors = await validate(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    const fields = errors.map((error) => error.property);
    const messages = errors.flatMap(collectMessages);
    throw new ValidationError(
      `Invalid ${resource}: ${messages.join('; ')}`,
      fields,
    );
  }

  return instance;
}
