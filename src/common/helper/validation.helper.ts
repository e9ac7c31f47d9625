import { ValidationError } from 'class-validator';

function findMessage(errors: ValidationError[]): string | undefined {
  for (const error of errors) {
    const messages = Object.values(error.constraints ?? {});
    if (messages.length) return messages[0];
    const nested = findMessage(error.children ?? []);
    if (nested) return nested;
  }
  return undefined;
}

// first constraint message of the first failing property
export function firstValidationMessage(errors: ValidationError[]): string {
  return findMessage(errors) ?? 'Validation failed';
}
