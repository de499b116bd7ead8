/**
 * Secret names become environment variable names, and keys of the store
 * file's `secrets` object.
 */
import { ValidationError } from '../core/errors.js';

export const SECRET_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Match the pattern but cannot be an own key of a parsed JSON object. */
const RESERVED_NAMES: ReadonlySet<string> = new Set(['__proto__']);

export function isValidSecretName(name: string): boolean {
  return SECRET_NAME_PATTERN.test(name) && !RESERVED_NAMES.has(name);
}

/** Throws ValidationError unless `name` is usable as an environment variable name. */
export function assertSecretName(name: string): void {
  if (RESERVED_NAMES.has(name)) {
    throw new ValidationError(`Invalid secret name "${name}": the name is reserved`, { name });
  }
  if (!SECRET_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid secret name "${name}": use letters, digits and underscores, not starting with a digit`,
      { name },
    );
  }
}
