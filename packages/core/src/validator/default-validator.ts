import { ErrorCode } from '../errors/codes.js';
import { ConfigError, type ValidationError } from '../types/errors.js';
import type {
  ValidateCallOptions,
  ValidatorOptions,
} from '../types/options.js';
import { Validator } from './validator.js';

/**
 * Process-wide validator behind the top-level `validate` helpers. Created
 * on first use; configurable once, before that.
 */
let defaultValidator: Validator | undefined;

export function getDefaultValidator(): Validator {
  defaultValidator ??= new Validator();
  return defaultValidator;
}

/**
 * Build the shared validator with the given options
 *
 * @throws {ConfigError} When it was already created, or an option is invalid
 */
export function configureDefaultValidator(
  options: ValidatorOptions
): Validator {
  if (defaultValidator) {
    throw new ConfigError({
      message:
        'default validator is already initialized; call resetDefaultValidator() first',
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting: 'defaultValidator' },
    });
  }
  defaultValidator = new Validator(options);
  return defaultValidator;
}

/** Drop the shared validator (and its schema cache) */
export function resetDefaultValidator(): void {
  defaultValidator = undefined;
}

export function validate(
  record: unknown,
  options?: ValidateCallOptions
): ValidationError | undefined {
  return getDefaultValidator().validate(record, options);
}

export function validatePartial(
  record: unknown,
  options?: Omit<ValidateCallOptions, 'partial'>
): ValidationError | undefined {
  return getDefaultValidator().validatePartial(record, options);
}
