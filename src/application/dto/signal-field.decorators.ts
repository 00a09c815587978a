import { ValidateBy, ValidationOptions } from 'class-validator';
import { ExactDecimal } from '../../domain/value-objects/exact-decimal';
import { SignalTimestamp } from '../../domain/value-objects/signal-timestamp';

export const IS_EXACT_DECIMAL = 'isExactDecimal';
export const IS_SIGNAL_TIMESTAMP = 'isSignalTimestamp';

/** Decimal string or finite number, e.g. "2000.0" or 1.5. */
export function IsExactDecimal(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_EXACT_DECIMAL,
      validator: {
        validate: (value: unknown): boolean => ExactDecimal.isValid(value),
        defaultMessage: () => '$property must be a decimal number or decimal string',
      },
    },
    validationOptions,
  );
}

export function IsSignalTimestamp(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_SIGNAL_TIMESTAMP,
      validator: {
        validate: (value: unknown): boolean => SignalTimestamp.tryParse(value) !== null,
        defaultMessage: () => '$property must be an ISO-8601 date-time',
      },
    },
    validationOptions,
  );
}
