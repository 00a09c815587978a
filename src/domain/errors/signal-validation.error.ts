export type SignalErrorKind =
  | 'InvalidPercent'
  | 'MissingRequiredField'
  | 'UnknownEnumValue'
  | 'InvalidDecimal'
  | 'InvalidTimestamp'
  | 'InvalidFieldType'
  | 'UnknownField'
  | 'MalformedInterchange';

export class SignalValidationError extends Error {
  public readonly kind: SignalErrorKind;
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(kind: SignalErrorKind, message: string, field?: string, value?: unknown) {
    super(message);
    this.name = 'SignalValidationError';
    this.kind = kind;
    this.field = field;
    this.value = value;
  }

  static invalidPercent(value: unknown): SignalValidationError {
    return new SignalValidationError(
      'InvalidPercent',
      `amount_capital_percent must be greater than 0 and at most 100, got ${String(value)}`,
      'amount_capital_percent',
      value,
    );
  }

  static missingField(field: string, reason?: string): SignalValidationError {
    return new SignalValidationError(
      'MissingRequiredField',
      reason ? `${field} is required ${reason}` : `${field} is required`,
      field,
    );
  }

  static unknownEnumValue(field: string, value: unknown): SignalValidationError {
    return new SignalValidationError(
      'UnknownEnumValue',
      `Unknown ${field} value: ${JSON.stringify(value)}`,
      field,
      value,
    );
  }

  static invalidDecimal(field: string, value: unknown): SignalValidationError {
    return new SignalValidationError(
      'InvalidDecimal',
      `${field} is not a valid decimal: ${JSON.stringify(value)}`,
      field,
      value,
    );
  }

  static invalidTimestamp(field: string, value: unknown): SignalValidationError {
    return new SignalValidationError(
      'InvalidTimestamp',
      `${field} is not a valid ISO-8601 timestamp: ${JSON.stringify(value)}`,
      field,
      value,
    );
  }

  static invalidFieldType(field: string, value: unknown, expected: string): SignalValidationError {
    return new SignalValidationError(
      'InvalidFieldType',
      `${field} must be a ${expected}, got ${typeof value}`,
      field,
      value,
    );
  }

  static unknownField(field: string): SignalValidationError {
    return new SignalValidationError('UnknownField', `Unknown signal field: ${field}`, field);
  }

  static malformed(reason: string): SignalValidationError {
    return new SignalValidationError('MalformedInterchange', `Malformed signal interchange: ${reason}`);
  }
}

export function isSignalValidationError(error: unknown): error is SignalValidationError {
  return error instanceof SignalValidationError;
}
