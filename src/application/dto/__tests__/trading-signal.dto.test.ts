import { ValidationError } from 'class-validator';
import { TradingSignalDto, toSignalValidationError } from '../trading-signal.dto';
import { OrderType } from '../../../domain/types/order-type.type';
import { SignalTimestamp } from '../../../domain/value-objects/signal-timestamp';
import { captureError, exampleMap } from '../../../__tests__/fixtures';

function fieldError(property: string, value: unknown, constraints: Record<string, string>): ValidationError {
  const error = new ValidationError();
  error.property = property;
  error.value = value;
  error.constraints = constraints;
  return error;
}

describe('TradingSignalDto', () => {
  it('passes validation for a well-formed map', () => {
    expect(() => TradingSignalDto.fromMap(exampleMap()).validate()).not.toThrow();
  });

  it('converts wire values into construction input', () => {
    const input = TradingSignalDto.fromMap({ ...exampleMap(), network: null }).toInput();

    expect(input.order_type).toBe(OrderType.LIMIT);
    expect(input.timestamp).toEqual(SignalTimestamp.parse('2024-02-19T12:00:00Z'));
    expect(input.limit_price?.toString()).toBe('2000.0');
    expect(input.network).toBeUndefined();
    expect(input.reduce_only).toBe(false);
  });

  it('reports the first failing field in declaration order', () => {
    const error = captureError(() =>
      TradingSignalDto.fromMap({ ...exampleMap(), side: 'HOLD', limit_price: 'abc' }).validate(),
    );
    expect(error.kind).toBe('UnknownEnumValue');
    expect(error.field).toBe('side');
  });

  it('checks enum tags again when converting', () => {
    const error = captureError(() => TradingSignalDto.fromMap({ ...exampleMap(), side: 'HOLD' }).toInput());
    expect(error.kind).toBe('UnknownEnumValue');
    expect(error.value).toBe('HOLD');
  });

  it('rejects unknown keys before validating', () => {
    const error = captureError(() => TradingSignalDto.fromMap({ ...exampleMap(), post_only: true }));
    expect(error.kind).toBe('UnknownField');
  });

  describe('toSignalValidationError', () => {
    it('prefers a missing value over other constraints', () => {
      const error = toSignalValidationError(
        fieldError('side', undefined, { isDefined: 'side should not be null or undefined', isIn: 'side must be...' }),
      );
      expect(error.kind).toBe('MissingRequiredField');
      expect(error.field).toBe('side');
    });

    it.each([
      ['isIn', 'UnknownEnumValue'],
      ['isExactDecimal', 'InvalidDecimal'],
      ['isSignalTimestamp', 'InvalidTimestamp'],
      ['isBoolean', 'InvalidFieldType'],
      ['isString', 'InvalidFieldType'],
    ])('maps %s to %s', (constraint, kind) => {
      const error = toSignalValidationError(fieldError('field', 'bad', { [constraint]: 'failed' }));
      expect(error.kind).toBe(kind);
      expect(error.value).toBe('bad');
    });
  });
});
