import {
  TradingSignalInput,
  TradingSignalProps,
} from '../domain/entities/trading-signal.entity';
import { SignalValidationError } from '../domain/errors/signal-validation.error';
import { OrderType } from '../domain/types/order-type.type';
import { Side } from '../domain/types/side.type';
import { SignalType } from '../domain/types/signal-type.type';
import { TradeType } from '../domain/types/trade-type.type';
import { ExactDecimal } from '../domain/value-objects/exact-decimal';

export const SIGNAL_ID = '123e4567-e89b-12d3-a456-426614174000';

/** The interchange document producers send for a PERP limit entry. */
export function exampleMap(): Record<string, unknown> {
  return {
    signal_id: SIGNAL_ID,
    timestamp: '2024-02-19T12:00:00Z',
    type: 'TRADE',
    trade_type: 'PERP',
    symbol: 'ETH-USDT',
    side: 'BUY',
    order_type: 'LIMIT',
    amount_capital_percent: '10.0',
    fixed_size: '1.5',
    leverage: '10.0',
    limit_price: '2000.0',
    message: 'ETH breakout trade',
  };
}

export function limitProps(): TradingSignalProps {
  return {
    signal_id: SIGNAL_ID,
    timestamp: new Date(Date.UTC(2024, 1, 19, 12, 0, 0)),
    type: SignalType.TRADE,
    trade_type: TradeType.PERP,
    symbol: 'ETH-USDT',
    side: Side.BUY,
    order_type: OrderType.LIMIT,
    amount_capital_percent: ExactDecimal.parse('10.0'),
    fixed_size: ExactDecimal.parse('1.5'),
    leverage: ExactDecimal.parse('10.0'),
    limit_price: ExactDecimal.parse('2000.0'),
    message: 'ETH breakout trade',
  };
}

export function baselineInput(overrides: Partial<TradingSignalInput> = {}): TradingSignalInput {
  return { ...limitProps(), ...overrides };
}

export function captureError(fn: () => unknown): SignalValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SignalValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a SignalValidationError to be thrown');
}
