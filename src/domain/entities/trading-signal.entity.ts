import { SignalValidationError } from '../errors/signal-validation.error';
import { OrderType } from '../types/order-type.type';
import { Side } from '../types/side.type';
import { SignalType } from '../types/signal-type.type';
import { TradeType } from '../types/trade-type.type';
import { ExactDecimal } from '../value-objects/exact-decimal';
import { SignalTimestamp } from '../value-objects/signal-timestamp';

/**
 * Loose construction shape: every companion field is optional and the
 * conditional requirements are checked at run time.
 */
export interface TradingSignalInput {
  // Core
  readonly signal_id: string;
  readonly timestamp: Date | SignalTimestamp;
  readonly type: SignalType;
  readonly trade_type: TradeType;
  readonly symbol: string;
  readonly side: Side;
  readonly order_type: OrderType;

  // Sizing
  readonly amount_capital_percent: ExactDecimal;
  readonly fixed_size?: ExactDecimal;
  readonly leverage?: ExactDecimal;

  // Pricing
  readonly limit_price?: ExactDecimal;
  readonly stop_price?: ExactDecimal;
  readonly take_profit_price?: ExactDecimal;
  readonly slippage?: ExactDecimal;

  // EVM specific
  readonly network?: string;
  readonly contract_address?: string;
  readonly dex_id?: string;

  // Position management
  readonly reduce_only?: boolean;

  // Metadata
  readonly message: string;
  readonly source?: string;
  readonly strategy_name?: string;
  readonly timeframe?: string;
  readonly exchange?: string;
}

export type OrderPricing =
  | { readonly order_type: OrderType.MARKET }
  | { readonly order_type: OrderType.LIMIT; readonly limit_price: ExactDecimal }
  | { readonly order_type: OrderType.STOP_LOSS; readonly stop_price: ExactDecimal }
  | { readonly order_type: OrderType.TAKE_PROFIT; readonly take_profit_price: ExactDecimal };

export type VenueTarget =
  | { readonly trade_type: TradeType.PERP | TradeType.SPOT }
  | { readonly trade_type: TradeType.EVM; readonly contract_address: string };

/** Typed construction shape: the companion of each order/trade type is required. */
export type TradingSignalProps = Omit<TradingSignalInput, 'order_type' | 'trade_type'> &
  OrderPricing &
  VenueTarget;

/** Interchange form: absent optional fields have no key at all. */
export interface TradingSignalDict {
  readonly signal_id: string;
  readonly timestamp: string;
  readonly type: SignalType;
  readonly trade_type: TradeType;
  readonly symbol: string;
  readonly side: Side;
  readonly order_type: OrderType;
  readonly amount_capital_percent: string;
  readonly fixed_size?: string;
  readonly leverage?: string;
  readonly limit_price?: string;
  readonly stop_price?: string;
  readonly take_profit_price?: string;
  readonly slippage?: string;
  readonly network?: string;
  readonly contract_address?: string;
  readonly dex_id?: string;
  readonly reduce_only: boolean;
  readonly message: string;
  readonly source?: string;
  readonly strategy_name?: string;
  readonly timeframe?: string;
  readonly exchange?: string;
}

export type SignalField = keyof TradingSignalDict;

export const SIGNAL_FIELDS: readonly SignalField[] = [
  'signal_id',
  'timestamp',
  'type',
  'trade_type',
  'symbol',
  'side',
  'order_type',
  'amount_capital_percent',
  'fixed_size',
  'leverage',
  'limit_price',
  'stop_price',
  'take_profit_price',
  'slippage',
  'network',
  'contract_address',
  'dex_id',
  'reduce_only',
  'message',
  'source',
  'strategy_name',
  'timeframe',
  'exchange',
];

export function assertSignalInvariants(input: TradingSignalInput): void {
  const percent = input.amount_capital_percent;
  if (!(percent instanceof ExactDecimal)) {
    throw SignalValidationError.missingField('amount_capital_percent');
  }
  if (!percent.isPositive() || !percent.lte(100)) {
    throw SignalValidationError.invalidPercent(percent.toString());
  }

  if (input.trade_type === TradeType.EVM && !input.contract_address) {
    throw SignalValidationError.missingField('contract_address', 'for EVM trades');
  }

  if (input.order_type === OrderType.LIMIT && input.limit_price === undefined) {
    throw SignalValidationError.missingField('limit_price', 'for LIMIT orders');
  }

  if (input.order_type === OrderType.STOP_LOSS && input.stop_price === undefined) {
    throw SignalValidationError.missingField('stop_price', 'for STOP_LOSS orders');
  }

  if (input.order_type === OrderType.TAKE_PROFIT && input.take_profit_price === undefined) {
    throw SignalValidationError.missingField('take_profit_price', 'for TAKE_PROFIT orders');
  }

  if (!(input.timestamp instanceof SignalTimestamp) && !isValidDate(input.timestamp)) {
    throw SignalValidationError.invalidTimestamp('timestamp', input.timestamp);
  }
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Trading signal with everything needed to execute a trade.
 * Instances are frozen; derive a changed signal with {@link TradingSignal.with}.
 */
export class TradingSignal {
  public readonly signal_id: string;
  private readonly issuedAt: SignalTimestamp;
  public readonly type: SignalType;
  public readonly trade_type: TradeType;
  public readonly symbol: string;
  public readonly side: Side;
  public readonly order_type: OrderType;

  public readonly amount_capital_percent: ExactDecimal;
  public readonly fixed_size?: ExactDecimal;
  public readonly leverage?: ExactDecimal;

  public readonly limit_price?: ExactDecimal;
  public readonly stop_price?: ExactDecimal;
  public readonly take_profit_price?: ExactDecimal;
  public readonly slippage?: ExactDecimal;

  public readonly network?: string;
  public readonly contract_address?: string;
  public readonly dex_id?: string;

  public readonly reduce_only: boolean;

  public readonly message: string;
  public readonly source?: string;
  public readonly strategy_name?: string;
  public readonly timeframe?: string;
  public readonly exchange?: string;

  private constructor(input: TradingSignalInput) {
    this.signal_id = input.signal_id;
    this.issuedAt =
      input.timestamp instanceof SignalTimestamp ? input.timestamp : SignalTimestamp.fromDate(input.timestamp);
    this.type = input.type;
    this.trade_type = input.trade_type;
    this.symbol = input.symbol;
    this.side = input.side;
    this.order_type = input.order_type;
    this.amount_capital_percent = input.amount_capital_percent;
    this.fixed_size = input.fixed_size;
    this.leverage = input.leverage;
    this.limit_price = input.limit_price;
    this.stop_price = input.stop_price;
    this.take_profit_price = input.take_profit_price;
    this.slippage = input.slippage;
    this.network = input.network;
    this.contract_address = input.contract_address;
    this.dex_id = input.dex_id;
    this.reduce_only = input.reduce_only ?? false;
    this.message = input.message;
    this.source = input.source;
    this.strategy_name = input.strategy_name;
    this.timeframe = input.timeframe;
    this.exchange = input.exchange;
    Object.freeze(this);
  }

  static create(props: TradingSignalProps): TradingSignal {
    return TradingSignal.fromInput(props);
  }

  static fromInput(input: TradingSignalInput): TradingSignal {
    assertSignalInvariants(input);
    return new TradingSignal(input);
  }

  /** Millisecond view; {@link TradingSignal.issuedAtTimestamp} keeps finer digits. */
  get timestamp(): Date {
    return this.issuedAt.toDate();
  }

  get issuedAtTimestamp(): SignalTimestamp {
    return this.issuedAt;
  }

  with(changes: Partial<TradingSignalInput>): TradingSignal {
    return TradingSignal.fromInput({ ...this.toInput(), ...changes });
  }

  toInput(): TradingSignalInput {
    return {
      signal_id: this.signal_id,
      timestamp: this.issuedAt,
      type: this.type,
      trade_type: this.trade_type,
      symbol: this.symbol,
      side: this.side,
      order_type: this.order_type,
      amount_capital_percent: this.amount_capital_percent,
      fixed_size: this.fixed_size,
      leverage: this.leverage,
      limit_price: this.limit_price,
      stop_price: this.stop_price,
      take_profit_price: this.take_profit_price,
      slippage: this.slippage,
      network: this.network,
      contract_address: this.contract_address,
      dex_id: this.dex_id,
      reduce_only: this.reduce_only,
      message: this.message,
      source: this.source,
      strategy_name: this.strategy_name,
      timeframe: this.timeframe,
      exchange: this.exchange,
    };
  }

  toDict(): TradingSignalDict {
    return {
      signal_id: this.signal_id,
      timestamp: this.issuedAt.toString(),
      type: this.type,
      trade_type: this.trade_type,
      symbol: this.symbol,
      side: this.side,
      order_type: this.order_type,
      amount_capital_percent: this.amount_capital_percent.toString(),
      ...(this.fixed_size ? { fixed_size: this.fixed_size.toString() } : {}),
      ...(this.leverage ? { leverage: this.leverage.toString() } : {}),
      ...(this.limit_price ? { limit_price: this.limit_price.toString() } : {}),
      ...(this.stop_price ? { stop_price: this.stop_price.toString() } : {}),
      ...(this.take_profit_price ? { take_profit_price: this.take_profit_price.toString() } : {}),
      ...(this.slippage ? { slippage: this.slippage.toString() } : {}),
      ...(this.network !== undefined ? { network: this.network } : {}),
      ...(this.contract_address !== undefined ? { contract_address: this.contract_address } : {}),
      ...(this.dex_id !== undefined ? { dex_id: this.dex_id } : {}),
      reduce_only: this.reduce_only,
      message: this.message,
      ...(this.source !== undefined ? { source: this.source } : {}),
      ...(this.strategy_name !== undefined ? { strategy_name: this.strategy_name } : {}),
      ...(this.timeframe !== undefined ? { timeframe: this.timeframe } : {}),
      ...(this.exchange !== undefined ? { exchange: this.exchange } : {}),
    };
  }

  toJSON(): TradingSignalDict {
    return this.toDict();
  }

  equals(other: TradingSignal): boolean {
    const mine = this.toDict();
    const theirs = other.toDict();
    return SIGNAL_FIELDS.every((field) => mine[field] === theirs[field]);
  }
}
