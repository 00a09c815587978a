import {
  IsBoolean,
  IsDefined,
  IsIn,
  IsOptional,
  IsString,
  ValidationError,
  validateSync,
} from 'class-validator';
import {
  SIGNAL_FIELDS,
  SignalField,
  TradingSignalInput,
} from '../../domain/entities/trading-signal.entity';
import { SignalValidationError } from '../../domain/errors/signal-validation.error';
import {
  ORDER_TYPE_TAGS,
  SIDE_TAGS,
  SIGNAL_TYPE_TAGS,
  TRADE_TYPE_TAGS,
  TagTable,
  lookupTag,
  tagsOf,
} from '../../domain/types/enum-tags';
import { ExactDecimal } from '../../domain/value-objects/exact-decimal';
import { SignalTimestamp } from '../../domain/value-objects/signal-timestamp';
import {
  IS_EXACT_DECIMAL,
  IS_SIGNAL_TIMESTAMP,
  IsExactDecimal,
  IsSignalTimestamp,
} from './signal-field.decorators';

type WireDecimal = string | number;

/**
 * Raw interchange map as received from a producer. Property order is the
 * order in which field errors are reported.
 */
export class TradingSignalDto {
  @IsDefined()
  @IsString()
  signal_id!: string;

  @IsDefined()
  @IsSignalTimestamp()
  timestamp!: string | Date;

  @IsDefined()
  @IsIn(tagsOf(SIGNAL_TYPE_TAGS))
  type!: string;

  @IsDefined()
  @IsIn(tagsOf(TRADE_TYPE_TAGS))
  trade_type!: string;

  @IsDefined()
  @IsString()
  symbol!: string;

  @IsDefined()
  @IsIn(tagsOf(SIDE_TAGS))
  side!: string;

  @IsDefined()
  @IsIn(tagsOf(ORDER_TYPE_TAGS))
  order_type!: string;

  @IsDefined()
  @IsExactDecimal()
  amount_capital_percent!: WireDecimal;

  @IsOptional()
  @IsExactDecimal()
  fixed_size?: WireDecimal | null;

  @IsOptional()
  @IsExactDecimal()
  leverage?: WireDecimal | null;

  @IsOptional()
  @IsExactDecimal()
  limit_price?: WireDecimal | null;

  @IsOptional()
  @IsExactDecimal()
  stop_price?: WireDecimal | null;

  @IsOptional()
  @IsExactDecimal()
  take_profit_price?: WireDecimal | null;

  @IsOptional()
  @IsExactDecimal()
  slippage?: WireDecimal | null;

  @IsOptional()
  @IsString()
  network?: string | null;

  @IsOptional()
  @IsString()
  contract_address?: string | null;

  @IsOptional()
  @IsString()
  dex_id?: string | null;

  @IsOptional()
  @IsBoolean()
  reduce_only?: boolean | null;

  @IsDefined()
  @IsString()
  message!: string;

  @IsOptional()
  @IsString()
  source?: string | null;

  @IsOptional()
  @IsString()
  strategy_name?: string | null;

  @IsOptional()
  @IsString()
  timeframe?: string | null;

  @IsOptional()
  @IsString()
  exchange?: string | null;

  static fromMap(data: Readonly<Record<string, unknown>>): TradingSignalDto {
    const dto = new TradingSignalDto();
    for (const key of Object.keys(data)) {
      if (!isSignalField(key)) {
        throw SignalValidationError.unknownField(key);
      }
    }
    return Object.assign(dto, data);
  }

  /** Throws the first field failure as a {@link SignalValidationError}. */
  validate(): void {
    const errors = validateSync(this, { validationError: { target: false } });
    if (errors.length > 0) {
      throw toSignalValidationError(errors[0]);
    }
  }

  toInput(): TradingSignalInput {
    const timestamp = SignalTimestamp.tryParse(this.timestamp);
    if (!timestamp) {
      throw SignalValidationError.invalidTimestamp('timestamp', this.timestamp);
    }

    return {
      signal_id: this.signal_id,
      timestamp,
      type: requireTag('type', SIGNAL_TYPE_TAGS, this.type),
      trade_type: requireTag('trade_type', TRADE_TYPE_TAGS, this.trade_type),
      symbol: this.symbol,
      side: requireTag('side', SIDE_TAGS, this.side),
      order_type: requireTag('order_type', ORDER_TYPE_TAGS, this.order_type),
      amount_capital_percent: requireDecimal('amount_capital_percent', this.amount_capital_percent),
      fixed_size: optionalDecimal('fixed_size', this.fixed_size),
      leverage: optionalDecimal('leverage', this.leverage),
      limit_price: optionalDecimal('limit_price', this.limit_price),
      stop_price: optionalDecimal('stop_price', this.stop_price),
      take_profit_price: optionalDecimal('take_profit_price', this.take_profit_price),
      slippage: optionalDecimal('slippage', this.slippage),
      network: this.network ?? undefined,
      contract_address: this.contract_address ?? undefined,
      dex_id: this.dex_id ?? undefined,
      reduce_only: this.reduce_only ?? false,
      message: this.message,
      source: this.source ?? undefined,
      strategy_name: this.strategy_name ?? undefined,
      timeframe: this.timeframe ?? undefined,
      exchange: this.exchange ?? undefined,
    };
  }
}

function isSignalField(key: string): key is SignalField {
  return SIGNAL_FIELDS.some((field) => field === key);
}

function requireTag<E extends string>(field: string, table: TagTable<E>, raw: unknown): E {
  const member = lookupTag(table, raw);
  if (member === undefined) {
    throw SignalValidationError.unknownEnumValue(field, raw);
  }
  return member;
}

function requireDecimal(field: string, raw: unknown): ExactDecimal {
  const decimal = ExactDecimal.tryParse(raw);
  if (!decimal) {
    throw SignalValidationError.invalidDecimal(field, raw);
  }
  return decimal;
}

function optionalDecimal(field: string, raw: unknown): ExactDecimal | undefined {
  return raw === undefined || raw === null ? undefined : requireDecimal(field, raw);
}

export function toSignalValidationError(error: ValidationError): SignalValidationError {
  const constraints = error.constraints ?? {};
  const field = error.property;

  if ('isDefined' in constraints) return SignalValidationError.missingField(field);
  if ('isIn' in constraints) return SignalValidationError.unknownEnumValue(field, error.value);
  if (IS_EXACT_DECIMAL in constraints) return SignalValidationError.invalidDecimal(field, error.value);
  if (IS_SIGNAL_TIMESTAMP in constraints) {
    return SignalValidationError.invalidTimestamp(field, error.value);
  }
  if ('isBoolean' in constraints) {
    return SignalValidationError.invalidFieldType(field, error.value, 'boolean');
  }
  return SignalValidationError.invalidFieldType(field, error.value, 'string');
}
