import 'reflect-metadata';

export { OrderType } from './domain/types/order-type.type';
export { Side } from './domain/types/side.type';
export { SignalType } from './domain/types/signal-type.type';
export { TradeType } from './domain/types/trade-type.type';
export {
  ORDER_TYPE_TAGS,
  SIDE_TAGS,
  SIGNAL_TYPE_TAGS,
  TRADE_TYPE_TAGS,
  lookupTag,
} from './domain/types/enum-tags';
export type { TagTable } from './domain/types/enum-tags';
export { ExactDecimal } from './domain/value-objects/exact-decimal';
export { SignalTimestamp } from './domain/value-objects/signal-timestamp';
export { SignalValidationError, isSignalValidationError } from './domain/errors/signal-validation.error';
export type { SignalErrorKind } from './domain/errors/signal-validation.error';
export { SIGNAL_FIELDS, TradingSignal } from './domain/entities/trading-signal.entity';
export type {
  OrderPricing,
  SignalField,
  TradingSignalDict,
  TradingSignalInput,
  TradingSignalProps,
  VenueTarget,
} from './domain/entities/trading-signal.entity';
export type { ISignalCodec, ISignalConsumer } from './domain/interfaces/services.interface';
export { TradingSignalDto } from './application/dto/trading-signal.dto';
export { DecodeSignalUseCase } from './application/use-cases/decode-signal.use-case';
export { EncodeSignalUseCase } from './application/use-cases/encode-signal.use-case';
export { SignalJsonCodec } from './infrastructure/codec/signal-json.codec';
export { SignalIntakeHandler } from './presentation/handlers/signal-intake.handler';
export type { SignalIntakeResult } from './presentation/handlers/signal-intake.handler';
export { registerDependencies } from './app.container';
export { DIContainer } from './shared/container';
export { Logger } from './shared/logger';
export { loadConfig } from './shared/config';
export type { AppConfig, LogLevel } from './shared/config';
