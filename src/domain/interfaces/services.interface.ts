import { TradingSignal, TradingSignalDict } from '../entities/trading-signal.entity';

export interface ISignalCodec {
  toDict(signal: TradingSignal): TradingSignalDict;
  fromDict(data: unknown): TradingSignal;
  toJson(signal: TradingSignal): string;
  fromJson(json: string): TradingSignal;
}

/** Downstream collaborator (execution engine, queue) that only ever sees validated signals. */
export interface ISignalConsumer {
  consume(signal: TradingSignal): Promise<void>;
}
