import { OrderType } from './order-type.type';
import { Side } from './side.type';
import { SignalType } from './signal-type.type';
import { TradeType } from './trade-type.type';

export type TagTable<E extends string> = Readonly<Record<string, E>>;

// Wire tag -> enum member. Decoding goes through these tables only.
export const TRADE_TYPE_TAGS: TagTable<TradeType> = {
  PERP: TradeType.PERP,
  SPOT: TradeType.SPOT,
  EVM: TradeType.EVM,
};

export const SIGNAL_TYPE_TAGS: TagTable<SignalType> = {
  TRADE: SignalType.TRADE,
};

export const SIDE_TAGS: TagTable<Side> = {
  BUY: Side.BUY,
  SELL: Side.SELL,
};

export const ORDER_TYPE_TAGS: TagTable<OrderType> = {
  MARKET: OrderType.MARKET,
  LIMIT: OrderType.LIMIT,
  STOP_LOSS: OrderType.STOP_LOSS,
  TAKE_PROFIT: OrderType.TAKE_PROFIT,
};

export function tagsOf<E extends string>(table: TagTable<E>): string[] {
  return Object.keys(table);
}

export function lookupTag<E extends string>(table: TagTable<E>, tag: unknown): E | undefined {
  if (typeof tag !== 'string' || !Object.prototype.hasOwnProperty.call(table, tag)) {
    return undefined;
  }
  return table[tag];
}
