export enum TradeType {
  PERP = 'PERP',
  SPOT = 'SPOT',
  EVM = 'EVM',
}
