export enum OrderType {
  MARKET = 'MARKET',
  LIMIT = 'LIMIT',
  STOP_LOSS = 'STOP_LOSS', // closes at stop_price
  TAKE_PROFIT = 'TAKE_PROFIT', // closes at take_profit_price
}
