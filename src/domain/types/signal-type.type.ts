export enum SignalType {
  TRADE = 'TRADE',
}
