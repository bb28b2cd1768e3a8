export class FeeCalculator {
  constructor(public readonly tradingFee: number) {
    if (!Number.isFinite(tradingFee) || tradingFee < 0) {
      throw new Error(`invalid_trading_fee:${tradingFee}`);
    }
  }

  calculateFee(tradeValue: number): number {
    return tradeValue * this.tradingFee;
  }
}
