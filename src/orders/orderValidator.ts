export type QuantityCheck =
  | { ok: true; quantity: number }
  | { ok: false; reason: 'insufficient_funds' | 'insufficient_crypto' | 'invalid_quantity'; message: string };

/**
 * Fits a requested quantity to what the ledger can cover. Returns an outcome rather
 * than throwing; callers branch on `ok`/`reason`.
 */
export class OrderValidator {
  constructor(private readonly tolerance = 1e-6) {}

  adjustBuyQuantity(balance: number, quantity: number, price: number): QuantityCheck {
    if (!(price > 0)) {
      return { ok: false, reason: 'invalid_quantity', message: `Invalid buy price: ${price}` };
    }
    let adjusted = quantity;
    if (quantity * price > balance) {
      adjusted = (balance - this.tolerance) / price;
      if (adjusted <= 0) {
        return {
          ok: false,
          reason: 'insufficient_funds',
          message: `Insufficient balance: ${balance.toFixed(2)} to place any buy order at price ${price.toFixed(2)}.`,
        };
      }
    }
    return this.checkQuantity(adjusted, 'buy');
  }

  adjustSellQuantity(cryptoBalance: number, quantity: number): QuantityCheck {
    let adjusted = quantity;
    if (quantity > cryptoBalance) {
      adjusted = cryptoBalance - this.tolerance;
      if (adjusted <= 0) {
        return {
          ok: false,
          reason: 'insufficient_crypto',
          message: `Insufficient crypto balance: ${cryptoBalance.toFixed(6)} to place any sell order.`,
        };
      }
    }
    return this.checkQuantity(adjusted, 'sell');
  }

  private checkQuantity(quantity: number, side: 'buy' | 'sell'): QuantityCheck {
    if (!Number.isFinite(quantity) || quantity <= 0) {
      return { ok: false, reason: 'invalid_quantity', message: `Invalid ${side} quantity: ${quantity.toFixed(6)}` };
    }
    return { ok: true, quantity };
  }
}
