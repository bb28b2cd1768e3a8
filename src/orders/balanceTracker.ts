import { EventBus, Events, syncHandler } from '../events/eventBus';
import type { ExchangeService } from '../exchanges/types';
import type { TradingMode } from '../strategies/types';
import { logger } from '../utils/logger';
import type { FeeCalculator } from './feeCalculator';
import { describeOrder, executionPrice, type Order } from './order';

export type ReservationResult =
  | { ok: true }
  | { ok: false; reason: 'insufficient_balance' | 'insufficient_crypto_balance'; message: string };

export interface BalanceSetup {
  mode: TradingMode;
  initialBalance: number;
  initialCrypto?: number;
  baseCurrency: string;
  quoteCurrency: string;
  exchange?: ExchangeService;
}

export interface BalanceSnapshotView {
  balance: number;
  cryptoBalance: number;
  reservedFiat: number;
  reservedCrypto: number;
  totalFees: number;
}

/**
 * Fiat/crypto ledger with a reserve-then-settle protocol: funds are earmarked when an
 * order is placed and settled once the exchange reports the real fill.
 * `balance + reservedFiat` is the fiat not yet spent.
 */
export class BalanceTracker {
  private _balance = 0;
  private _cryptoBalance = 0;
  private _reservedFiat = 0;
  private _reservedCrypto = 0;
  private _totalFees = 0;
  private _investment = 0;
  private initialized = false;

  constructor(eventBus: EventBus, private readonly feeCalculator: FeeCalculator) {
    eventBus.subscribe(Events.ORDER_COMPLETED, syncHandler((order) => this.onOrderCompleted(order)));
    eventBus.subscribe(Events.ORDER_CANCELLED, syncHandler((order) => this.onOrderCancelled(order)));
  }

  get balance() {
    return this._balance;
  }

  get cryptoBalance() {
    return this._cryptoBalance;
  }

  get reservedFiat() {
    return this._reservedFiat;
  }

  get reservedCrypto() {
    return this._reservedCrypto;
  }

  get totalFees() {
    return this._totalFees;
  }

  get investment() {
    return this._investment;
  }

  /** Seeds the ledger once: fixed values in backtest, exchange balances otherwise. */
  async setupBalances(setup: BalanceSetup): Promise<void> {
    if (this.initialized) {
      throw new Error('balance_tracker_already_initialized');
    }
    if (setup.mode === 'backtest' || !setup.exchange) {
      this._balance = setup.initialBalance;
      this._cryptoBalance = setup.initialCrypto ?? 0;
    } else {
      const balances = await setup.exchange.getBalance();
      this._balance = balances[setup.quoteCurrency]?.free ?? 0;
      this._cryptoBalance = balances[setup.baseCurrency]?.free ?? 0;
    }
    this._investment = this._balance;
    this.initialized = true;
    logger.info('balances_initialized', {
      event: 'balances_initialized',
      mode: setup.mode,
      balance: this._balance,
      cryptoBalance: this._cryptoBalance,
    });
  }

  /** Records the starting account value once the first price is known. */
  recordInvestment(currentPrice: number) {
    this._investment = this._balance + this._cryptoBalance * currentPrice;
  }

  reserveFundsForBuy(amount: number): ReservationResult {
    if (this._balance < amount) {
      return {
        ok: false,
        reason: 'insufficient_balance',
        message: `Insufficient fiat balance to reserve ${amount}: available ${this._balance}`,
      };
    }
    this._balance -= amount;
    this._reservedFiat += amount;
    logger.debug('fiat_reserved', { event: 'fiat_reserved', amount, reservedFiat: this._reservedFiat });
    return { ok: true };
  }

  reserveFundsForSell(quantity: number): ReservationResult {
    if (this._cryptoBalance < quantity) {
      return {
        ok: false,
        reason: 'insufficient_crypto_balance',
        message: `Insufficient crypto balance to reserve ${quantity}: available ${this._cryptoBalance}`,
      };
    }
    this._cryptoBalance -= quantity;
    this._reservedCrypto += quantity;
    logger.debug('crypto_reserved', { event: 'crypto_reserved', quantity, reservedCrypto: this._reservedCrypto });
    return { ok: true };
  }

  /** Undo of `reserveFundsForBuy` when the order never reached the exchange. */
  releaseBuyReservation(amount: number) {
    const released = Math.min(amount, this._reservedFiat);
    this._reservedFiat -= released;
    this._balance += released;
  }

  releaseSellReservation(quantity: number) {
    const released = Math.min(quantity, this._reservedCrypto);
    this._reservedCrypto -= released;
    this._cryptoBalance += released;
  }

  getAdjustedFiatBalance() {
    return this._balance + this._reservedFiat;
  }

  getAdjustedCryptoBalance() {
    return this._cryptoBalance + this._reservedCrypto;
  }

  getTotalBalanceValue(price: number) {
    return this.getAdjustedFiatBalance() + this.getAdjustedCryptoBalance() * price;
  }

  snapshot(): BalanceSnapshotView {
    return {
      balance: this._balance,
      cryptoBalance: this._cryptoBalance,
      reservedFiat: this._reservedFiat,
      reservedCrypto: this._reservedCrypto,
      totalFees: this._totalFees,
    };
  }

  private onOrderCompleted(order: Order) {
    this.settleFill(order, order.filled);
    logger.info('balance_settled', {
      event: 'balance_settled',
      order: describeOrder(order),
      ...this.snapshot(),
    });
  }

  private onOrderCancelled(order: Order) {
    if (order.filled > 0) {
      this.settleFill(order, order.filled);
    }
    const unfilled = Math.max(order.amount - order.filled, 0);
    if (unfilled > 0) {
      if (order.side === 'buy') {
        const value = unfilled * order.price;
        this.releaseBuyReservation(value + this.feeCalculator.calculateFee(value));
      } else {
        this.releaseSellReservation(unfilled);
      }
    }
    logger.info('balance_released_after_cancel', {
      event: 'balance_released_after_cancel',
      order: describeOrder(order),
      ...this.snapshot(),
    });
  }

  private settleFill(order: Order, filled: number) {
    const price = executionPrice(order);
    const value = filled * price;
    const fee = this.feeCalculator.calculateFee(value);
    if (order.side === 'buy') {
      this._reservedFiat -= value + fee;
      if (this._reservedFiat < 0) {
        this._balance += this._reservedFiat;
        this._reservedFiat = 0;
      }
      this._cryptoBalance += filled;
    } else {
      this._reservedCrypto -= filled;
      if (this._reservedCrypto < 0) {
        this._cryptoBalance += this._reservedCrypto;
        this._reservedCrypto = 0;
      }
      this._balance += value - fee;
    }
    this._totalFees += fee;
  }
}
