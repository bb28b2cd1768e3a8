import { logger } from '../utils/logger';
import type { OrderSide } from '../orders/order';
import { GridCycleState, GridLevel } from './gridLevel';

export type SpacingType = 'arithmetic' | 'geometric';

export interface GridSettings {
  bottom: number;
  top: number;
  numGrids: number;
  spacing: SpacingType;
  /** Per-step growth for geometric spacing, e.g. 0.05 for 5%. */
  percentageSpacing?: number;
}

export interface PriceLadder {
  prices: number[];
  centralPrice: number;
}

export function calculatePriceGrids(settings: GridSettings): PriceLadder {
  const { bottom, top, numGrids, spacing } = settings;
  if (!(top > bottom) || bottom <= 0) {
    throw new Error(`invalid_grid_range:${bottom}-${top}`);
  }
  if (!Number.isInteger(numGrids) || numGrids < 2) {
    throw new Error(`invalid_num_grids:${numGrids}`);
  }

  if (spacing === 'arithmetic') {
    const step = (top - bottom) / (numGrids - 1);
    const prices = Array.from({ length: numGrids }, (_, i) => (i === numGrids - 1 ? top : bottom + step * i));
    return { prices, centralPrice: (top + bottom) / 2 };
  }

  const percentage = settings.percentageSpacing;
  if (percentage === undefined || !(percentage > 0)) {
    throw new Error('geometric_spacing_requires_percentage');
  }
  const prices: number[] = [];
  let current = bottom;
  for (let i = 0; i < numGrids; i += 1) {
    prices.push(current);
    current *= 1 + percentage;
  }
  // Kept as configured upstream; does not sit between bottom and top for typical inputs.
  const centralPrice = (top * bottom) ** percentage;
  return { prices, centralPrice };
}

/**
 * First grid price crossed between two ticks, scanning `sortedGrids` ascending.
 * BUY: price fell through or touched g (previous >= g >= current).
 * SELL: price rose through or touched g (previous < g <= current).
 */
export function detectGridCrossing(
  current: number,
  previous: number,
  sortedGrids: readonly number[],
  side: OrderSide
): number | null {
  for (const grid of sortedGrids) {
    if (side === 'sell' ? previous < grid && grid <= current : previous >= grid && grid >= current) {
      return grid;
    }
  }
  return null;
}

export class GridManager {
  private ladder: PriceLadder | null = null;
  private levels = new Map<number, GridLevel>();
  private buyGrids: number[] = [];
  private sellGrids: number[] = [];

  constructor(private readonly settings: GridSettings) {}

  initializeGridLevels() {
    const ladder = calculatePriceGrids(this.settings);
    this.ladder = ladder;
    this.buyGrids = ladder.prices.filter((price) => price <= ladder.centralPrice);
    this.sellGrids = ladder.prices.filter((price) => price > ladder.centralPrice);
    this.levels = new Map(
      ladder.prices.map((price) => [
        price,
        new GridLevel(price, price <= ladder.centralPrice ? GridCycleState.READY_TO_BUY : GridCycleState.READY_TO_SELL),
      ])
    );
    logger.info('grid_initialized', {
      event: 'grid_initialized',
      spacing: this.settings.spacing,
      numGrids: ladder.prices.length,
      centralPrice: ladder.centralPrice,
      buyGrids: this.buyGrids.length,
      sellGrids: this.sellGrids.length,
    });
  }

  get priceGrids(): readonly number[] {
    return this.requireLadder().prices;
  }

  get centralPrice(): number {
    return this.requireLadder().centralPrice;
  }

  get sortedBuyGrids(): readonly number[] {
    return this.buyGrids;
  }

  get sortedSellGrids(): readonly number[] {
    return this.sellGrids;
  }

  get gridLevels(): ReadonlyMap<number, GridLevel> {
    return this.levels;
  }

  getGridLevel(price: number): GridLevel | undefined {
    return this.levels.get(price);
  }

  detectCrossing(current: number, previous: number, side: OrderSide): number | null {
    return detectGridCrossing(current, previous, side === 'sell' ? this.sellGrids : this.buyGrids, side);
  }

  getCrossedGridLevel(current: number, previous: number, side: OrderSide): GridLevel | null {
    const price = this.detectCrossing(current, previous, side);
    return price === null ? null : this.levels.get(price) ?? null;
  }

  /** Lowest buy level holding an unmatched buy, i.e. the cycle the next sell closes. */
  findLowestCompletedBuyGrid(): GridLevel | null {
    for (const price of this.buyGrids) {
      const level = this.levels.get(price);
      if (level?.canPlaceSellOrder()) return level;
    }
    return null;
  }

  getOrderSizeForGridLevel(totalBalanceValue: number, currentPrice: number): number {
    if (currentPrice <= 0) return 0;
    return totalBalanceValue / this.levels.size / currentPrice;
  }

  resetGridCycle(buyLevel: GridLevel) {
    buyLevel.resetBuyCycle();
    logger.debug('grid_cycle_reset', { event: 'grid_cycle_reset', price: buyLevel.price });
  }

  completeAllLevels() {
    for (const level of this.levels.values()) {
      level.markCompleted();
    }
  }

  private requireLadder(): PriceLadder {
    if (!this.ladder) {
      throw new Error('grid_not_initialized');
    }
    return this.ladder;
  }
}
