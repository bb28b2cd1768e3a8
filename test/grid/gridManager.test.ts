import { describe, expect, it } from 'vitest';
import { GridCycleState, GridLevel } from '../../src/grid/gridLevel';
import { calculatePriceGrids, detectGridCrossing, GridManager } from '../../src/grid/gridManager';
import { GridLevelNotReadyError } from '../../src/orders/errors';
import type { Order } from '../../src/orders/order';

function buyOrder(identifier: string): Order {
  return {
    identifier,
    status: 'open',
    orderType: 'limit',
    side: 'buy',
    price: 1000,
    amount: 0.1,
    filled: 0,
    remaining: 0.1,
    timestamp: 0,
    symbol: 'ETH/USDT',
    info: {},
  };
}

describe('calculatePriceGrids', () => {
  it('spaces arithmetic grids evenly with both bounds included', () => {
    const ladder = calculatePriceGrids({ bottom: 1000, top: 2000, numGrids: 11, spacing: 'arithmetic' });
    expect(ladder.prices).toHaveLength(11);
    expect(ladder.prices[0]).toBe(1000);
    expect(ladder.prices[5]).toBe(1500);
    expect(ladder.prices[10]).toBe(2000);
    expect(ladder.centralPrice).toBe(1500);
  });

  it('builds a ten-level ladder around a central price no level sits on', () => {
    const ladder = calculatePriceGrids({ bottom: 1000, top: 2000, numGrids: 10, spacing: 'arithmetic' });
    expect(ladder.prices).toHaveLength(10);
    expect(ladder.prices[0]).toBe(1000);
    expect(ladder.prices[9]).toBe(2000);
    expect(ladder.centralPrice).toBe(1500);
    for (let i = 1; i < ladder.prices.length; i += 1) {
      expect(ladder.prices[i] - ladder.prices[i - 1]).toBeCloseTo(1000 / 9, 9);
    }
    expect(ladder.prices).not.toContain(1500);
  });

  it('grows geometric grids by the percentage and keeps the configured central formula', () => {
    const ladder = calculatePriceGrids({
      bottom: 100,
      top: 200,
      numGrids: 3,
      spacing: 'geometric',
      percentageSpacing: 0.5,
    });
    expect(ladder.prices).toEqual([100, 150, 225]);
    expect(ladder.centralPrice).toBeCloseTo(Math.sqrt(20000), 10);
  });

  it('rejects inverted ranges, too few grids and geometric spacing without a percentage', () => {
    expect(() => calculatePriceGrids({ bottom: 2000, top: 1000, numGrids: 5, spacing: 'arithmetic' })).toThrow(
      'invalid_grid_range:2000-1000'
    );
    expect(() => calculatePriceGrids({ bottom: 1000, top: 2000, numGrids: 1, spacing: 'arithmetic' })).toThrow(
      'invalid_num_grids:1'
    );
    expect(() => calculatePriceGrids({ bottom: 1000, top: 2000, numGrids: 5, spacing: 'geometric' })).toThrow(
      'geometric_spacing_requires_percentage'
    );
  });
});

describe('detectGridCrossing', () => {
  const grids = [1500, 1600, 1700];

  it('finds upward crossings for sells, exact touches included', () => {
    expect(detectGridCrossing(1600, 1400, grids, 'sell')).toBe(1500);
    expect(detectGridCrossing(1500, 1400, grids, 'sell')).toBe(1500);
    expect(detectGridCrossing(1490, 1400, grids, 'sell')).toBeNull();
  });

  it('finds downward crossings for buys', () => {
    expect(detectGridCrossing(1550, 1650, grids, 'buy')).toBe(1600);
    expect(detectGridCrossing(1700, 1750, grids, 'buy')).toBe(1700);
    expect(detectGridCrossing(1750, 1800, grids, 'buy')).toBeNull();
  });

  it('returns the lowest crossed grid when the move spans several', () => {
    expect(detectGridCrossing(1450, 1750, grids, 'buy')).toBe(1500);
    expect(detectGridCrossing(1750, 1450, grids, 'sell')).toBe(1500);
  });
});

describe('GridManager', () => {
  function manager() {
    const grid = new GridManager({ bottom: 1000, top: 2000, numGrids: 11, spacing: 'arithmetic' });
    grid.initializeGridLevels();
    return grid;
  }

  it('starts levels at or below the central price as buy levels and the rest as sell levels', () => {
    const grid = manager();
    expect(grid.sortedBuyGrids).toEqual([1000, 1100, 1200, 1300, 1400, 1500]);
    expect(grid.sortedSellGrids).toEqual([1600, 1700, 1800, 1900, 2000]);
    expect(grid.getGridLevel(1500)?.state).toBe(GridCycleState.READY_TO_BUY);
    expect(grid.getGridLevel(1600)?.state).toBe(GridCycleState.READY_TO_SELL);
  });

  it('throws when the ladder is read before initialization', () => {
    const grid = new GridManager({ bottom: 1000, top: 2000, numGrids: 3, spacing: 'arithmetic' });
    expect(() => grid.centralPrice).toThrow('grid_not_initialized');
  });

  it('maps crossings to their levels', () => {
    const grid = manager();
    expect(grid.getCrossedGridLevel(1390, 1420, 'buy')?.price).toBe(1400);
    expect(grid.getCrossedGridLevel(1420, 1390, 'buy')).toBeNull();
    expect(grid.getCrossedGridLevel(1610, 1590, 'sell')?.price).toBe(1600);
  });

  it('finds the lowest buy level waiting for its sell', () => {
    const grid = manager();
    expect(grid.findLowestCompletedBuyGrid()).toBeNull();

    grid.getGridLevel(1300)?.placeBuyOrder(buyOrder('b1'));
    grid.getGridLevel(1100)?.placeBuyOrder(buyOrder('b2'));

    expect(grid.findLowestCompletedBuyGrid()?.price).toBe(1100);
  });

  it('sizes orders as an equal share of the account value per level', () => {
    const grid = manager();
    expect(grid.getOrderSizeForGridLevel(11000, 100)).toBe(10);
    expect(grid.getOrderSizeForGridLevel(11000, 0)).toBe(0);
  });

  it('marks every level completed after an exit', () => {
    const grid = manager();
    grid.completeAllLevels();
    expect([...grid.gridLevels.values()].every((level) => level.state === GridCycleState.COMPLETED)).toBe(true);
  });
});

describe('GridManager with an even number of levels', () => {
  it('opens levels at or below the central price for buying and the rest for selling', () => {
    const grid = new GridManager({ bottom: 1000, top: 2000, numGrids: 10, spacing: 'arithmetic' });
    grid.initializeGridLevels();

    expect(grid.sortedBuyGrids).toHaveLength(5);
    expect(grid.sortedSellGrids).toHaveLength(5);
    expect(grid.sortedBuyGrids.every((price) => price <= 1500)).toBe(true);
    expect(grid.sortedSellGrids.every((price) => price > 1500)).toBe(true);
    for (const level of grid.gridLevels.values()) {
      expect(level.state).toBe(level.price <= 1500 ? GridCycleState.READY_TO_BUY : GridCycleState.READY_TO_SELL);
    }
  });
});

describe('GridLevel', () => {
  it('never accepts a second buy before the cycle is reset', () => {
    const level = new GridLevel(1000, GridCycleState.READY_TO_BUY);
    expect(level.canPlaceBuyOrder()).toBe(true);

    level.placeBuyOrder(buyOrder('b1'));
    expect(level.canPlaceBuyOrder()).toBe(false);
    expect(level.canPlaceSellOrder()).toBe(true);

    level.resetBuyCycle();
    expect(level.canPlaceBuyOrder()).toBe(true);
    expect(level.latestBuyOrder()?.identifier).toBe('b1');
  });

  it('refuses orders the level is not ready for', () => {
    const level = new GridLevel(1000, GridCycleState.READY_TO_BUY);
    expect(() => level.placeSellOrder({ ...buyOrder('s1'), side: 'sell' })).toThrow(GridLevelNotReadyError);

    level.placeBuyOrder(buyOrder('b1'));
    expect(() => level.placeBuyOrder(buyOrder('b2'))).toThrow(
      'Grid level 1000 cannot take buy b2 in state READY_TO_SELL'
    );
    expect(level.buyOrders).toHaveLength(1);
  });

  it('keeps a sell level ready to sell after a sell is placed', () => {
    const level = new GridLevel(1800, GridCycleState.READY_TO_SELL);
    level.placeSellOrder({ ...buyOrder('s1'), side: 'sell' });
    expect(level.state).toBe(GridCycleState.READY_TO_SELL);
    expect(level.sellOrders).toHaveLength(1);
    expect(level.toString()).toBe('GridLevel(price=1800, state=READY_TO_SELL, buyOrders=0, sellOrders=1)');
  });
});
