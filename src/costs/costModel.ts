import { CostSettings, Direction } from '../core/types';

export interface CostBreakdown {
  commission: number;
  slippage: number;
  spread: number;
  borrow: number;
  total: number;
}

export const breakdownTradeCost = (
  direction: Direction,
  capital: number,
  costs: Pick<CostSettings, 'commission' | 'slippagePct' | 'spreadPct' | 'annualBorrowRate'>,
  holdingDays: number
): CostBreakdown => {
  const slippage = capital * costs.slippagePct;
  const spread = capital * costs.spreadPct;
  const borrow = direction === 'SHORT' ? (capital * costs.annualBorrowRate * holdingDays) / 365 : 0;
  return {
    commission: costs.commission,
    slippage,
    spread,
    borrow,
    total: costs.commission + slippage + spread + borrow
  };
};

// Flat-fee form: everything the trade pays, charged once against capital.
export const computeTradeCost = (
  direction: Direction,
  capital: number,
  costs: Pick<CostSettings, 'commission' | 'slippagePct' | 'spreadPct' | 'annualBorrowRate'>,
  holdingDays: number
): number => breakdownTradeCost(direction, capital, costs, holdingDays).total;

// Price form: the fill is worse than the quoted spread by `pct` on each side.
export const adjustEntryPrice = (direction: Direction, price: number, pct: number): number =>
  direction === 'LONG' ? price * (1 + pct) : price * (1 - pct);

export const adjustExitPrice = (direction: Direction, price: number, pct: number): number =>
  direction === 'LONG' ? price * (1 - pct) : price * (1 + pct);

export const directionSign = (direction: Direction): 1 | -1 => (direction === 'LONG' ? 1 : -1);

export const priceLegPnl = (direction: Direction, entryPrice: number, exitPrice: number, size: number): number =>
  (exitPrice - entryPrice) * size * directionSign(direction);
