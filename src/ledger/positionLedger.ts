import {
  CloseReason,
  CostSettings,
  Direction,
  EntryRecord,
  ExitRecord,
  PnlMode,
  Position,
  SignalRow,
  TradeRecord
} from '../core/types';
import { tradingDaysBetween } from '../core/time';
import { sum } from '../core/utils';
import { adjustEntryPrice, adjustExitPrice, computeTradeCost, priceLegPnl } from '../costs/costModel';

export interface LedgerOptions {
  mode: PnlMode;
  initialCapital: number;
  maxPositions: number;
  capitalBufferFactor: number;
  capitalPerTrade?: number;
  positionRiskPct: number;
  costs: CostSettings;
}

export interface OpenRequest {
  pairId: string;
  direction: Direction;
  date: string;
  row: SignalRow;
  // OUTCOME mode: when the position is due, and the holding period its borrow cost is charged for.
  scheduledCloseDate?: string;
  holdingDays?: number;
}

export type RejectReason = 'ALREADY_OPEN' | 'MAX_POSITIONS' | 'INSUFFICIENT_CAPITAL' | 'NOT_ACTIONABLE';

export type OpenResult = { opened: true; position: Position } | { opened: false; reason: RejectReason };

// Rejections that consume a valid signal; the others are "no action" for the day.
const SKIP_REASONS: ReadonlySet<RejectReason> = new Set<RejectReason>(['MAX_POSITIONS', 'INSUFFICIENT_CAPITAL']);

// A win when the labelled direction matches the trade: long with an up move, short with a down move.
export const outcomeGrossPnl = (
  direction: Direction,
  capital: number,
  targetReturn: number,
  targetDirection: 0 | 1
): number => {
  const won = direction === 'LONG' ? targetDirection === 1 : targetDirection === 0;
  const magnitude = capital * Math.abs(targetReturn);
  return won ? magnitude : -magnitude;
};

// `equity` is realized: initial capital less costs sunk at entry plus closed PnL.
export class PositionLedger {
  private available: number;
  private realized: number;
  private costTotal = 0;
  private skipCount = 0;
  private readonly positions = new Map<string, Position>();
  private readonly log: TradeRecord[] = [];

  constructor(private readonly options: LedgerOptions) {
    this.available = options.initialCapital;
    this.realized = options.initialCapital;
  }

  get availableCapital(): number {
    return this.available;
  }

  get equity(): number {
    return this.realized;
  }

  get skipped(): number {
    return this.skipCount;
  }

  get costsPaid(): number {
    return this.costTotal;
  }

  get positionCount(): number {
    return this.positions.size;
  }

  get openPositions(): Position[] {
    return Array.from(this.positions.values(), (p) => ({ ...p }));
  }

  get investedCapital(): number {
    return sum(this.openPositions.map((p) => p.investedCapital));
  }

  get trades(): TradeRecord[] {
    return this.log.slice();
  }

  hasPosition(pairId: string): boolean {
    return this.positions.has(pairId);
  }

  capitalPerTrade(): number {
    return this.options.capitalPerTrade ?? this.realized * this.options.positionRiskPct;
  }

  open(request: OpenRequest): OpenResult {
    const result = this.tryOpen(request);
    if (!result.opened && SKIP_REASONS.has(result.reason)) {
      this.skipCount++;
    }
    return result;
  }

  private tryOpen(request: OpenRequest): OpenResult {
    const { pairId, direction, date, row } = request;
    if (this.positions.has(pairId)) return { opened: false, reason: 'ALREADY_OPEN' };
    if (!this.isActionable(row)) return { opened: false, reason: 'NOT_ACTIONABLE' };
    if (this.positions.size >= this.options.maxPositions) return { opened: false, reason: 'MAX_POSITIONS' };

    const capital = this.capitalPerTrade();
    if (!(capital > 0) || this.available < capital * this.options.capitalBufferFactor) {
      return { opened: false, reason: 'INSUFFICIENT_CAPITAL' };
    }

    const position = this.options.mode === 'PRICE'
      ? this.buildPricePosition(request, capital)
      : this.buildOutcomePosition(request, capital);

    this.available -= capital + position.entryCost;
    this.realized -= position.entryCost;
    this.costTotal += position.entryCost;
    this.positions.set(pairId, position);

    const entry: EntryRecord = {
      type: 'ENTRY',
      date,
      pairId,
      direction,
      capital,
      cost: position.mode === 'PRICE' ? capital * this.options.costs.transactionCostPct : position.entryCost
    };
    this.log.push(entry);
    return { opened: true, position };
  }

  // Spreads may be negative; only a zero or non-finite spread cannot size a position.
  private isActionable(row: SignalRow): boolean {
    if (this.options.mode === 'PRICE') {
      return row.spreadPrice !== undefined && Number.isFinite(row.spreadPrice) && row.spreadPrice !== 0;
    }
    return row.targetReturn !== undefined && Number.isFinite(row.targetReturn) && row.targetDirection !== undefined;
  }

  private buildPricePosition(request: OpenRequest, capital: number): Position {
    const spread = request.row.spreadPrice ?? Number.NaN;
    const pct = this.options.costs.transactionCostPct;
    const entryPrice = adjustEntryPrice(request.direction, spread, pct);
    const size = capital / spread;
    return {
      mode: 'PRICE',
      pairId: request.pairId,
      direction: request.direction,
      openDate: request.date,
      investedCapital: capital,
      entryCost: 0,
      entrySpread: spread,
      entryPrice,
      size,
      lastSpread: spread,
      unrealizedPnl: priceLegPnl(request.direction, entryPrice, adjustExitPrice(request.direction, spread, pct), size)
    };
  }

  private buildOutcomePosition(request: OpenRequest, capital: number): Position {
    const { row, direction } = request;
    const entryCost = computeTradeCost(direction, capital, this.options.costs, request.holdingDays ?? 0);
    return {
      mode: 'OUTCOME',
      pairId: request.pairId,
      direction,
      openDate: request.date,
      investedCapital: capital,
      entryCost,
      scheduledCloseDate: request.scheduledCloseDate ?? request.date,
      grossPnl: outcomeGrossPnl(direction, capital, row.targetReturn ?? 0, row.targetDirection ?? 0)
    };
  }

  // A pair without a finite spread keeps its previous mark.
  markToMarket(spreads: ReadonlyMap<string, number>): number {
    if (this.options.mode === 'OUTCOME') return this.realized;
    const pct = this.options.costs.transactionCostPct;
    let unrealized = 0;
    for (const position of this.positions.values()) {
      if (position.mode !== 'PRICE') continue;
      const spread = spreads.get(position.pairId);
      if (spread !== undefined && Number.isFinite(spread)) {
        position.lastSpread = spread;
        position.unrealizedPnl = priceLegPnl(
          position.direction,
          position.entryPrice,
          adjustExitPrice(position.direction, spread, pct),
          position.size
        );
      }
      unrealized += position.unrealizedPnl;
    }
    return this.realized + unrealized;
  }

  // Price positions exit at `spread`, or at their last marked spread for the final drain.
  close(pairId: string, date: string, reason: CloseReason, spread?: number): number | undefined {
    const position = this.positions.get(pairId);
    if (!position) return undefined;
    this.positions.delete(pairId);

    let grossPnl: number;
    let released: number;
    let realizedPnl: number;
    if (position.mode === 'PRICE') {
      const exitSpread = spread !== undefined && Number.isFinite(spread) ? spread : position.lastSpread;
      const exitPrice = adjustExitPrice(position.direction, exitSpread, this.options.costs.transactionCostPct);
      realizedPnl = priceLegPnl(position.direction, position.entryPrice, exitPrice, position.size);
      grossPnl = priceLegPnl(position.direction, position.entrySpread, exitSpread, position.size);
      released = realizedPnl;
    } else {
      grossPnl = position.grossPnl;
      realizedPnl = grossPnl - position.entryCost;
      released = grossPnl;
    }

    this.available += position.investedCapital + released;
    this.realized += released;

    const exit: ExitRecord = {
      type: 'EXIT',
      date,
      pairId,
      direction: position.direction,
      capital: position.investedCapital,
      reason,
      grossPnl,
      cost: grossPnl - realizedPnl,
      realizedPnl,
      pnlPct: position.investedCapital > 0 ? (realizedPnl / position.investedCapital) * 100 : 0,
      holdingDays: tradingDaysBetween(position.openDate, date)
    };
    this.log.push(exit);
    return realizedPnl;
  }

  closeAll(date: string, reason: CloseReason, spreads: ReadonlyMap<string, number> = new Map()): number {
    const pairIds = Array.from(this.positions.keys());
    return sum(pairIds.map((pairId) => this.close(pairId, date, reason, spreads.get(pairId)) ?? 0));
  }
}
