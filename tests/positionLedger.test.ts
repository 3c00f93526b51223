import { LedgerOptions, PositionLedger, outcomeGrossPnl } from '../src/ledger/positionLedger';
import { ExitRecord, TradeRecord } from '../src/core/types';
import { row } from './helpers/signals';

const costs = { transactionCostPct: 0.004, commission: 1, slippagePct: 0.001, spreadPct: 0.001, annualBorrowRate: 0.0365 };

const outcomeOptions: LedgerOptions = {
  mode: 'OUTCOME',
  initialCapital: 1000,
  maxPositions: 2,
  capitalBufferFactor: 1.1,
  capitalPerTrade: 100,
  positionRiskPct: 0.02,
  costs
};

const priceOptions: LedgerOptions = {
  mode: 'PRICE',
  initialCapital: 10000,
  maxPositions: 3,
  capitalBufferFactor: 1.1,
  positionRiskPct: 0.02,
  costs
};

const exits = (trades: TradeRecord[]): ExitRecord[] => trades.filter((t): t is ExitRecord => t.type === 'EXIT');

describe('outcome gross PnL', () => {
  it('wins when the labelled move matches the trade', () => {
    expect(outcomeGrossPnl('LONG', 100, 0.04, 1)).toBeCloseTo(4);
    expect(outcomeGrossPnl('SHORT', 100, -0.05, 0)).toBeCloseTo(5);
  });

  it('loses the move magnitude otherwise', () => {
    expect(outcomeGrossPnl('LONG', 100, -0.03, 0)).toBeCloseTo(-3);
    expect(outcomeGrossPnl('SHORT', 100, 0.02, 1)).toBeCloseTo(-2);
  });
});

describe('PositionLedger (outcome mode)', () => {
  it('sinks cost at entry and realizes the labelled return net of cost on close', () => {
    const ledger = new PositionLedger(outcomeOptions);
    const res = ledger.open({
      pairId: 'AB',
      direction: 'SHORT',
      date: '2024-01-05',
      row: row('2024-01-05', 'AB', 2, { targetReturn: -0.05, targetDirection: 0 }),
      scheduledCloseDate: '2024-01-12',
      holdingDays: 10
    });
    expect(res.opened).toBe(true);
    // 1 commission + 0.1 slippage + 0.1 spread + 100 * 0.0365 * 10 / 365 borrow
    expect(ledger.costsPaid).toBeCloseTo(1.3);
    expect(ledger.availableCapital).toBeCloseTo(898.7);
    expect(ledger.equity).toBeCloseTo(998.7);

    const pnl = ledger.close('AB', '2024-01-12', 'HORIZON');
    expect(pnl).toBeCloseTo(3.7);
    expect(ledger.availableCapital).toBeCloseTo(1003.7);
    expect(ledger.equity).toBeCloseTo(1003.7);

    const [exit] = exits(ledger.trades);
    expect(exit.grossPnl).toBeCloseTo(5);
    expect(exit.cost).toBeCloseTo(1.3);
    expect(exit.realizedPnl).toBeCloseTo(3.7);
    expect(exit.pnlPct).toBeCloseTo(3.7);
    expect(exit.reason).toBe('HORIZON');
    expect(exit.holdingDays).toBe(5);
  });

  it('skips an entry when capital is below the buffered stake', () => {
    const ledger = new PositionLedger({ ...outcomeOptions, initialCapital: 105 });
    const res = ledger.open({
      pairId: 'AB',
      direction: 'LONG',
      date: '2024-01-05',
      row: row('2024-01-05', 'AB', -2, { targetReturn: 0.01, targetDirection: 1 })
    });
    expect(res).toEqual({ opened: false, reason: 'INSUFFICIENT_CAPITAL' });
    expect(ledger.skipped).toBe(1);
    expect(ledger.availableCapital).toBe(105);
    expect(ledger.positionCount).toBe(0);
    expect(ledger.trades).toHaveLength(0);
  });

  it('skips entries beyond max positions', () => {
    const ledger = new PositionLedger({ ...outcomeOptions, maxPositions: 1 });
    const outcome = { targetReturn: 0.01, targetDirection: 1 as const };
    ledger.open({ pairId: 'AB', direction: 'LONG', date: '2024-01-05', row: row('2024-01-05', 'AB', -2, outcome) });
    const second = ledger.open({ pairId: 'CD', direction: 'LONG', date: '2024-01-05', row: row('2024-01-05', 'CD', -2, outcome) });
    expect(second).toEqual({ opened: false, reason: 'MAX_POSITIONS' });
    expect(ledger.skipped).toBe(1);
    expect(ledger.positionCount).toBe(1);
  });

  it('keeps one position per pair without counting a skip', () => {
    const ledger = new PositionLedger(outcomeOptions);
    const outcome = { targetReturn: 0.01, targetDirection: 1 as const };
    ledger.open({ pairId: 'AB', direction: 'LONG', date: '2024-01-05', row: row('2024-01-05', 'AB', -2, outcome) });
    const again = ledger.open({ pairId: 'AB', direction: 'LONG', date: '2024-01-08', row: row('2024-01-08', 'AB', -2, outcome) });
    expect(again).toEqual({ opened: false, reason: 'ALREADY_OPEN' });
    expect(ledger.skipped).toBe(0);
    expect(ledger.positionCount).toBe(1);
  });

  it('treats closing an unknown or already closed pair as a no-op', () => {
    const ledger = new PositionLedger(outcomeOptions);
    ledger.open({
      pairId: 'AB',
      direction: 'LONG',
      date: '2024-01-05',
      row: row('2024-01-05', 'AB', -2, { targetReturn: 0.02, targetDirection: 1 })
    });
    expect(ledger.close('ZZ', '2024-01-08', 'HORIZON')).toBeUndefined();
    const first = ledger.close('AB', '2024-01-08', 'HORIZON');
    const equityAfterFirst = ledger.equity;
    expect(ledger.close('AB', '2024-01-08', 'HORIZON')).toBeUndefined();
    expect(first).toBeCloseTo(2 - 1.2);
    expect(ledger.equity).toBe(equityAfterFirst);
    expect(exits(ledger.trades)).toHaveLength(1);
  });

  it('reports realized equity on mark-to-market', () => {
    const ledger = new PositionLedger(outcomeOptions);
    ledger.open({
      pairId: 'AB',
      direction: 'LONG',
      date: '2024-01-05',
      row: row('2024-01-05', 'AB', -2, { targetReturn: 0.02, targetDirection: 1 })
    });
    expect(ledger.markToMarket(new Map())).toBeCloseTo(1000 - 1.2);
  });
});

describe('PositionLedger (price mode)', () => {
  const open = (ledger: PositionLedger) =>
    ledger.open({ pairId: 'AB', direction: 'LONG', date: '2024-01-02', row: row('2024-01-02', 'AB', -2, { spreadPrice: 50 }) });

  it('sizes from realized equity and folds costs into prices', () => {
    const ledger = new PositionLedger(priceOptions);
    const res = open(ledger);
    expect(res.opened).toBe(true);
    if (!res.opened || res.position.mode !== 'PRICE') throw new Error('expected a price position');
    expect(res.position.investedCapital).toBeCloseTo(200);
    expect(res.position.entryPrice).toBeCloseTo(50.2);
    expect(res.position.size).toBeCloseTo(4);
    expect(ledger.availableCapital).toBeCloseTo(9800);
    expect(ledger.equity).toBe(10000);
  });

  it('marks open positions at the exit-adjusted spread', () => {
    const ledger = new PositionLedger(priceOptions);
    open(ledger);
    // (55 * 0.996 - 50.2) * 4
    expect(ledger.markToMarket(new Map([['AB', 55]]))).toBeCloseTo(10018.32);
    // no quote for AB: previous mark is kept
    expect(ledger.markToMarket(new Map())).toBeCloseTo(10018.32);
  });

  it('realizes PnL on close and reports the implied friction', () => {
    const ledger = new PositionLedger(priceOptions);
    open(ledger);
    expect(ledger.close('AB', '2024-01-05', 'MEAN_REVERSION', 55)).toBeCloseTo(18.32);
    expect(ledger.availableCapital).toBeCloseTo(10018.32);
    expect(ledger.equity).toBeCloseTo(10018.32);
    const [exit] = exits(ledger.trades);
    expect(exit.grossPnl).toBeCloseTo(20);
    expect(exit.cost).toBeCloseTo(1.68);
    expect(exit.pnlPct).toBeCloseTo(9.16);
  });

  it('falls back to the last marked spread when closing without a price', () => {
    const ledger = new PositionLedger(priceOptions);
    open(ledger);
    ledger.markToMarket(new Map([['AB', 55]]));
    expect(ledger.closeAll('2024-01-05', 'END_OF_BACKTEST')).toBeCloseTo(18.32);
    expect(ledger.positionCount).toBe(0);
  });

  it('does not open on a non-finite or zero spread', () => {
    const ledger = new PositionLedger(priceOptions);
    const res = ledger.open({
      pairId: 'AB',
      direction: 'LONG',
      date: '2024-01-02',
      row: row('2024-01-02', 'AB', -2, { spreadPrice: Number.NaN })
    });
    expect(res).toEqual({ opened: false, reason: 'NOT_ACTIONABLE' });
    expect(ledger.skipped).toBe(0);
    const zero = ledger.open({
      pairId: 'AB',
      direction: 'LONG',
      date: '2024-01-02',
      row: row('2024-01-02', 'AB', -2, { spreadPrice: 0 })
    });
    expect(zero).toEqual({ opened: false, reason: 'NOT_ACTIONABLE' });
  });

  it('opens on a negative spread', () => {
    const ledger = new PositionLedger(priceOptions);
    const res = ledger.open({
      pairId: 'AB',
      direction: 'SHORT',
      date: '2024-01-02',
      row: row('2024-01-02', 'AB', 2, { spreadPrice: -4 })
    });
    expect(res.opened).toBe(true);
    expect(ledger.positionCount).toBe(1);
  });
});
