import { BacktestConfig, EquityPoint, SignalRow, SimulationResult, StrategyVariant } from '../core/types';
import { assertValidSignals } from '../core/schema';
import { groupBy } from '../core/utils';
import { PositionLedger } from '../ledger/positionLedger';
import { entryDirection } from '../strategy/entrySignal';
import { closeReasonFor, pnlModeFor, scheduledCloseDate, shouldExit } from './exitPolicy';

// Binary models emit 0/1, so fixed-horizon runs split them at one half.
const BINARY_CONFIDENCE = 0.5;

export interface DaySnapshot {
  date: string;
  equity: number;
  realizedEquity: number;
  availableCapital: number;
  investedCapital: number;
  costsPaid: number;
  openPairIds: string[];
}

export interface SimulationHooks {
  onDay?: (snapshot: DaySnapshot) => void;
}

const spreadsFor = (rows: SignalRow[]): Map<string, number> => {
  const spreads = new Map<string, number>();
  for (const row of rows) {
    if (row.spreadPrice !== undefined && !spreads.has(row.pairId)) spreads.set(row.pairId, row.spreadPrice);
  }
  return spreads;
};

const firstRowPerPair = (rows: SignalRow[]): Map<string, SignalRow> => {
  const byPair = new Map<string, SignalRow>();
  for (const row of rows) {
    if (!byPair.has(row.pairId)) byPair.set(row.pairId, row);
  }
  return byPair;
};

// Replays a validated stream for one variant: expire -> signal -> record per date, then drain.
export const simulate = (
  rows: SignalRow[],
  config: BacktestConfig,
  variant: StrategyVariant,
  hooks: SimulationHooks = {}
): SimulationResult => {
  const policy = config.exitPolicy;
  const mode = pnlModeFor(policy);
  const confidence = mode === 'PRICE' ? config.modelConfidenceThreshold : BINARY_CONFIDENCE;
  const holdingDays = policy.kind === 'FIXED_HORIZON' ? policy.holdPeriod : undefined;
  const ledger = new PositionLedger({
    mode,
    initialCapital: config.initialCapital,
    maxPositions: config.maxPositions,
    capitalBufferFactor: config.capitalBufferFactor,
    capitalPerTrade: config.capitalPerTrade,
    positionRiskPct: config.positionRiskPct,
    costs: config.costs
  });

  const warn = (date: string, pairId: string, what: string) => {
    if (config.logNonActionable) {
      console.warn(`[${variant.name}] ${date} ${pairId}: ${what}; no action`);
    }
  };

  const byDate = groupBy(rows, (row) => row.date);
  const dates = Array.from(byDate.keys()).sort();
  const equityCurve: EquityPoint[] = [];

  for (const date of dates) {
    const dayRows = byDate.get(date) ?? [];
    const rowByPair = firstRowPerPair(dayRows);

    // Decide on a snapshot of the book, then close; never iterate the live store.
    const expiring = ledger.openPositions.filter((position) => {
      const row = rowByPair.get(position.pairId);
      if (policy.kind === 'SIGNAL_REVERSAL') {
        if (!row) warn(date, position.pairId, 'no row for open position');
        else if (!Number.isFinite(row.zScore)) warn(date, position.pairId, 'z-score is NaN');
        else if (row.spreadPrice === undefined || !Number.isFinite(row.spreadPrice)) {
          warn(date, position.pairId, 'spread is NaN');
        }
      }
      return shouldExit(policy, position, date, row);
    });
    for (const position of expiring) {
      ledger.close(position.pairId, date, closeReasonFor(policy), rowByPair.get(position.pairId)?.spreadPrice);
    }

    for (const row of dayRows) {
      if (ledger.hasPosition(row.pairId)) continue;
      if (!Number.isFinite(row.zScore)) {
        warn(date, row.pairId, 'z-score is NaN');
        continue;
      }
      const direction = entryDirection(row, variant, config.entryZThreshold, confidence);
      if (!direction) continue;
      const res = ledger.open({
        pairId: row.pairId,
        direction,
        date,
        row,
        scheduledCloseDate: scheduledCloseDate(policy, date),
        holdingDays
      });
      if (!res.opened && res.reason === 'NOT_ACTIONABLE') warn(date, row.pairId, 'missing price or outcome');
    }

    const equity = ledger.markToMarket(spreadsFor(dayRows));
    equityCurve.push({ date, equity, openPositions: ledger.positionCount });
    hooks.onDay?.({
      date,
      equity,
      realizedEquity: ledger.equity,
      availableCapital: ledger.availableCapital,
      investedCapital: ledger.investedCapital,
      costsPaid: ledger.costsPaid,
      openPairIds: ledger.openPositions.map((p) => p.pairId)
    });
  }

  const lastDate = dates[dates.length - 1];
  if (lastDate !== undefined) {
    ledger.closeAll(lastDate, 'END_OF_BACKTEST', spreadsFor(byDate.get(lastDate) ?? []));
  }

  return {
    variant: variant.name,
    equityCurve,
    trades: ledger.trades,
    skipped: ledger.skipped,
    initialCapital: config.initialCapital,
    finalEquity: ledger.equity
  };
};

export const runSimulation = (
  rows: unknown[],
  config: BacktestConfig,
  variant: StrategyVariant,
  hooks: SimulationHooks = {}
): SimulationResult => {
  const signals = assertValidSignals(rows, { mode: pnlModeFor(config.exitPolicy), models: variant.models });
  return simulate(signals, config, variant, hooks);
};
