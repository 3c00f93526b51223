import {
  AggregateResult,
  BacktestConfig,
  EquityTableRow,
  SignalRow,
  SimulationResult,
  StrategyVariant,
  VariantSummary
} from '../core/types';
import { assertValidSignals } from '../core/schema';
import { pnlModeFor } from './exitPolicy';
import { simulate } from './simulation';

export const summarizeRun = (run: SimulationResult): VariantSummary => ({
  variant: run.variant,
  finalEquity: run.finalEquity,
  totalReturn: run.initialCapital > 0 ? (run.finalEquity - run.initialCapital) / run.initialCapital : 0,
  tradeCount: run.trades.filter((t) => t.type === 'ENTRY').length,
  skipped: run.skipped
});

// One row per date seen by any run; a run with no point for a date is left out of that row.
export const buildEquityTable = (runs: SimulationResult[]): EquityTableRow[] => {
  const rows = new Map<string, EquityTableRow>();
  for (const run of runs) {
    for (const point of run.equityCurve) {
      const row = rows.get(point.date) ?? { date: point.date, equity: {}, positions: {} };
      row.equity[run.variant] = point.equity;
      row.positions[run.variant] = point.openPositions;
      rows.set(point.date, row);
    }
  }
  return Array.from(rows.values()).sort((a, b) => a.date.localeCompare(b.date));
};

// Each run owns its ledger, so results do not depend on the order of `variants`.
export const runVariants = (rows: unknown[], config: BacktestConfig, variants: StrategyVariant[]): AggregateResult => {
  const names = new Set<string>();
  for (const variant of variants) {
    if (names.has(variant.name)) {
      throw new Error(`Duplicate strategy variant name: ${variant.name}`);
    }
    if (!variant.models.length) {
      throw new Error(`Strategy variant ${variant.name} lists no models`);
    }
    names.add(variant.name);
  }

  const models = Array.from(new Set(variants.flatMap((v) => v.models)));
  const signals: SignalRow[] = assertValidSignals(rows, { mode: pnlModeFor(config.exitPolicy), models });
  const runs = variants.map((variant) => simulate(signals, config, variant));

  return {
    table: buildEquityTable(runs),
    runs,
    summaries: runs.map(summarizeRun)
  };
};
