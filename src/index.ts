export * from './core/types';
export { resolveConfig, loadConfig, defaultConfig } from './core/config';
export { validateConfig, validateSignalRows, assertValidSignals, BacktestConfigInput, ValidationResult } from './core/schema';
export { addTradingDays, tradingDaysBetween, isWeekend } from './core/time';
export {
  computeTradeCost,
  breakdownTradeCost,
  adjustEntryPrice,
  adjustExitPrice,
  CostBreakdown
} from './costs/costModel';
export { shouldExit, pnlModeFor, closeReasonFor, scheduledCloseDate } from './engine/exitPolicy';
export { singleModel, consensus, entryDirection, predictionDirection } from './strategy/entrySignal';
export { PositionLedger, LedgerOptions, OpenRequest, OpenResult, RejectReason } from './ledger/positionLedger';
export { simulate, runSimulation, DaySnapshot, SimulationHooks } from './engine/simulation';
export { runVariants, buildEquityTable, summarizeRun } from './engine/equityAggregator';
export { computeBacktestStats, compareVariants, BacktestStats, VariantComparison } from './analytics/metrics';
export { writeBacktestArtifacts, readTradeLog, equityTableToCsv, ArtifactPaths } from './ledger/storage';
