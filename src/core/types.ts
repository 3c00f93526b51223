export type Direction = 'LONG' | 'SHORT';
export type PredictedMove = 'UP' | 'DOWN' | 'NEUTRAL';
export type CloseReason = 'MEAN_REVERSION' | 'HORIZON' | 'END_OF_BACKTEST';
export type TradeEventType = 'ENTRY' | 'EXIT';

// PRICE: PnL marked from spread prices. OUTCOME: PnL taken from the labelled forward return.
export type PnlMode = 'PRICE' | 'OUTCOME';

export interface SignalRow {
  date: string; // ISO date, YYYY-MM-DD
  pairId: string;
  zScore: number; // NaN when the rolling window is not yet filled
  spreadPrice?: number;
  predictions: Record<string, number>; // model name -> P(up), 0..1
  targetReturn?: number;
  targetDirection?: 0 | 1;
}

export interface CostSettings {
  transactionCostPct: number;
  commission: number;
  slippagePct: number;
  spreadPct: number;
  annualBorrowRate: number;
}

export interface SignalReversalPolicy {
  kind: 'SIGNAL_REVERSAL';
  exitZThreshold: number;
}

export interface FixedHorizonPolicy {
  kind: 'FIXED_HORIZON';
  holdPeriod: number; // trading days
}

export type ExitPolicy = SignalReversalPolicy | FixedHorizonPolicy;

export interface BacktestConfig {
  initialCapital: number;
  capitalPerTrade?: number;
  positionRiskPct: number;
  maxPositions: number;
  capitalBufferFactor: number;
  entryZThreshold: number;
  modelConfidenceThreshold: number;
  exitPolicy: ExitPolicy;
  costs: CostSettings;
  logNonActionable: boolean;
}

export interface StrategyVariant {
  name: string;
  models: string[]; // more than one model means every model must agree
}

interface PositionBase {
  pairId: string;
  direction: Direction;
  openDate: string;
  investedCapital: number;
  entryCost: number;
}

export interface PricePosition extends PositionBase {
  mode: 'PRICE';
  entrySpread: number;
  entryPrice: number;
  size: number;
  lastSpread: number;
  unrealizedPnl: number;
}

export interface OutcomePosition extends PositionBase {
  mode: 'OUTCOME';
  scheduledCloseDate: string;
  grossPnl: number;
}

export type Position = PricePosition | OutcomePosition;

export interface EntryRecord {
  type: 'ENTRY';
  date: string;
  pairId: string;
  direction: Direction;
  capital: number;
  cost: number;
}

export interface ExitRecord {
  type: 'EXIT';
  date: string;
  pairId: string;
  direction: Direction;
  capital: number;
  reason: CloseReason;
  grossPnl: number;
  cost: number;
  realizedPnl: number;
  pnlPct: number;
  holdingDays: number;
}

export type TradeRecord = EntryRecord | ExitRecord;

export interface EquityPoint {
  date: string;
  equity: number;
  openPositions: number;
}

export interface SimulationResult {
  variant: string;
  equityCurve: EquityPoint[];
  trades: TradeRecord[];
  skipped: number;
  initialCapital: number;
  finalEquity: number;
}

export interface VariantSummary {
  variant: string;
  finalEquity: number;
  totalReturn: number;
  tradeCount: number;
  skipped: number;
}

export interface EquityTableRow {
  date: string;
  equity: Record<string, number>;
  positions: Record<string, number>;
}

export interface AggregateResult {
  table: EquityTableRow[];
  runs: SimulationResult[];
  summaries: VariantSummary[];
}
