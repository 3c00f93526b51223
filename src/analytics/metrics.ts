import { EquityPoint, ExitRecord, SimulationResult, TradeRecord } from '../core/types';
import { average, sum } from '../core/utils';

export interface BacktestStats {
  finalEquity: number;
  totalReturnPct: number;
  maxEquity: number;
  minEquity: number;
  maxDrawdownPct: number; // lowest equity vs. the first point, <= 0
  peakDrawdown: number; // worst peak-to-trough fall, fraction of peak
  dailyVolatility: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRatePct: number;
  avgWin: number;
  avgLoss: number;
  totalPnl: number;
}

export const computeDailyReturns = (points: EquityPoint[]): number[] => {
  const returns: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const curr = points[i];
    const r = prev.equity > 0 ? (curr.equity - prev.equity) / prev.equity : 0;
    returns.push(r);
  }
  return returns;
};

export const computePeakDrawdown = (points: EquityPoint[]): number => {
  let peak = Number.NEGATIVE_INFINITY;
  let worst = 0;
  for (const p of points) {
    peak = Math.max(peak, p.equity);
    const drawdown = peak > 0 ? (peak - p.equity) / peak : 0;
    worst = Math.max(worst, drawdown);
  }
  return worst;
};

const isExit = (t: TradeRecord): t is ExitRecord => t.type === 'EXIT';

// Undefined for an empty curve.
export const computeBacktestStats = (points: EquityPoint[], trades: TradeRecord[]): BacktestStats | undefined => {
  if (!points.length) return undefined;
  const equities = points.map((p) => p.equity);
  const initialEquity = equities[0];
  const finalEquity = equities[equities.length - 1];
  const minEquity = Math.min(...equities);

  const pnl = trades.filter(isExit).map((t) => t.realizedPnl);
  const wins = pnl.filter((p) => p > 0);
  const losses = pnl.filter((p) => p < 0);

  const dailyReturns = computeDailyReturns(points);
  const meanReturn = average(dailyReturns);

  return {
    finalEquity,
    totalReturnPct: initialEquity !== 0 ? ((finalEquity - initialEquity) / initialEquity) * 100 : 0,
    maxEquity: Math.max(...equities),
    minEquity,
    maxDrawdownPct: initialEquity !== 0 ? ((minEquity - initialEquity) / initialEquity) * 100 : 0,
    peakDrawdown: computePeakDrawdown(points),
    dailyVolatility: dailyReturns.length ? Math.sqrt(average(dailyReturns.map((r) => (r - meanReturn) ** 2))) : 0,
    totalTrades: pnl.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRatePct: pnl.length ? (wins.length / pnl.length) * 100 : 0,
    avgWin: average(wins),
    avgLoss: average(losses),
    totalPnl: sum(pnl)
  };
};

export interface VariantComparison {
  winner: string;
  totalPnl: Record<string, number>;
}

// Ties go to the variant listed first.
export const compareVariants = (runs: SimulationResult[]): VariantComparison | undefined => {
  if (!runs.length) return undefined;
  const totalPnl: Record<string, number> = {};
  let winner = runs[0].variant;
  let best = Number.NEGATIVE_INFINITY;
  for (const run of runs) {
    const pnl = sum(run.trades.filter(isExit).map((t) => t.realizedPnl));
    totalPnl[run.variant] = pnl;
    if (pnl > best) {
      best = pnl;
      winner = run.variant;
    }
  }
  return { winner, totalPnl };
};
