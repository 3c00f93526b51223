import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AggregateResult, TradeRecord } from '../core/types';
import { ensureDir, writeJSONFile } from '../core/utils';
import { computeBacktestStats } from '../analytics/metrics';

export interface ArtifactPaths {
  equityCsv: string;
  tradesJsonl: string;
  summaryJson: string;
}

export type LoggedTrade = TradeRecord & { variant: string };

const tradeBase = {
  variant: z.string(),
  date: z.string(),
  pairId: z.string(),
  direction: z.enum(['LONG', 'SHORT']),
  capital: z.number(),
  cost: z.number()
};

const loggedTradeSchema = z.discriminatedUnion('type', [
  z.object({ ...tradeBase, type: z.literal('ENTRY') }),
  z.object({
    ...tradeBase,
    type: z.literal('EXIT'),
    reason: z.enum(['MEAN_REVERSION', 'HORIZON', 'END_OF_BACKTEST']),
    grossPnl: z.number(),
    realizedPnl: z.number(),
    pnlPct: z.number(),
    holdingDays: z.number()
  })
]);

const parseLoggedTrade = (line: string): LoggedTrade => {
  const parsed = loggedTradeSchema.safeParse(JSON.parse(line));
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
};

export const equityTableToCsv = (result: AggregateResult): string => {
  const variants = result.runs.map((r) => r.variant);
  const header = ['date', ...variants.flatMap((v) => [`${v}_equity`, `${v}_positions`])];
  const lines = [header.join(',')];
  for (const row of result.table) {
    const cells = variants.flatMap((v) => {
      const equity = row.equity[v];
      const positions = row.positions[v];
      return [equity === undefined ? '' : equity.toFixed(2), positions === undefined ? '' : String(positions)];
    });
    lines.push([row.date, ...cells].join(','));
  }
  return lines.join('\n');
};

export const writeBacktestArtifacts = (outDir: string, result: AggregateResult): ArtifactPaths => {
  ensureDir(outDir);
  const paths: ArtifactPaths = {
    equityCsv: path.join(outDir, 'equity.csv'),
    tradesJsonl: path.join(outDir, 'trades.jsonl'),
    summaryJson: path.join(outDir, 'summary.json')
  };

  fs.writeFileSync(paths.equityCsv, equityTableToCsv(result));

  const tradeLines = result.runs.flatMap((run) =>
    run.trades.map((trade) => JSON.stringify({ variant: run.variant, ...trade }))
  );
  fs.writeFileSync(paths.tradesJsonl, tradeLines.length ? `${tradeLines.join('\n')}\n` : '');

  writeJSONFile(paths.summaryJson, {
    summaries: result.summaries,
    stats: Object.fromEntries(result.runs.map((run) => [run.variant, computeBacktestStats(run.equityCurve, run.trades) ?? null]))
  });

  console.log(`Backtest artifacts written to ${outDir}`);
  return paths;
};

export const readTradeLog = (filePath: string): LoggedTrade[] => {
  if (!fs.existsSync(filePath)) return [];
  const content = fs.readFileSync(filePath, 'utf-8').trim();
  if (!content.length) return [];
  return content.split('\n').map((line, idx) => {
    try {
      return parseLoggedTrade(line);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Malformed trade log line ${idx + 1} in ${filePath}: ${message}`);
    }
  });
};
