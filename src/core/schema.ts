import { z } from 'zod';
import { BacktestConfig, PnlMode, SignalRow } from './types';
import { isISODate } from './time';

const costSettingsSchema = z.object({
  transactionCostPct: z.number().min(0).max(1).default(0.004),
  commission: z.number().min(0).default(1),
  slippagePct: z.number().min(0).max(1).default(0.0005),
  spreadPct: z.number().min(0).max(1).default(0.0005),
  annualBorrowRate: z.number().min(0).default(0.03)
});

const exitPolicySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('SIGNAL_REVERSAL'),
    exitZThreshold: z.number().min(0).default(0.5)
  }),
  z.object({
    kind: z.literal('FIXED_HORIZON'),
    holdPeriod: z.number().int().min(1).default(10)
  })
]);

export const backtestConfigSchema = z
  .object({
    initialCapital: z.number().positive().default(10000),
    capitalPerTrade: z.number().positive().optional(),
    positionRiskPct: z.number().positive().max(1).default(0.02),
    maxPositions: z.number().int().positive().default(3),
    capitalBufferFactor: z.number().min(1).default(1.1),
    entryZThreshold: z.number().positive().default(1.5),
    modelConfidenceThreshold: z.number().min(0.5).lt(1).default(0.55),
    exitPolicy: exitPolicySchema.default({ kind: 'SIGNAL_REVERSAL', exitZThreshold: 0.5 }),
    costs: costSettingsSchema.default({}),
    logNonActionable: z.boolean().default(false)
  })
  .superRefine((cfg, ctx) => {
    if (cfg.exitPolicy.kind === 'SIGNAL_REVERSAL' && cfg.exitPolicy.exitZThreshold >= cfg.entryZThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['exitPolicy', 'exitZThreshold'],
        message: `must be below entryZThreshold (${cfg.entryZThreshold})`
      });
    }
  });

export type BacktestConfigInput = z.input<typeof backtestConfigSchema>;

const numberOrNaN = z.union([z.number(), z.nan()]);

export const signalRowSchema = z.object({
  date: z.string().refine(isISODate, { message: 'must be an ISO date (YYYY-MM-DD)' }),
  pairId: z.string().min(1),
  zScore: numberOrNaN,
  spreadPrice: numberOrNaN.optional(),
  predictions: z.record(z.number().min(0).max(1)),
  targetReturn: z.number().finite().optional(),
  targetDirection: z.union([z.literal(0), z.literal(1)]).optional()
});

export type ValidationResult<T> = { success: true; value: T } | { success: false; errors: string[] };

const formatIssues = (issues: z.ZodIssue[]): string[] =>
  issues.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`);

export const validateConfig = (input: unknown): ValidationResult<BacktestConfig> => {
  const result = backtestConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, errors: formatIssues(result.error.issues) };
};

export interface SignalRequirements {
  mode: PnlMode;
  models: string[];
}

const rowLabel = (raw: unknown, index: number): string => {
  let date = '?';
  let pair = '?';
  if (typeof raw === 'object' && raw !== null) {
    if ('date' in raw && typeof raw.date === 'string') date = raw.date;
    if ('pairId' in raw && typeof raw.pairId === 'string') pair = raw.pairId;
  }
  return `row ${index} (date=${date}, pair=${pair})`;
};

const missingFields = (row: SignalRow, needs: SignalRequirements): string[] => {
  const missing: string[] = [];
  if (needs.mode === 'PRICE' && row.spreadPrice === undefined) missing.push('spreadPrice');
  if (needs.mode === 'OUTCOME') {
    if (row.targetReturn === undefined) missing.push('targetReturn');
    if (row.targetDirection === undefined) missing.push('targetDirection');
  }
  for (const model of needs.models) {
    if (row.predictions[model] === undefined) missing.push(`predictions.${model}`);
  }
  return missing;
};

export const validateSignalRows = (rows: unknown[], needs: SignalRequirements): ValidationResult<SignalRow[]> => {
  const errors: string[] = [];
  const value: SignalRow[] = [];
  const seen = new Set<string>();
  rows.forEach((raw, index) => {
    const parsed = signalRowSchema.safeParse(raw);
    if (!parsed.success) {
      formatIssues(parsed.error.issues).forEach((msg) => errors.push(`${rowLabel(raw, index)}: ${msg}`));
      return;
    }
    missingFields(parsed.data, needs).forEach((field) => errors.push(`${rowLabel(raw, index)}: ${field}: Required`));
    const key = `${parsed.data.date}|${parsed.data.pairId}`;
    if (seen.has(key)) errors.push(`${rowLabel(raw, index)}: pairId: duplicate row for pair on date`);
    seen.add(key);
    value.push(parsed.data);
  });
  if (errors.length) {
    return { success: false, errors };
  }
  return { success: true, value };
};

export const assertValidSignals = (rows: unknown[], needs: SignalRequirements): SignalRow[] => {
  const res = validateSignalRows(rows, needs);
  if (!res.success) {
    throw new Error(`Invalid signal stream:\n${res.errors.join('\n')}`);
  }
  return res.value;
};
