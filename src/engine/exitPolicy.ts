import { CloseReason, ExitPolicy, PnlMode, Position, SignalRow } from '../core/types';
import { addTradingDays } from '../core/time';

export const pnlModeFor = (policy: ExitPolicy): PnlMode => (policy.kind === 'SIGNAL_REVERSAL' ? 'PRICE' : 'OUTCOME');

export const closeReasonFor = (policy: ExitPolicy): CloseReason =>
  policy.kind === 'SIGNAL_REVERSAL' ? 'MEAN_REVERSION' : 'HORIZON';

export const scheduledCloseDate = (policy: ExitPolicy, openDate: string): string | undefined =>
  policy.kind === 'FIXED_HORIZON' ? addTradingDays(openDate, policy.holdPeriod) : undefined;

// Signal reversal decides only on a row with a finite z-score and spread for the day.
// Fixed-horizon positions close on the first processed date at or after their schedule.
export const shouldExit = (policy: ExitPolicy, position: Position, date: string, row?: SignalRow): boolean => {
  switch (policy.kind) {
    case 'SIGNAL_REVERSAL': {
      if (!row || !Number.isFinite(row.zScore)) return false;
      if (row.spreadPrice === undefined || !Number.isFinite(row.spreadPrice)) return false;
      return Math.abs(row.zScore) < policy.exitZThreshold;
    }
    case 'FIXED_HORIZON':
      return position.mode === 'OUTCOME' && date >= position.scheduledCloseDate;
    default:
      return false;
  }
};
