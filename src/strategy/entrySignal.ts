import { Direction, PredictedMove, SignalRow, StrategyVariant } from '../core/types';

export const singleModel = (model: string): StrategyVariant => ({ name: model, models: [model] });

export const consensus = (name: string, models: string[]): StrategyVariant => ({ name, models });

export const predictionDirection = (value: number, confidence: number): PredictedMove => {
  if (value > confidence) return 'UP';
  if (value < 1 - confidence) return 'DOWN';
  return 'NEUTRAL';
};

// A consensus variant only acts when every model points the same way.
export const variantPrediction = (row: SignalRow, variant: StrategyVariant, confidence: number): PredictedMove => {
  const moves = variant.models.map((model) => {
    const value = row.predictions[model];
    return value === undefined ? 'NEUTRAL' : predictionDirection(value, confidence);
  });
  if (!moves.length) return 'NEUTRAL';
  const [first] = moves;
  return moves.every((m) => m === first) ? first : 'NEUTRAL';
};

export const entryDirection = (
  row: SignalRow,
  variant: StrategyVariant,
  entryZThreshold: number,
  confidence: number
): Direction | undefined => {
  if (!Number.isFinite(row.zScore)) return undefined;
  if (row.zScore < -entryZThreshold && variantPrediction(row, variant, confidence) === 'UP') return 'LONG';
  if (row.zScore > entryZThreshold && variantPrediction(row, variant, confidence) === 'DOWN') return 'SHORT';
  return undefined;
};
