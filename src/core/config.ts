import { BacktestConfig } from './types';
import { BacktestConfigInput, validateConfig } from './schema';
import { readJSONFile } from './utils';

export const resolveConfig = (input: BacktestConfigInput = {}): BacktestConfig => {
  const res = validateConfig(input);
  if (!res.success) {
    throw new Error(`Invalid backtest config:\n${res.errors.join('\n')}`);
  }
  return res.value;
};

export const loadConfig = (configPath: string): BacktestConfig => {
  const res = validateConfig(readJSONFile(configPath));
  if (!res.success) {
    throw new Error(`Invalid backtest config in ${configPath}:\n${res.errors.join('\n')}`);
  }
  return res.value;
};

export const defaultConfig = (): BacktestConfig => resolveConfig();
