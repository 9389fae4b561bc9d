import fs from 'fs';
import path from 'path';
import { CooldownRegistry, PortfolioState } from '../core/types';
import { Validation, validateCooldownRegistry, validatePortfolioState } from '../core/schema';
import { readJSONFile, writeJSONFile } from '../core/utils';

export const getStateDir = (dir?: string) => path.resolve(dir || process.env.STATE_DIR || path.join(process.cwd(), 'state'));

const portfolioFile = (dir?: string) => path.join(getStateDir(dir), 'portfolio.json');
const cooldownFile = (dir?: string) => path.join(getStateDir(dir), 'cooldowns.json');

const loadValidated = <T>(file: string, fallback: T, validate: (input: unknown) => Validation<T>): T => {
  if (!fs.existsSync(file)) return fallback;
  const result = validate(readJSONFile(file));
  if (!result.success) {
    throw new Error(`Corrupt state file ${file}: ${result.errors.join('; ')}`);
  }
  return result.value;
};

// A fresh install starts flat with no cooldowns.
export const loadPortfolioState = (dir?: string): PortfolioState =>
  loadValidated(portfolioFile(dir), { positions: [] }, validatePortfolioState);

export const loadCooldownRegistry = (dir?: string): CooldownRegistry =>
  loadValidated(cooldownFile(dir), {}, validateCooldownRegistry);

export const savePortfolioState = (state: PortfolioState, dir?: string) => {
  writeJSONFile(portfolioFile(dir), state);
};

export const saveCooldownRegistry = (registry: CooldownRegistry, dir?: string) => {
  writeJSONFile(cooldownFile(dir), registry);
};
