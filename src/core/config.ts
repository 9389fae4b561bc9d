import path from 'path';
import { AdmissionConfig, BotConfig } from './types';
import { validateBotConfig } from './schema';
import { readJSONFile } from './utils';

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'src/config/default.json');

export const loadBotConfig = (configPath: string = DEFAULT_CONFIG_PATH): BotConfig => {
  const result = validateBotConfig(readJSONFile(configPath));
  if (!result.success) {
    throw new Error(`Invalid config ${configPath}: ${result.errors.join('; ')}`);
  }
  return result.value;
};

/**
 * Flattens the chosen floor profile into the settings the admission controller
 * reads. Precedence: explicit argument, ADMISSION_PROFILE, then the file's `profile`.
 */
export const resolveAdmissionConfig = (config: BotConfig, profile?: string): AdmissionConfig => {
  const name = profile || process.env.ADMISSION_PROFILE || config.profile;
  const floors = config.profiles[name];
  if (!floors) {
    throw new Error(`Unknown admission profile "${name}" (known: ${Object.keys(config.profiles).join(', ')})`);
  }
  return {
    capacity: config.capacity,
    maxNewPositionsPerCycle: config.maxNewPositionsPerCycle,
    scoreFloor: floors.scoreFloor,
    evFloor: floors.evFloor,
    displacement: { ...config.displacement }
  };
};
