/**
 * Run configuration for the command-line front end.
 * The core never falls back to these values on its own.
 */

import type { RankingParams } from './sim/ranking';

export interface RunConfig extends RankingParams {
  legacyPath?: string;
  excludePath?: string;
  json: boolean;
}

export const DEFAULT_RANKING_PARAMS: RankingParams = {
  strikeInterval: 2.5,
  duration: 100,
  regenLifetime: 100,
  cpCeiling: 1500,
};

const NUMERIC_FLAGS = new Map<string, keyof RankingParams>([
  ['--strike-interval', 'strikeInterval'],
  ['--duration', 'duration'],
  ['--regen-lifetime', 'regenLifetime'],
  ['--cp-cap', 'cpCeiling'],
]);

const PATH_FLAGS = new Map<string, 'legacyPath' | 'excludePath'>([
  ['--legacy', 'legacyPath'],
  ['--exclude', 'excludePath'],
]);

/**
 * Parse the option flags that follow the positional arguments.
 */
export function parseRunOptions(args: string[]): RunConfig {
  const config: RunConfig = { ...DEFAULT_RANKING_PARAMS, json: false };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const value = args[i + 1];
    const numericKey = NUMERIC_FLAGS.get(arg);
    const pathKey = PATH_FLAGS.get(arg);

    if (arg === '--json') {
      config.json = true;
      i += 1;
    } else if (numericKey) {
      const parsed = value === undefined ? NaN : Number(value);
      if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new Error(`${arg} expects a positive number, got "${value ?? ''}"`);
      }
      config[numericKey] = parsed;
      i += 2;
    } else if (pathKey) {
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`${arg} expects a file path`);
      }
      config[pathKey] = value;
      i += 2;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return config;
}
