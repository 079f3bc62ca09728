/**
 * Parser module exports
 */

export * from './types';
export * from './wire';
export * from './gzip';
export * from './names';
export * from './extract';

import { decompress } from './gzip';
import { extractGameData } from './extract';
import type { ExtractOptions, GameData } from './extract';

/**
 * Parse a game master dump, raw or gzip-packed.
 */
export function parseGameMaster(data: Uint8Array, options: ExtractOptions = {}): GameData {
  return extractGameData(decompress(data), options);
}
