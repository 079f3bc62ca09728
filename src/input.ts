/**
 * File loading for the command-line front end.
 */

import * as fs from 'fs';
import { parseGameMaster } from './parser/index';
import type { GameData } from './parser/index';
import { parseLegacyList, parseNameList } from './sim/legacy';
import type { LegacyMove } from './sim/legacy';

/** A missing or unreadable input file, reported to the user as is. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

function readText(filePath: string, label: string): string {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`${label} not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Read and decode a game master, leaving out the creatures named in the
 * exclusion list if one is given.
 */
export function loadGameData(inputPath: string, excludePath?: string): GameData {
  if (!fs.existsSync(inputPath)) {
    throw new InputError(`File not found: ${inputPath}`);
  }

  const excluded = excludePath
    ? parseNameList(readText(excludePath, 'Exclusion list'))
    : undefined;

  const data = new Uint8Array(fs.readFileSync(inputPath));
  try {
    return parseGameMaster(data, { excluded });
  } catch (error) {
    if (!(error instanceof Error)) throw error;
    throw new InputError(`Could not decode ${inputPath}: ${error.message}`);
  }
}

export function loadLegacyMoves(legacyPath: string): LegacyMove[] {
  const text = readText(legacyPath, 'Legacy move list');
  try {
    return parseLegacyList(text);
  } catch (error) {
    if (!(error instanceof Error)) throw error;
    throw new InputError(`${legacyPath}: ${error.message}`);
  }
}
