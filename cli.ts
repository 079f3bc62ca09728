#!/usr/bin/env node
/**
 * Node.js CLI for moveset-ranker.
 *
 * Usage:
 *   moveset-ranker parse <game_master.bin> [--json]
 *   moveset-ranker rank <game_master.bin> <outDir> [options]
 */

import * as fs from 'fs';
import * as path from 'path';
import type { GameData } from './src/parser/index';
import { applyLegacyMoves } from './src/sim/legacy';
import { InputError, loadGameData, loadLegacyMoves } from './src/input';
import { rankMovesets } from './src/sim/ranking';
import { buildReports, reportToJson } from './src/report';
import { parseRunOptions } from './src/config';
import type { RunConfig } from './src/config';

function printUsage(): void {
  console.log(`
moveset-ranker

Usage:
  moveset-ranker parse <game_master.bin> [--json]
    Decode a game master and print a summary (or JSON with --json)

  moveset-ranker rank <game_master.bin> <outDir> [options]
    Simulate every moveset and write the rankings to outDir

Options for rank:
  --legacy <file>             Legacy moves, one "CREATURE ABILITY" pair per line
  --exclude <file>            Creature names to leave out, one per line
  --strike-interval <s>       Seconds between opponent strikes (default 2.5)
  --duration <s>              Simulated battle length (default 100)
  --regen-lifetime <s>        Seconds an undodging creature survives (default 100)
  --cp-cap <cp>               CP ceiling for the restricted ranking (default 1500)
  --json                      Write rankings.json instead of text reports

Examples:
  moveset-ranker parse GAME_MASTER.bin
  moveset-ranker rank GAME_MASTER.bin out --legacy legacy.txt --exclude data/legendaries.txt
`);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  printUsage();
  process.exit(1);
}

function readInput(inputPath: string, config?: RunConfig): GameData {
  const gameData = loadGameData(inputPath, config?.excludePath);

  for (const dropped of gameData.dropped) {
    console.error(`Warning: skipped ${dropped.name}: ${dropped.reason}`);
  }
  return gameData;
}

function parseCommand(args: string[]): void {
  if (args.length < 1) {
    fail('Missing input file');
  }

  const inputPath = args[0];
  const jsonOutput = args.includes('--json');
  const gameData = readInput(inputPath);

  if (jsonOutput) {
    const output = {
      creatures: [...gameData.creatures.values()],
      abilities: [...gameData.abilities.values()],
      types: [...gameData.types.values()],
      dropped: gameData.dropped,
    };
    console.log(JSON.stringify(output, null, 2));
  } else {
    console.log(`Creatures: ${gameData.creatures.size}`);
    console.log(`Abilities: ${gameData.abilities.size}`);
    console.log(`Types: ${gameData.types.size}`);
    console.log(`Skipped templates: ${gameData.dropped.length}`);
    console.log('');
    console.log('Types:');
    for (const type of gameData.types.values()) {
      console.log(`  ${type.id}: ${type.name}`);
    }
  }
}

function rankCommand(args: string[]): void {
  if (args.length < 2) {
    fail('Missing input file or output directory');
  }

  const inputPath = args[0];
  const outDir = args[1];

  let config: RunConfig;
  try {
    config = parseRunOptions(args.slice(2));
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error));
  }

  const gameData = readInput(inputPath, config);

  if (config.legacyPath) {
    const legacyMoves = loadLegacyMoves(config.legacyPath);
    const unresolved = applyLegacyMoves(gameData, legacyMoves);
    for (const move of unresolved) {
      console.error(`Warning: unknown legacy move ${move.creature} ${move.ability}`);
    }
  }

  const report = rankMovesets(gameData, config);

  fs.mkdirSync(outDir, { recursive: true });
  if (config.json) {
    const outputPath = path.join(outDir, 'rankings.json');
    fs.writeFileSync(outputPath, JSON.stringify(reportToJson(gameData, report), null, 2));
    console.log(`Rankings written to: ${outputPath}`);
  } else {
    const reports = buildReports(gameData, report);
    for (const [fileName, text] of reports) {
      fs.writeFileSync(path.join(outDir, fileName), text);
    }
    console.log(`Wrote ${reports.size} report(s) to: ${outDir}`);
  }

  console.log(`Ranked ${report.overall.length} moveset(s), rejected ${report.rejected.length}`);
}

// Main entry point
const args = process.argv.slice(2);

if (args.length === 0) {
  printUsage();
  process.exit(0);
}

const command = args[0];
const commandArgs = args.slice(1);

try {
  switch (command) {
    case 'parse':
      parseCommand(commandArgs);
      break;
    case 'rank':
      rankCommand(commandArgs);
      break;
    case 'help':
    case '--help':
    case '-h':
      printUsage();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
} catch (error) {
  if (!(error instanceof InputError)) throw error;
  console.error(`Error: ${error.message}`);
  process.exit(1);
}
