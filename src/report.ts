/**
 * Plain-text reports over extracted records and moveset rankings.
 */

import type { GameData } from './parser/extract';
import type { Ability, Creature, DroppedRecord, TypeInfo } from './parser/types';
import type {
  CreatureMetric,
  MovesetMetric,
  MovesetResult,
  RankingReport,
  RejectedMoveset,
} from './sim/ranking';
import { rankAbilities, rankBy, rankCreatures } from './sim/ranking';

/** Six significant digits, trailing zeros dropped. */
export function formatNumber(value: number): string {
  return String(Number(value.toPrecision(6)));
}

function creatureName(gameData: GameData, id: number): string {
  return gameData.creatures.get(id)?.name ?? `#${id}`;
}

function abilityName(gameData: GameData, id: number): string {
  return gameData.abilities.get(id)?.name ?? `#${id}`;
}

function typeName(gameData: GameData, id: number): string {
  return gameData.types.get(id)?.name ?? `#${id}`;
}

export function formatCreatureList(gameData: GameData, metric: CreatureMetric): string {
  return rankCreatures(gameData, metric)
    .map(creature => `${creature.name}: ${formatNumber(creature[metric])}\n`)
    .join('');
}

export function formatAbilityTable(gameData: GameData): string {
  const row = (cells: string[]): string =>
    cells[0].padEnd(5) + cells.slice(1, 3).map(c => c.padEnd(30)).join(' ') + ' ' +
    cells.slice(3).map(c => c.padEnd(10)).join(' ').trimEnd() + '\n';

  let out = row(['Id', 'Name', 'Type', 'Power', 'Energy', 'Duration', 'EPS', 'DPS', 'DPE']);
  for (const { ability, rates } of rankAbilities(gameData)) {
    out += row([
      String(ability.id),
      ability.name,
      typeName(gameData, ability.type),
      formatNumber(ability.power),
      String(ability.energyDelta),
      formatNumber(ability.duration),
      formatNumber(rates.energyPerSecond),
      formatNumber(rates.damagePerSecond),
      formatNumber(rates.damagePerEnergy),
    ]);
  }
  return out;
}

/**
 * Every non-neutral entry of the type chart.
 */
export function formatTypeChart(gameData: GameData): string {
  let out = '';
  for (const attacking of gameData.typeChart.typeIds()) {
    for (const [defending, multiplier] of gameData.typeChart.row(attacking) ?? []) {
      if (multiplier === 1) continue;
      out +=
        `(${attacking})${typeName(gameData, attacking)} -> ` +
        `(${defending})${typeName(gameData, defending)}: ${formatNumber(multiplier)}\n`;
    }
  }
  return out;
}

export function formatMoveset(gameData: GameData, result: MovesetResult, metric: MovesetMetric): string {
  const legacy = result.legacy ? ' [legacy]' : '';
  return (
    `${creatureName(gameData, result.creatureId)}: ` +
    `${abilityName(gameData, result.fastId)} + ${abilityName(gameData, result.chargedId)}${legacy} : ` +
    `${formatNumber(result[metric])}`
  );
}

export function formatMovesetList(
  gameData: GameData,
  results: readonly MovesetResult[],
  metric: MovesetMetric,
): string {
  return rankBy(results, metric)
    .map(result => formatMoveset(gameData, result, metric) + '\n')
    .join('');
}

/**
 * Creature headers followed by their movesets, best DPS first.
 */
export function formatCreatureMovesets(gameData: GameData, report: RankingReport): string {
  let out = '';
  for (const [creatureId, results] of report.byCreature) {
    const creature = gameData.creatures.get(creatureId);
    if (!creature) continue;

    const [primary, secondary] = creature.types;
    out +=
      `#${creature.id} ${creature.name} ` +
      `(Type: ${typeName(gameData, primary)}, ${typeName(gameData, secondary)}) ` +
      `(Max CP: ${formatNumber(creature.maxCp)}, ATK: ${creature.stats.attack}, ` +
      `DEF: ${creature.stats.defense}, STA: ${creature.stats.stamina})\n`;
    for (const result of results) {
      const legacy = result.legacy ? ' [legacy]' : '';
      out +=
        `${abilityName(gameData, result.fastId)} + ${abilityName(gameData, result.chargedId)}${legacy} : ` +
        `${formatNumber(result.dps)} (${formatNumber(result.msDps)})\n`;
    }
    out += '\n';
  }
  return out;
}

export function formatByAttackType(gameData: GameData, report: RankingReport, metric: MovesetMetric): string {
  let out = '';
  const types = [...report.byAttackType.keys()].sort((a, b) => a - b);
  for (const type of types) {
    out += `Best attackers of ${typeName(gameData, type)} type:\n\n`;
    out += formatMovesetList(gameData, report.byAttackType.get(type) ?? [], metric);
    out += '\n\n';
  }
  return out;
}

export function formatCounters(gameData: GameData, report: RankingReport, metric: MovesetMetric): string {
  let out = '';
  for (const [first, row] of report.counters) {
    for (const [second, results] of row) {
      out += `Best counters of ${typeName(gameData, first)}-${typeName(gameData, second)}\n`;
      out += formatMovesetList(gameData, results, metric);
      out += '\n\n';
    }
  }
  return out;
}

/**
 * File name → report text.
 */
export function buildReports(gameData: GameData, report: RankingReport): Map<string, string> {
  return new Map([
    ['cplist.txt', formatCreatureList(gameData, 'maxCp')],
    ['tankiness.txt', formatCreatureList(gameData, 'tankiness')],
    ['strength.txt', formatCreatureList(gameData, 'strength')],
    ['abilities.txt', formatAbilityTable(gameData)],
    ['typechart.txt', formatTypeChart(gameData)],
    ['creatures.txt', formatCreatureMovesets(gameData, report)],
    ['dpslist.txt', formatMovesetList(gameData, report.overall, 'dps')],
    ['damagetillfaint.txt', formatMovesetList(gameData, report.overall, 'damageTillFaint')],
    ['restricted.txt', formatMovesetList(gameData, report.overall, 'restrictedPower')],
    ['bestDPSbyType.txt', formatByAttackType(gameData, report, 'dps')],
    ['bestDamageTillFaintByType.txt', formatByAttackType(gameData, report, 'damageTillFaint')],
    ['bestDPSCounters.txt', formatCounters(gameData, report, 'dps')],
    ['bestDamageTillFaintCounters.txt', formatCounters(gameData, report, 'damageTillFaint')],
  ]);
}

export interface NamedMovesetResult extends MovesetResult {
  creature: string;
  fast: string;
  charged: string;
}

export interface RankingJson {
  creatures: Creature[];
  abilities: Ability[];
  types: TypeInfo[];
  overall: NamedMovesetResult[];
  /** Keyed `FIRST-SECOND` by type name. */
  counters: Record<string, NamedMovesetResult[]>;
  rejected: RejectedMoveset[];
  dropped: DroppedRecord[];
}

/**
 * JSON-serializable view of a ranking, with names resolved.
 */
export function reportToJson(gameData: GameData, report: RankingReport): RankingJson {
  const named = (result: MovesetResult): NamedMovesetResult => ({
    creature: creatureName(gameData, result.creatureId),
    fast: abilityName(gameData, result.fastId),
    charged: abilityName(gameData, result.chargedId),
    ...result,
  });

  const counters: Record<string, NamedMovesetResult[]> = {};
  for (const [first, row] of report.counters) {
    for (const [second, results] of row) {
      counters[`${typeName(gameData, first)}-${typeName(gameData, second)}`] = results.map(named);
    }
  }

  return {
    creatures: [...gameData.creatures.values()],
    abilities: [...gameData.abilities.values()],
    types: [...gameData.types.values()],
    overall: report.overall.map(named),
    counters,
    rejected: report.rejected,
    dropped: gameData.dropped,
  };
}
