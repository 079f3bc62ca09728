/**
 * Moveset rankings.
 *
 * Every fast/charged pair of every creature is simulated twice: once at the
 * level cap and once at the power multiplier that keeps the creature under a
 * CP ceiling. The two damage parts are then weighted against every defending
 * type pair.
 */

import type { Ability, Creature } from '../parser/types';
import type { GameData } from '../parser/extract';
import { DataIntegrityError } from './typeChart';
import { MAX_POWER_MULTIPLIER, abilityRates, cappedPowerMultiplier } from './stats';
import type { AbilityRates } from './stats';
import { chargedFitsWindow, simulate } from './simulate';
import type { DamageInfo } from './simulate';

const DBG = process.env.DEBUG_RANKING === '1';

// Damage-till-faint weight for movesets whose charged cast eats a strike
const UNDEFENDED_FACTOR = 0.25;

export interface RankingParams {
  strikeInterval: number;
  duration: number;
  regenLifetime: number;
  /** CP ceiling for the restricted power metric. */
  cpCeiling: number;
}

export interface MovesetResult {
  creatureId: number;
  fastId: number;
  chargedId: number;
  /** Defending type pair this result is weighted against, if any. */
  opponentTypes?: [number, number];
  primaryDps: number;
  secondaryDps: number;
  msDps: number;
  dps: number;
  damageTillFaint: number;
  restrictedPower: number;
  legacy: boolean;
  fastCastsPerWindow: number;
  chargedCasts: number;
}

export type MovesetMetric = 'msDps' | 'dps' | 'damageTillFaint' | 'restrictedPower';

export interface RejectedMoveset {
  creatureId: number;
  fastId: number;
  chargedId: number;
  reason: string;
}

export interface RankingReport {
  /** Unweighted results, by DPS. */
  overall: MovesetResult[];
  byCreature: Map<number, MovesetResult[]>;
  /** Attacking type → results, split by damage type when the two abilities differ. */
  byAttackType: Map<number, MovesetResult[]>;
  /** First defending type → second defending type → results (first ≤ second). */
  counters: Map<number, Map<number, MovesetResult[]>>;
  rejected: RejectedMoveset[];
}

interface MovesetEvaluation {
  base: MovesetResult;
  counters: Array<{ first: number; second: number; result: MovesetResult }>;
  byAttackType: Array<{ type: number; result: MovesetResult }>;
}

export function compareBy(metric: MovesetMetric): (a: MovesetResult, b: MovesetResult) => number {
  return (a, b) =>
    b[metric] - a[metric] ||
    a.creatureId - b.creatureId ||
    a.fastId - b.fastId ||
    a.chargedId - b.chargedId;
}

/**
 * Sorted copy, descending by `metric`, ties by creature, fast and charged id.
 */
export function rankBy(results: readonly MovesetResult[], metric: MovesetMetric): MovesetResult[] {
  return [...results].sort(compareBy(metric));
}

function evaluate(
  gameData: GameData,
  creature: Creature,
  fast: Ability,
  charged: Ability,
  legacy: boolean,
  params: RankingParams,
): MovesetEvaluation | string {
  const chart = gameData.typeChart;

  for (const type of creature.types) {
    if (!chart.has(type)) {
      throw new DataIntegrityError(`Creature ${creature.name} has type ${type} missing from the type chart`);
    }
  }
  for (const ability of [fast, charged]) {
    if (ability.duration <= 0) {
      throw new DataIntegrityError(`Ability ${ability.name} has no duration`);
    }
    if (!chart.has(ability.type)) {
      throw new DataIntegrityError(`Ability ${ability.name} has type ${ability.type} missing from the type chart`);
    }
  }

  const combat = simulate(creature, fast, charged, {
    powerMultiplier: MAX_POWER_MULTIPLIER,
    strikeInterval: params.strikeInterval,
    duration: params.duration,
    regenLifetime: params.regenLifetime,
  });
  if (combat.fastCastsPerWindow === 0) {
    return `${fast.name} is too slow to cast between strikes`;
  }

  const capped = cappedPowerMultiplier(creature.stats, params.cpCeiling);
  const restricted = simulate(creature, fast, charged, {
    powerMultiplier: capped,
    strikeInterval: params.strikeInterval,
    duration: params.duration,
    regenLifetime: params.regenLifetime,
  });
  const defendFactor = chargedFitsWindow(charged, params.strikeInterval) ? 1 : UNDEFENDED_FACTOR;

  const build = (
    primaryWeight: number,
    secondaryWeight: number,
    opponentTypes?: [number, number],
  ): MovesetResult =>
    buildResult(creature, fast, charged, legacy, combat, restricted, {
      primaryWeight,
      secondaryWeight,
      capped,
      defendFactor,
      opponentTypes,
    });

  const typeIds = chart.typeIds();
  const counters: MovesetEvaluation['counters'] = [];
  for (const first of typeIds) {
    for (const second of typeIds) {
      if (first > second) continue;

      const result = build(
        chart.pairEffectiveness(fast.type, first, second),
        chart.pairEffectiveness(charged.type, first, second),
        [first, second],
      );
      counters.push({ first, second, result });
    }
  }

  const base = build(1, 1);
  const byAttackType =
    fast.type === charged.type
      ? [{ type: fast.type, result: base }]
      : [
          { type: fast.type, result: build(1, 0) },
          { type: charged.type, result: build(0, 1) },
        ];

  return { base, counters, byAttackType };
}

interface Weighting {
  primaryWeight: number;
  secondaryWeight: number;
  capped: number;
  defendFactor: number;
  opponentTypes?: [number, number];
}

function buildResult(
  creature: Creature,
  fast: Ability,
  charged: Ability,
  legacy: boolean,
  combat: DamageInfo,
  restricted: DamageInfo,
  weighting: Weighting,
): MovesetResult {
  const { primaryWeight, secondaryWeight, capped, defendFactor } = weighting;
  const attack = creature.stats.attack + 15;

  const primaryDps = combat.primaryDps * primaryWeight;
  const secondaryDps = combat.secondaryDps * secondaryWeight;
  const msDps = primaryDps + secondaryDps;
  const restrictedMsDps =
    restricted.primaryDps * primaryWeight + restricted.secondaryDps * secondaryWeight;

  const result: MovesetResult = {
    creatureId: creature.id,
    fastId: fast.id,
    chargedId: charged.id,
    primaryDps,
    secondaryDps,
    msDps,
    dps: msDps * attack,
    damageTillFaint: msDps * creature.strength * defendFactor,
    restrictedPower: capped * capped * capped * restrictedMsDps * attack,
    legacy,
    fastCastsPerWindow: combat.fastCastsPerWindow,
    chargedCasts: combat.chargedCasts,
  };
  if (weighting.opponentTypes) {
    result.opponentTypes = weighting.opponentTypes;
  }
  return result;
}

function pushTo<K>(map: Map<K, MovesetResult[]>, key: K, result: MovesetResult): void {
  const list = map.get(key);
  if (list) {
    list.push(result);
  } else {
    map.set(key, [result]);
  }
}

/**
 * Simulate and rank every moveset of every creature.
 * A moveset referencing a missing ability or type is rejected on its own.
 */
export function rankMovesets(gameData: GameData, params: RankingParams): RankingReport {
  const report: RankingReport = {
    overall: [],
    byCreature: new Map(),
    byAttackType: new Map(),
    counters: new Map(),
    rejected: [],
  };

  const creatures = [...gameData.creatures.values()].sort((a, b) => a.id - b.id);

  for (const creature of creatures) {
    const own: MovesetResult[] = [];

    for (let fastIndex = 0; fastIndex < creature.fastAbilityIds.length; fastIndex++) {
      for (let chargedIndex = 0; chargedIndex < creature.chargedAbilityIds.length; chargedIndex++) {
        const fastId = creature.fastAbilityIds[fastIndex];
        const chargedId = creature.chargedAbilityIds[chargedIndex];
        const reject = (reason: string): void => {
          if (DBG) console.log(`[RANK] ${creature.name} ${fastId}/${chargedId} rejected: ${reason}`);
          report.rejected.push({ creatureId: creature.id, fastId, chargedId, reason });
        };

        const fast = gameData.abilities.get(fastId);
        const charged = gameData.abilities.get(chargedId);
        if (!fast || !charged) {
          reject(`unknown ability ${fast ? chargedId : fastId}`);
          continue;
        }

        const legacy =
          fastIndex >= creature.standardFastCount || chargedIndex >= creature.standardChargedCount;

        let evaluation: MovesetEvaluation | string;
        try {
          evaluation = evaluate(gameData, creature, fast, charged, legacy, params);
        } catch (error) {
          if (!(error instanceof DataIntegrityError)) throw error;
          reject(error.message);
          continue;
        }
        if (typeof evaluation === 'string') {
          reject(evaluation);
          continue;
        }

        own.push(evaluation.base);
        report.overall.push(evaluation.base);
        for (const entry of evaluation.byAttackType) {
          pushTo(report.byAttackType, entry.type, entry.result);
        }
        for (const { first, second, result } of evaluation.counters) {
          let row = report.counters.get(first);
          if (!row) {
            row = new Map();
            report.counters.set(first, row);
          }
          pushTo(row, second, result);
        }
      }
    }

    report.byCreature.set(creature.id, own);
  }

  const byDps = compareBy('dps');
  report.overall.sort(byDps);
  for (const list of report.byCreature.values()) list.sort(byDps);
  for (const list of report.byAttackType.values()) list.sort(byDps);
  for (const row of report.counters.values()) {
    for (const list of row.values()) list.sort(byDps);
  }

  return report;
}

export type CreatureMetric = 'maxCp' | 'tankiness' | 'strength';

export function rankCreatures(gameData: GameData, metric: CreatureMetric): Creature[] {
  return [...gameData.creatures.values()].sort((a, b) => b[metric] - a[metric] || a.id - b.id);
}

export interface AbilityRow {
  ability: Ability;
  rates: AbilityRates;
}

/** Abilities by name with their per-second and per-energy rates. */
export function rankAbilities(gameData: GameData): AbilityRow[] {
  return [...gameData.abilities.values()]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : a.id - b.id))
    .map(ability => ({ ability, rates: abilityRates(ability) }));
}
