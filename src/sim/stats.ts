/**
 * Stat formulas derived from base stats, and per-ability rates.
 * Individual values are assumed maxed (+15 on every stat).
 */

import type { Ability, BaseStats } from '../parser/types';

/** Power multiplier at the level cap. */
export const MAX_POWER_MULTIPLIER = 0.79030001;

const IV_MAX = 15;

function cpBase(stats: BaseStats): number {
  return (
    (stats.attack + IV_MAX) *
    Math.sqrt(stats.defense + IV_MAX) *
    Math.sqrt(stats.stamina + IV_MAX)
  );
}

export function combatPower(stats: BaseStats, multiplier: number): number {
  return (cpBase(stats) * multiplier * multiplier) / 10;
}

export function maxCombatPower(stats: BaseStats): number {
  return combatPower(stats, MAX_POWER_MULTIPLIER);
}

export function tankiness(stats: BaseStats): number {
  return (stats.defense + IV_MAX) * (stats.stamina + IV_MAX);
}

export function strength(stats: BaseStats): number {
  return ((stats.attack + IV_MAX) * tankiness(stats)) / 10000;
}

/**
 * Highest power multiplier that keeps the creature at or below `cpCeiling`.
 */
export function cappedPowerMultiplier(stats: BaseStats, cpCeiling: number): number {
  const base = cpBase(stats);
  if (base <= 0) return MAX_POWER_MULTIPLIER;

  return Math.min(MAX_POWER_MULTIPLIER, Math.sqrt((cpCeiling * 10) / base));
}

export interface AbilityRates {
  energyPerSecond: number;
  damagePerSecond: number;
  damagePerEnergy: number;
}

export function abilityRates(ability: Ability): AbilityRates {
  return {
    energyPerSecond: ability.energyDelta / ability.duration,
    damagePerSecond: ability.power / ability.duration,
    damagePerEnergy: ability.power / ability.energyDelta,
  };
}
