/**
 * Mock battle for one creature and one fast/charged ability pair.
 *
 * The attacker dodges every opponent strike. Between strikes it fits as many
 * fast casts as it can, and fires the charged ability whenever it has the
 * energy for it. Damage is split by ability kind so callers can weight each
 * part against a defending type on its own.
 */

import type { Ability, Creature } from '../parser/types';

export const MAX_ENERGY = 100;
export const STAB_MULTIPLIER = 1.25;

// Reaction slack taken out of every strike window
const DODGE_SLACK = 0.49;
const MIN_DODGE_TIME = 0.5;

export interface SimulationParams {
  /** Power multiplier of the attacker; scales passive energy from damage taken. */
  powerMultiplier: number;
  /** Seconds between opponent strikes. */
  strikeInterval: number;
  /** Simulated battle length in seconds. */
  duration: number;
  /** Seconds the attacker would survive undodged hits; drives passive energy. */
  regenLifetime: number;
}

export interface DamageInfo {
  primaryDps: number;
  secondaryDps: number;
  /** Fast casts that fit in one strike window; 0 means the moveset cannot dodge. */
  fastCastsPerWindow: number;
  chargedCasts: number;
  /** Simulated seconds elapsed; may overshoot `duration` by the last action. */
  elapsed: number;
}

export function fastCastsPerWindow(fast: Ability, strikeInterval: number): number {
  return Math.floor((strikeInterval - DODGE_SLACK) / fast.duration);
}

/**
 * Whether a charged cast ends before the next strike lands.
 */
export function chargedFitsWindow(charged: Ability, strikeInterval: number): boolean {
  return charged.duration <= strikeInterval - DODGE_SLACK;
}

function stabFor(creature: Creature, ability: Ability): number {
  return ability.type === creature.types[0] || ability.type === creature.types[1]
    ? STAB_MULTIPLIER
    : 1;
}

/**
 * Both abilities must have a non-zero duration.
 */
export function simulate(
  creature: Creature,
  fast: Ability,
  charged: Ability,
  params: SimulationParams,
): DamageInfo {
  const perWindow = fastCastsPerWindow(fast, params.strikeInterval);
  if (perWindow <= 0) {
    return { primaryDps: 0, secondaryDps: 0, fastCastsPerWindow: 0, chargedCasts: 0, elapsed: 0 };
  }

  const fastStab = stabFor(creature, fast);
  const chargedStab = stabFor(creature, charged);
  const chargedCost = -charged.energyDelta;
  const passivePerCast =
    (fast.duration / params.regenLifetime) *
    0.5 *
    (creature.stats.stamina + 15) *
    params.powerMultiplier;

  let time = 0;
  // Index of the strike window the clock is in
  let strikeWindow = 0;
  let energy = 0;
  let primaryDamage = 0;
  let secondaryDamage = 0;
  let chargedCasts = 0;

  while (time < params.duration) {
    while ((strikeWindow + 1) * params.strikeInterval <= time) strikeWindow++;

    if (energy >= chargedCost) {
      secondaryDamage += charged.power * chargedStab;
      time += charged.duration;
      energy = Math.min(MAX_ENERGY, energy + charged.energyDelta);
      chargedCasts++;
      continue;
    }

    const nextStrike = (strikeWindow + 1) * params.strikeInterval;
    const fits = Math.floor((nextStrike - time - DODGE_SLACK) / fast.duration);
    const hits = Math.min(perWindow, Math.max(0, fits));

    primaryDamage += fast.power * fastStab * hits;
    time += fast.duration * hits;
    energy = Math.min(MAX_ENERGY, energy + fast.energyDelta * hits);
    energy = Math.min(MAX_ENERGY, energy + passivePerCast * hits);

    // Dodge the strike that closes this window, landing on the strike itself
    time = Math.max(nextStrike, time + MIN_DODGE_TIME);
  }

  return {
    primaryDps: primaryDamage / time,
    secondaryDps: secondaryDamage / time,
    fastCastsPerWindow: perWindow,
    chargedCasts,
    elapsed: time,
  };
}
