/**
 * Legacy movepool augmentation and the name lists that feed it.
 */

import type { GameData } from '../parser/extract';

export interface LegacyMove {
  creature: string;
  ability: string;
}

function meaningfulLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.replace(/#.*$/, '').trim())
    .filter(line => line.length > 0);
}

/**
 * One name per line; `#` starts a comment.
 */
export function parseNameList(text: string): Set<string> {
  return new Set(meaningfulLines(text).map(line => line.toUpperCase()));
}

/**
 * One `CREATURE ABILITY` pair per line, separated by whitespace or a comma.
 */
export function parseLegacyList(text: string): LegacyMove[] {
  const moves: LegacyMove[] = [];

  for (const line of meaningfulLines(text)) {
    const parts = line.split(/[\s,]+/).filter(part => part.length > 0);
    if (parts.length !== 2) {
      throw new Error(`Invalid legacy move line: "${line}"`);
    }
    moves.push({ creature: parts[0].toUpperCase(), ability: parts[1].toUpperCase() });
  }

  return moves;
}

/**
 * Append legacy abilities to creature movepools. Positive-energy abilities go
 * to the fast list, the rest to the charged list. Returns the entries whose
 * creature or ability is unknown.
 */
export function applyLegacyMoves(gameData: GameData, moves: readonly LegacyMove[]): LegacyMove[] {
  const unresolved: LegacyMove[] = [];

  for (const move of moves) {
    const creatureId = gameData.creatureIdsByName.get(move.creature);
    const abilityId = gameData.abilityIdsByName.get(move.ability);
    const creature = creatureId !== undefined ? gameData.creatures.get(creatureId) : undefined;
    const ability = abilityId !== undefined ? gameData.abilities.get(abilityId) : undefined;

    if (!creature || !ability) {
      unresolved.push(move);
      continue;
    }

    const pool = ability.energyDelta > 0 ? creature.fastAbilityIds : creature.chargedAbilityIds;
    if (!pool.includes(ability.id)) {
      pool.push(ability.id);
    }
  }

  return unresolved;
}
