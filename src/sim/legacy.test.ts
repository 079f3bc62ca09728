import { describe, expect, it } from 'vitest';
import { applyLegacyMoves, parseLegacyList, parseNameList } from './legacy';
import { createGameData } from '../parser/extract';
import type { GameData } from '../parser/extract';

function gameData(): GameData {
  const data = createGameData();
  data.creatures.set(149, {
    id: 149,
    name: 'DRAGONITE',
    stats: { attack: 250, defense: 212, stamina: 182 },
    types: [16, 3],
    fastAbilityIds: [204],
    chargedAbilityIds: [82],
    standardFastCount: 1,
    standardChargedCount: 1,
    maxCp: 0,
    tankiness: 0,
    strength: 0,
  });
  data.creatureIdsByName.set('DRAGONITE', 149);

  const abilities = [
    { id: 204, name: 'DRAGON_BREATH_FAST', energyDelta: 4 },
    { id: 82, name: 'DRAGON_PULSE', energyDelta: -50 },
    { id: 83, name: 'DRAGON_CLAW', energyDelta: -33 },
    { id: 202, name: 'STEEL_WING_FAST', energyDelta: 6 },
  ];
  for (const ability of abilities) {
    data.abilities.set(ability.id, { ...ability, type: 16, power: 10, duration: 1 });
    data.abilityIdsByName.set(ability.name, ability.id);
  }
  return data;
}

describe('parseNameList', () => {
  it('reads one upper-cased name per line, ignoring comments and blanks', () => {
    const names = parseNameList('# legendaries\nmewtwo\n\n  LUGIA  # silver\r\n');
    expect([...names]).toEqual(['MEWTWO', 'LUGIA']);
  });
});

describe('parseLegacyList', () => {
  it('accepts whitespace or comma separated pairs', () => {
    expect(parseLegacyList('DRAGONITE DRAGON_CLAW\ndragonite,steel_wing_fast\n')).toEqual([
      { creature: 'DRAGONITE', ability: 'DRAGON_CLAW' },
      { creature: 'DRAGONITE', ability: 'STEEL_WING_FAST' },
    ]);
  });

  it('rejects lines that are not pairs', () => {
    expect(() => parseLegacyList('DRAGONITE\n')).toThrow('Invalid legacy move line: "DRAGONITE"');
  });
});

describe('applyLegacyMoves', () => {
  it('appends fast and charged abilities to the matching pool', () => {
    const data = gameData();
    const unresolved = applyLegacyMoves(data, [
      { creature: 'DRAGONITE', ability: 'DRAGON_CLAW' },
      { creature: 'DRAGONITE', ability: 'STEEL_WING_FAST' },
    ]);

    const dragonite = data.creatures.get(149);
    expect(unresolved).toEqual([]);
    expect(dragonite?.fastAbilityIds).toEqual([204, 202]);
    expect(dragonite?.chargedAbilityIds).toEqual([82, 83]);
    expect(dragonite?.standardFastCount).toBe(1);
    expect(dragonite?.standardChargedCount).toBe(1);
  });

  it('does not append an ability the pool already has', () => {
    const data = gameData();
    applyLegacyMoves(data, [{ creature: 'DRAGONITE', ability: 'DRAGON_PULSE' }]);
    expect(data.creatures.get(149)?.chargedAbilityIds).toEqual([82]);
  });

  it('returns entries with unknown names', () => {
    const data = gameData();
    const unresolved = applyLegacyMoves(data, [
      { creature: 'MISSINGNO', ability: 'DRAGON_CLAW' },
      { creature: 'DRAGONITE', ability: 'HYPER_BEAM' },
    ]);
    expect(unresolved).toEqual([
      { creature: 'MISSINGNO', ability: 'DRAGON_CLAW' },
      { creature: 'DRAGONITE', ability: 'HYPER_BEAM' },
    ]);
    expect(data.creatures.get(149)?.chargedAbilityIds).toEqual([82]);
  });
});
