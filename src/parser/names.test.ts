import { describe, expect, it } from 'vitest';
import { classifyTemplate } from './names';

describe('classifyTemplate', () => {
  it('recognises creature templates', () => {
    expect(classifyTemplate('V0149_POKEMON_DRAGONITE')).toEqual({
      kind: 'creature',
      id: 149,
      name: 'DRAGONITE',
    });
  });

  it('recognises ability templates', () => {
    expect(classifyTemplate('V0204_MOVE_DRAGON_BREATH_FAST')).toEqual({
      kind: 'ability',
      id: 204,
      name: 'DRAGON_BREATH_FAST',
    });
  });

  it('recognises type templates', () => {
    expect(classifyTemplate('POKEMON_TYPE_DRAGON')).toEqual({ kind: 'type', name: 'DRAGON' });
  });

  it('ignores everything else', () => {
    expect(classifyTemplate('ITEM_POTION')).toBeNull();
    expect(classifyTemplate('BADGE_BATTLE_ATTACK_WON')).toBeNull();
    expect(classifyTemplate('V0001_POKEMON')).toBeNull();
  });
});
