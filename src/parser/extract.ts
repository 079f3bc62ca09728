/**
 * Record extraction from a decoded game master.
 *
 * The outer message is a flat run of item templates. Each template carries a
 * name and one details sub-message; only creature, ability and type templates
 * are read, and only the handful of fields the rankings need.
 */

import type { Ability, Creature, DroppedRecord, TypeInfo, WireValue } from './types';
import {
  DecodeError,
  WireDecoder,
  float32Of,
  isBytes,
  signedOf,
  textOf,
  unsignedOf,
} from './wire';
import { classifyTemplate } from './names';
import { TypeChart } from '../sim/typeChart';
import { maxCombatPower, strength, tankiness } from '../sim/stats';

const DBG = process.env.DEBUG_DECODE === '1';

// Field numbers of the outer message
const RootField = {
  ItemTemplate: 2,
} as const;

// Field numbers of an item template
const TemplateField = {
  TemplateId: 1,
  CreatureSettings: 2,
  AbilitySettings: 4,
  TypeEffectiveness: 8,
} as const;

const CreatureField = {
  PrimaryType: 4,
  SecondaryType: 5,
  Stats: 8,
  FastAbilities: 9,
  ChargedAbilities: 10,
} as const;

const StatsField = {
  Stamina: 1,
  Attack: 2,
  Defense: 3,
} as const;

const AbilityField = {
  Type: 3,
  Power: 4,
  DurationMs: 12,
  Energy: 15,
} as const;

const TypeField = {
  AttackScalar: 1,
  Id: 2,
} as const;

/**
 * Tables recovered from one game master. Filled during extraction and only
 * read afterwards, except for legacy movepool augmentation.
 */
export interface GameData {
  creatures: Map<number, Creature>;
  abilities: Map<number, Ability>;
  types: Map<number, TypeInfo>;
  typeChart: TypeChart;
  creatureIdsByName: Map<string, number>;
  abilityIdsByName: Map<string, number>;
  dropped: DroppedRecord[];
}

export interface ExtractOptions {
  /** Creature names skipped before their details are decoded. */
  excluded?: ReadonlySet<string>;
}

export function createGameData(): GameData {
  return {
    creatures: new Map(),
    abilities: new Map(),
    types: new Map(),
    typeChart: new TypeChart(),
    creatureIdsByName: new Map(),
    abilityIdsByName: new Map(),
    dropped: [],
  };
}

/**
 * Walk every item template of a game master.
 * A decode error in the outer message propagates; one inside a template only
 * drops that template.
 */
export function extractGameData(data: Uint8Array, options: ExtractOptions = {}): GameData {
  const gameData = createGameData();
  const root = new WireDecoder(data);

  while (root.bytesRemaining() > 0) {
    const field = root.readField();
    if (field.field !== RootField.ItemTemplate || !isBytes(field)) continue;

    readTemplate(field, gameData, options);
  }

  if (DBG) {
    console.log('[DECODE] done', {
      creatures: gameData.creatures.size,
      abilities: gameData.abilities.size,
      types: gameData.types.size,
      dropped: gameData.dropped.length,
    });
  }

  return gameData;
}

function readTemplate(template: WireValue, gameData: GameData, options: ExtractOptions): void {
  let name: WireValue | undefined;
  const details = new Map<number, WireValue>();

  try {
    const decoder = WireDecoder.of(template);
    while (decoder.bytesRemaining() > 0) {
      const field = decoder.readField();
      switch (field.field) {
        case TemplateField.TemplateId:
          name = field;
          break;
        case TemplateField.CreatureSettings:
        case TemplateField.AbilitySettings:
        case TemplateField.TypeEffectiveness:
          details.set(field.field, field);
          break;
      }
    }
  } catch (error) {
    dropRecord(gameData, '<unnamed>', error);
    return;
  }

  const templateId = name ? textOf(name) : undefined;
  if (templateId === undefined) return;

  const classified = classifyTemplate(templateId);
  if (!classified) return;

  try {
    switch (classified.kind) {
      case 'creature': {
        const settings = details.get(TemplateField.CreatureSettings);
        if (!isBytes(settings) || classified.id === undefined) return;
        if (options.excluded?.has(classified.name)) return;

        const creature = readCreature(settings, classified.id, classified.name);
        if (!creature) {
          gameData.dropped.push({ name: templateId, reason: 'no type declared' });
          return;
        }
        gameData.creatures.set(creature.id, creature);
        gameData.creatureIdsByName.set(creature.name, creature.id);
        break;
      }
      case 'ability': {
        const settings = details.get(TemplateField.AbilitySettings);
        if (!isBytes(settings) || classified.id === undefined) return;

        const ability = readAbility(settings, classified.id, classified.name);
        gameData.abilities.set(ability.id, ability);
        gameData.abilityIdsByName.set(ability.name, ability.id);
        break;
      }
      case 'type': {
        const settings = details.get(TemplateField.TypeEffectiveness);
        if (!isBytes(settings)) return;

        const entry = readType(settings);
        if (entry.id === undefined) {
          gameData.dropped.push({ name: templateId, reason: 'no type id' });
          return;
        }
        gameData.types.set(entry.id, { id: entry.id, name: classified.name });
        gameData.typeChart.setRow(entry.id, entry.multipliers);
        break;
      }
    }
  } catch (error) {
    dropRecord(gameData, templateId, error);
  }
}

function dropRecord(gameData: GameData, name: string, error: unknown): void {
  if (!(error instanceof DecodeError)) throw error;

  if (DBG) console.log(`[DECODE] dropped ${name}: ${error.message}`);
  gameData.dropped.push({ name, reason: error.message });
}

/**
 * Packed run of varints, read until the payload is exhausted.
 */
function readPackedVarints(value: WireValue): number[] {
  const decoder = WireDecoder.of(value);
  const values: number[] = [];
  while (decoder.bytesRemaining() > 0) {
    values.push(Number(decoder.readVarInt()));
  }
  return values;
}

function readPackedFloats(value: WireValue): number[] {
  const decoder = WireDecoder.of(value);
  const values: number[] = [];
  while (decoder.bytesRemaining() > 0) {
    const bytes = decoder.readFixed(4);
    values.push(new DataView(bytes.buffer, bytes.byteOffset, 4).getFloat32(0, true));
  }
  return values;
}

function readCreature(settings: WireValue, id: number, name: string): Creature | null {
  const decoder = WireDecoder.of(settings);
  const types: number[] = [];
  const stats = { attack: 0, defense: 0, stamina: 0 };
  let fastAbilityIds: number[] = [];
  let chargedAbilityIds: number[] = [];

  while (decoder.bytesRemaining() > 0) {
    const field = decoder.readField();

    switch (field.field) {
      case CreatureField.PrimaryType:
      case CreatureField.SecondaryType: {
        const type = unsignedOf(field);
        if (type !== undefined) types.push(type);
        break;
      }
      case CreatureField.Stats: {
        if (!isBytes(field)) break;
        const statsDecoder = WireDecoder.of(field);
        while (statsDecoder.bytesRemaining() > 0) {
          const stat = statsDecoder.readField();
          if (stat.kind !== 'varint') continue;

          const value = Number(stat.value);
          switch (stat.field) {
            case StatsField.Stamina: stats.stamina = value; break;
            case StatsField.Attack: stats.attack = value; break;
            case StatsField.Defense: stats.defense = value; break;
          }
        }
        break;
      }
      case CreatureField.FastAbilities:
        if (isBytes(field)) fastAbilityIds = readPackedVarints(field);
        break;
      case CreatureField.ChargedAbilities:
        if (isBytes(field)) chargedAbilityIds = readPackedVarints(field);
        break;
    }
  }

  if (types.length === 0) return null;
  const pair: [number, number] = [types[0], types.length > 1 ? types[1] : types[0]];

  if (DBG) {
    console.log(`[DECODE] creature #${id} ${name}`, { stats, types: pair, fastAbilityIds, chargedAbilityIds });
  }

  return {
    id,
    name,
    stats,
    types: pair,
    fastAbilityIds,
    chargedAbilityIds,
    standardFastCount: fastAbilityIds.length,
    standardChargedCount: chargedAbilityIds.length,
    maxCp: maxCombatPower(stats),
    tankiness: tankiness(stats),
    strength: strength(stats),
  };
}

function readAbility(settings: WireValue, id: number, name: string): Ability {
  const decoder = WireDecoder.of(settings);
  const ability: Ability = { id, name, type: 0, power: 0, duration: 0, energyDelta: 0 };

  while (decoder.bytesRemaining() > 0) {
    const field = decoder.readField();

    switch (field.field) {
      case AbilityField.Type:
        ability.type = unsignedOf(field) ?? ability.type;
        break;
      case AbilityField.Power:
        ability.power = float32Of(field) ?? ability.power;
        break;
      case AbilityField.DurationMs: {
        const ms = unsignedOf(field);
        if (ms !== undefined) ability.duration = ms / 1000;
        break;
      }
      case AbilityField.Energy:
        ability.energyDelta = signedOf(field) ?? ability.energyDelta;
        break;
    }
  }

  if (DBG) console.log(`[DECODE] ability #${id} ${name}`, ability);

  return ability;
}

function readType(settings: WireValue): { id?: number; multipliers: number[] } {
  const decoder = WireDecoder.of(settings);
  let id: number | undefined;
  let multipliers: number[] = [];

  while (decoder.bytesRemaining() > 0) {
    const field = decoder.readField();

    switch (field.field) {
      case TypeField.AttackScalar:
        if (isBytes(field)) multipliers = readPackedFloats(field);
        break;
      case TypeField.Id:
        id = unsignedOf(field) ?? id;
        break;
    }
  }

  return { id, multipliers };
}
