/**
 * Template name classification.
 *
 * Item templates are named `V0001_POKEMON_BULBASAUR`, `V0013_MOVE_WRAP`,
 * `POKEMON_TYPE_GRASS` and so on. Anything else is outside the analysis.
 */

import type { TemplateName } from './types';

const CREATURE_PATTERN = /^V(\d+)_POKEMON_(.*)$/;
const ABILITY_PATTERN = /^V(\d+)_MOVE_(.*)$/;
const TYPE_PATTERN = /^POKEMON_TYPE_(.*)$/;

export function classifyTemplate(templateId: string): TemplateName | null {
  let match = CREATURE_PATTERN.exec(templateId);
  if (match) {
    return { kind: 'creature', id: parseInt(match[1], 10), name: match[2] };
  }

  match = ABILITY_PATTERN.exec(templateId);
  if (match) {
    return { kind: 'ability', id: parseInt(match[1], 10), name: match[2] };
  }

  match = TYPE_PATTERN.exec(templateId);
  if (match) {
    return { kind: 'type', name: match[1] };
  }

  return null;
}
