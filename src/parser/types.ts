/**
 * Type definitions for game master data.
 * Covers the raw wire values and the records recovered from them.
 */

// Wire type constants from the tag/length/value encoding
export const WireType = {
  Varint: 0,
  Fixed64: 1,
  LengthDelimited: 2,
  StartGroup: 3,
  EndGroup: 4,
  Fixed32: 5,
} as const;

export type WireTypeId = (typeof WireType)[keyof typeof WireType];

// Raw wire values
export interface VarintValue {
  kind: 'varint';
  field: number;
  wireType: typeof WireType.Varint;
  value: bigint;
}

export interface Fixed64Value {
  kind: 'fixed64';
  field: number;
  wireType: typeof WireType.Fixed64;
  bytes: Uint8Array;
}

/** Length-delimited payload; `bytes` is a view into the parent buffer. */
export interface BytesValue {
  kind: 'bytes';
  field: number;
  wireType: typeof WireType.LengthDelimited;
  bytes: Uint8Array;
}

export interface Fixed32Value {
  kind: 'fixed32';
  field: number;
  wireType: typeof WireType.Fixed32;
  bytes: Uint8Array;
}

export type WireValue = VarintValue | Fixed64Value | BytesValue | Fixed32Value;

export type DecodeErrorCode =
  | 'BUFFER_OVERFLOW'
  | 'INVALID_MESSAGE'
  | 'UNSUPPORTED_WIRE_TYPE'
  | 'INVALID_ARGUMENT';

// Domain records
export interface BaseStats {
  attack: number;
  defense: number;
  stamina: number;
}

export interface Creature {
  id: number;
  name: string;
  stats: BaseStats;
  /** Always two entries; a single-typed creature repeats its type. */
  types: [number, number];
  fastAbilityIds: number[];
  chargedAbilityIds: number[];
  // Movepool sizes as decoded, before legacy moves are appended
  standardFastCount: number;
  standardChargedCount: number;

  maxCp: number;
  tankiness: number;
  strength: number;
}

export interface Ability {
  id: number;
  name: string;
  type: number;
  power: number;
  /** Seconds */
  duration: number;
  /** Positive for fast abilities, zero or negative for charged ones. */
  energyDelta: number;
}

export interface TypeInfo {
  id: number;
  name: string;
}

export interface DroppedRecord {
  name: string;
  reason: string;
}

export type TemplateKind = 'creature' | 'ability' | 'type';

export interface TemplateName {
  kind: TemplateKind;
  /** Numeric id carried by the name, if the name has one. */
  id?: number;
  name: string;
}
