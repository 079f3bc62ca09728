/**
 * Tag/length/value wire decoder.
 *
 * Reads the general-purpose binary serialization the game master is written
 * in, without a schema. Field keys are varints: `field = key >> 3`,
 * `wireType = key & 7`. Only wire types 0, 1, 2 and 5 are understood.
 */

import type { BytesValue, DecodeErrorCode, WireValue } from './types';
import { WireType } from './types';

const MAX_VARINT_BYTES = 10;

export class DecodeError extends Error {
  readonly code: DecodeErrorCode;
  readonly offset: number;

  constructor(code: DecodeErrorCode, message: string, offset: number) {
    super(`${message} at position ${offset}`);
    this.name = 'DecodeError';
    this.code = code;
    this.offset = offset;
  }
}

/**
 * Cursor over an immutable byte buffer.
 */
export class WireDecoder {
  private readonly bytes: Uint8Array;
  private pos: number = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Decoder over the payload of a length-delimited value.
   */
  static of(value: WireValue): WireDecoder {
    if (value.kind !== 'bytes') {
      throw new DecodeError(
        'INVALID_ARGUMENT',
        `Field ${value.field} is not a length-delimited message (wire type ${value.wireType})`,
        0,
      );
    }
    return new WireDecoder(value.bytes);
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.length;
  }

  bytesRemaining(): number {
    return this.bytes.length - this.pos;
  }

  private readByte(): number {
    if (this.pos >= this.bytes.length) {
      throw new DecodeError('BUFFER_OVERFLOW', 'Buffer overflow', this.pos);
    }
    return this.bytes[this.pos++];
  }

  // Stops after ten bytes even when the continuation bit is still set.
  readVarInt(): bigint {
    let result = 0n;

    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      const byte = this.readByte();
      result |= BigInt(byte & 0x7f) << BigInt(7 * i);
      if (!(byte & 0x80)) break;
    }

    return BigInt.asUintN(64, result);
  }

  /**
   * Read exactly `count` bytes as a view into the buffer.
   */
  readFixed(count: number): Uint8Array {
    if (count > this.bytesRemaining()) {
      throw new DecodeError(
        'BUFFER_OVERFLOW',
        `Buffer overflow reading ${count} bytes`,
        this.pos,
      );
    }
    const view = this.bytes.subarray(this.pos, this.pos + count);
    this.pos += count;
    return view;
  }

  readField(): WireValue {
    const start = this.pos;
    const key = this.readVarInt();
    const field = Number(key >> 3n);
    const wireType = Number(key & 7n);

    switch (wireType) {
      case WireType.Varint:
        return { kind: 'varint', field, wireType: WireType.Varint, value: this.readVarInt() };
      case WireType.Fixed64:
        return { kind: 'fixed64', field, wireType: WireType.Fixed64, bytes: this.readFixed(8) };
      case WireType.LengthDelimited: {
        const length = this.readVarInt();
        if (length > BigInt(this.bytesRemaining())) {
          throw new DecodeError(
            'INVALID_MESSAGE',
            `Invalid message: field ${field} declares ${length} bytes, ${this.bytesRemaining()} left`,
            start,
          );
        }
        return { kind: 'bytes', field, wireType: WireType.LengthDelimited, bytes: this.readFixed(Number(length)) };
      }
      case WireType.Fixed32:
        return { kind: 'fixed32', field, wireType: WireType.Fixed32, bytes: this.readFixed(4) };
      default:
        throw new DecodeError(
          'UNSUPPORTED_WIRE_TYPE',
          `Unsupported wire type ${wireType} for field ${field}`,
          start,
        );
    }
  }
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Little-endian IEEE-754 single from a 32-bit fixed value. */
export function float32Of(value: WireValue): number | undefined {
  if (value.kind !== 'fixed32') return undefined;
  return viewOf(value.bytes).getFloat32(0, true);
}

export function unsignedOf(value: WireValue): number | undefined {
  if (value.kind !== 'varint') return undefined;
  return Number(value.value);
}

/** Varint reinterpreted as a two's complement 64-bit integer. */
export function signedOf(value: WireValue): number | undefined {
  if (value.kind !== 'varint') return undefined;
  return Number(BigInt.asIntN(64, value.value));
}

const textDecoder = new TextDecoder('utf-8');

export function textOf(value: WireValue): string | undefined {
  if (value.kind !== 'bytes') return undefined;
  return textDecoder.decode(value.bytes);
}

export function isBytes(value: WireValue | undefined): value is BytesValue {
  return value?.kind === 'bytes';
}
