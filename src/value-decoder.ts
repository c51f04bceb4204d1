// src/value-decoder.ts

import { ModbusInsufficientDataError } from './errors.js';
import { toHex } from './utils/utils.js';

export const VALUE_FORMATS = [
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int32_sw',
  'float16',
  'float32',
  'float32_sw',
  'hex',
  'string',
] as const;

export type ValueFormat = (typeof VALUE_FORMATS)[number];

export type DecodedEntry =
  | { format: ValueFormat; ok: true; value: number | string }
  | { format: ValueFormat; ok: false; error: ModbusInsufficientDataError };

const REQUIRED_BYTES: Record<ValueFormat, number> = {
  int16: 2,
  uint16: 2,
  float16: 2,
  int32: 4,
  uint32: 4,
  int32_sw: 4,
  float32: 4,
  float32_sw: 4,
  hex: 1,
  string: 1,
};

export function isValueFormat(value: string): value is ValueFormat {
  return (VALUE_FORMATS as readonly string[]).includes(value);
}

function view(bytes: Uint8Array, length: number): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, length);
}

/**
 * Swaps the two 16-bit words of a 4-byte window (low word first on the wire).
 */
function swapWords(bytes: Uint8Array): Uint8Array {
  return new Uint8Array([bytes[2]!, bytes[3]!, bytes[0]!, bytes[1]!]);
}

/**
 * IEEE-754 half precision, big-endian.
 */
function decodeFloat16(bytes: Uint8Array): number {
  const bits = (bytes[0]! << 8) | bytes[1]!;
  const sign = bits & 0x8000 ? -1 : 1;
  const exponent = (bits >> 10) & 0x1f;
  const fraction = bits & 0x3ff;

  if (exponent === 0) return sign * 2 ** -14 * (fraction / 1024);
  if (exponent === 0x1f) return fraction ? NaN : sign * Infinity;
  return sign * 2 ** (exponent - 15) * (1 + fraction / 1024);
}

function decodeLatin1(bytes: Uint8Array): string {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) end--;
  let text = '';
  for (let i = 0; i < end; i++) text += String.fromCharCode(bytes[i]!);
  return text;
}

/**
 * Decodes the leading bytes of `bytes` in one format.
 * Throws ModbusInsufficientDataError when the window is too short.
 */
export function decodeValue(bytes: Uint8Array, format: ValueFormat): number | string {
  const required = REQUIRED_BYTES[format];
  if (bytes.length < required) {
    throw new ModbusInsufficientDataError(bytes.length, required);
  }

  switch (format) {
    case 'int16':
      return view(bytes, 2).getInt16(0, false);
    case 'uint16':
      return view(bytes, 2).getUint16(0, false);
    case 'int32':
      return view(bytes, 4).getInt32(0, false);
    case 'uint32':
      return view(bytes, 4).getUint32(0, false);
    case 'int32_sw':
      return view(swapWords(bytes), 4).getInt32(0, false);
    case 'float16':
      return decodeFloat16(bytes);
    case 'float32':
      return view(bytes, 4).getFloat32(0, false);
    case 'float32_sw':
      return view(swapWords(bytes), 4).getFloat32(0, false);
    case 'hex':
      return `0x${toHex(bytes).toUpperCase()}`;
    case 'string':
      return decodeLatin1(bytes);
  }
}

/**
 * Decodes `rawBytes` in every requested format, in request order. A window too
 * short for one format fails that entry only.
 */
export function decodeValues(rawBytes: Uint8Array, formats: readonly ValueFormat[]): DecodedEntry[] {
  return formats.map((format): DecodedEntry => {
    try {
      return { format, ok: true, value: decodeValue(rawBytes, format) };
    } catch (err: unknown) {
      if (err instanceof ModbusInsufficientDataError) {
        return { format, ok: false, error: err };
      }
      throw err;
    }
  });
}

export { bytesToRegisters, registersToBytes } from './function-codes/read-registers.js';
