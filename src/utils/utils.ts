// src/utils/utils.ts

import { ModbusAbortedError } from '../errors.js';

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a big-endian 16-bit unsigned integer.
 * @param buf - source bytes
 * @param offset - position of the high byte
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return (buf[offset]! << 8) | buf[offset + 1]!;
}

/**
 * Returns a view on a slice of the input array (shares the buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Converts a Uint8Array to a lowercase hex string (lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @param separator - Placed between bytes.
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  const parts: string[] = [];
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i]!;
    parts.push(HEX_TABLE[(b >> 4) & 0xf]! + HEX_TABLE[b & 0xf]!);
  }
  return parts.join(separator);
}

/**
 * Formats a duration in milliseconds as seconds with two decimals, e.g. `0.25s`.
 */
export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Throws ModbusAbortedError when the signal has fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new ModbusAbortedError();
}

/**
 * Waits `ms` milliseconds; rejects with ModbusAbortedError if the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ModbusAbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new ModbusAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
