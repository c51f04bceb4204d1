// src/transport/read-buffer.ts

import { ModbusAbortedError, ModbusTimeoutError, ModbusTransportError } from '../errors.js';
import { concatUint8Arrays } from '../utils/utils.js';

interface PendingRead {
  check(): boolean;
  fail(err: Error): void;
}

/**
 * Receive buffer shared by the transports. Incoming chunks are appended with
 * `push`; a single outstanding `read` resolves as soon as enough bytes arrived.
 */
export class ReadBuffer {
  private buffer: Uint8Array = new Uint8Array(0);
  private pending: PendingRead | null = null;

  constructor(private readonly maxSize: number) {}

  public get length(): number {
    return this.buffer.length;
  }

  /**
   * Appends a chunk. Returns false when the chunk would overflow the buffer;
   * everything buffered is then dropped.
   */
  public push(chunk: Uint8Array): boolean {
    if (this.buffer.length + chunk.length > this.maxSize) {
      this.buffer = new Uint8Array(0);
      return false;
    }
    this.buffer = concatUint8Arrays([this.buffer, chunk]);
    this.pending?.check();
    return true;
  }

  public clear(): void {
    this.buffer = new Uint8Array(0);
  }

  /**
   * Rejects the outstanding read, if any (connection lost).
   */
  public fail(err: Error): void {
    this.pending?.fail(err);
  }

  public read(length: number, timeout: number, signal?: AbortSignal): Promise<Uint8Array> {
    return new Promise<Uint8Array>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ModbusAbortedError());
        return;
      }
      if (this.pending) {
        reject(new ModbusTransportError('A read is already in progress'));
        return;
      }

      let timer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        clearTimeout(timer);
        this.pending = null;
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = (): void => {
        cleanup();
        reject(new ModbusAbortedError());
      };

      const check = (): boolean => {
        if (this.buffer.length < length) return false;
        const data = this.buffer.slice(0, length);
        this.buffer = this.buffer.slice(length);
        cleanup();
        resolve(data);
        return true;
      };

      if (check()) return;

      this.pending = {
        check,
        fail: (err: Error) => {
          cleanup();
          reject(err);
        },
      };
      timer = setTimeout(() => {
        cleanup();
        reject(new ModbusTimeoutError(`Read of ${length} bytes timed out after ${timeout}ms`));
      }, timeout);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
