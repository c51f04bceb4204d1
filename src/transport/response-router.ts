// src/transport/response-router.ts

import { Mutex } from 'async-mutex';
import { engineLogger } from '../logger.js';
import {
  ModbusAbortedError,
  ModbusConfigError,
  ModbusError,
  ModbusTimeoutError,
  ModbusTransportError,
} from '../errors.js';
import { AnsweredFrame, ModbusFramer, ResponseExpectation } from '../framers/modbus-framer.js';
import { Transport } from '../types/modbus-types.js';
import { concatUint8Arrays, throwIfAborted } from '../utils/utils.js';

const logger = engineLogger.createLogger('ResponseRouter');

/** How long the reader waits for bytes before polling again (ms) */
const READER_POLL_INTERVAL = 1000;

type PendingResult = { kind: 'answer'; frame: AnsweredFrame } | { kind: 'failure'; error: Error };

interface PendingRequest {
  readonly expectation: ResponseExpectation;
  result: PendingResult | null;
  notify: (() => void) | null;
}

export interface Exchange {
  /** null when nothing answered before the timeout */
  answer: AnsweredFrame | null;
  sentAt: number;
}

/**
 * Lets several MBAP requests be outstanding on one transport.
 *
 * Writes are serialised; a single reader takes every incoming frame and hands
 * it to the outstanding request with the same transaction id. Frames that
 * match no outstanding request are dropped. The reader runs only while at
 * least one request is outstanding.
 */
export class ResponseRouter {
  private readonly writeMutex: Mutex = new Mutex();
  private readonly pending: Map<number, PendingRequest> = new Map();
  private reading: Promise<void> | null = null;
  private readerAbort: AbortController | null = null;

  constructor(
    private readonly transport: Transport,
    private readonly framer: ModbusFramer
  ) {}

  /** Number of requests waiting for their response */
  get outstanding(): number {
    return this.pending.size;
  }

  /**
   * Writes `frame` and waits up to `timeout` ms, counted from the end of the
   * write, for the response carrying the same transaction id.
   *
   * Rejects with ModbusAbortedError when `signal` fires and with the
   * transport's error when writing or reading fails.
   */
  async exchange(
    frame: Uint8Array,
    expectation: ResponseExpectation,
    timeout: number,
    signal?: AbortSignal,
    onSent?: () => void
  ): Promise<Exchange> {
    const { transactionId } = expectation;
    if (transactionId === undefined) {
      throw new ModbusConfigError('Response routing needs a transaction id');
    }
    if (this.pending.has(transactionId)) {
      throw new ModbusTransportError(`Transaction id ${transactionId} is already outstanding`);
    }
    throwIfAborted(signal);

    const entry: PendingRequest = { expectation, result: null, notify: null };
    this.pending.set(transactionId, entry);

    try {
      await this.writeMutex.runExclusive(async (): Promise<void> => {
        throwIfAborted(signal);
        if (this.reading === null) {
          // Nothing is outstanding: whatever is buffered is stale
          await this.transport.flush();
          this._startReader();
        }
        await this.transport.write(frame);
      });
      const sentAt = Date.now();
      onSent?.();

      const answer = await this._wait(entry, timeout, signal);
      return { answer, sentAt };
    } finally {
      if (this.pending.get(transactionId) === entry) this.pending.delete(transactionId);
      this._stopIfIdle();
    }
  }

  private _wait(entry: PendingRequest, timeout: number, signal?: AbortSignal): Promise<AnsweredFrame | null> {
    return new Promise<AnsweredFrame | null>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        clearTimeout(timer);
        entry.notify = null;
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = (): void => {
        cleanup();
        reject(new ModbusAbortedError());
      };

      const settle = (): boolean => {
        const { result } = entry;
        if (!result) return false;
        cleanup();
        if (result.kind === 'answer') resolve(result.frame);
        else reject(result.error);
        return true;
      };

      if (settle()) return;
      if (signal?.aborted) {
        reject(new ModbusAbortedError());
        return;
      }

      entry.notify = () => {
        settle();
      };
      timer = setTimeout(() => {
        cleanup();
        resolve(null);
      }, timeout);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private _startReader(): void {
    const controller = new AbortController();
    this.readerAbort = controller;
    this.reading = this._readLoop(controller.signal);
  }

  private _stopIfIdle(): void {
    if (this.pending.size > 0 || !this.readerAbort) return;
    this.readerAbort.abort();
    this.readerAbort = null;
    this.reading = null;
  }

  /**
   * Reads frames until stopped. Never rejects: a transport failure is handed
   * to every outstanding request.
   */
  private async _readLoop(signal: AbortSignal): Promise<void> {
    let buffer: Uint8Array = new Uint8Array(0);

    try {
      while (!signal.aborted) {
        const needed = this.framer.frameLength(buffer) - buffer.length;
        if (needed > 0) {
          try {
            const chunk = await this.transport.read(needed, READER_POLL_INTERVAL, signal);
            buffer = concatUint8Arrays([buffer, chunk]);
          } catch (err: unknown) {
            if (!(err instanceof ModbusTimeoutError)) throw err;
          }
          continue;
        }

        this._dispatch(buffer);
        buffer = new Uint8Array(0);
      }
    } catch (err: unknown) {
      // A stopped reader leaves the requests of its successor alone
      if (signal.aborted) return;
      this._failAll(err);
    }
  }

  private _dispatch(frame: Uint8Array): void {
    let transactionId: number | undefined;
    try {
      transactionId = this.framer.parseAdu(frame).transactionId;
    } catch (err: unknown) {
      if (!(err instanceof ModbusError)) throw err;
      logger.debug(`Discarding frame: ${err.message}`);
      return;
    }

    const entry = transactionId === undefined ? undefined : this.pending.get(transactionId);
    if (transactionId === undefined || !entry) {
      logger.debug(`Discarding frame: no outstanding request with transaction id ${transactionId}`, {
        transactionId,
      });
      return;
    }

    const parsed = this.framer.decodeResponse(frame, entry.expectation);
    if (parsed.kind === 'invalid') {
      logger.debug(`Discarding frame: ${parsed.reason.message}`, {
        unitId: entry.expectation.unitId,
        transactionId,
      });
      return;
    }

    this.pending.delete(transactionId);
    entry.result = { kind: 'answer', frame: parsed };
    entry.notify?.();
  }

  private _failAll(err: unknown): void {
    const error = err instanceof Error ? err : new ModbusTransportError(String(err));
    logger.error(`Reader stopped: ${error.message}`);

    const entries = [...this.pending.values()];
    this.pending.clear();
    this.readerAbort = null;
    this.reading = null;
    for (const entry of entries) {
      entry.result = { kind: 'failure', error };
      entry.notify?.();
    }
  }
}
