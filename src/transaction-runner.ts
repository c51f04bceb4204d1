// src/transaction-runner.ts

import { Mutex } from 'async-mutex';
import { DEFAULT_GATEWAY_EXCEPTION_CODES, exceptionMessage, UNIT_ID_MAX, UNIT_ID_MIN } from './constants/constants.js';
import {
  ModbusAbortedError,
  ModbusConfigError,
  ModbusInvalidAddressError,
  ModbusTimeoutError,
  ModbusTransportError,
} from './errors.js';
import { AnsweredFrame, ModbusFramer, ResponseExpectation } from './framers/modbus-framer.js';
import { bytesToRegisters } from './function-codes/read-registers.js';
import { engineLogger } from './logger.js';
import { ResponseRouter } from './transport/response-router.js';
import { LogLineHandler, Outcome, ReadRequest, Transport } from './types/modbus-types.js';
import { concatUint8Arrays, formatSeconds, sleep, throwIfAborted } from './utils/utils.js';

const logger = engineLogger.createLogger('TransactionRunner');

export interface TransactionRunnerOptions {
  /** Exception codes reported as `gateway-error`; all others are `device-error` */
  gatewayExceptionCodes?: readonly number[];
  /** Pause between a timed-out attempt and the next one (ms) */
  retryDelay?: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  onLog?: LogLineHandler;
}

type AttemptResult =
  | { kind: 'answered'; frame: AnsweredFrame; responseTime: number }
  | { kind: 'timeout'; waited: number };

/**
 * Validates a request before any I/O is done for it. Address and count are
 * checked again when the PDU is built.
 */
export function validateReadRequest(request: ReadRequest): void {
  if (!Number.isInteger(request.unitId) || request.unitId < UNIT_ID_MIN || request.unitId > UNIT_ID_MAX) {
    throw new ModbusInvalidAddressError(request.unitId, UNIT_ID_MIN, UNIT_ID_MAX);
  }
  if (!Number.isFinite(request.timeout) || request.timeout <= 0) {
    throw new ModbusConfigError(`Invalid timeout: ${request.timeout}. Must be a positive number of ms.`);
  }
  if (!Number.isInteger(request.maxRetries) || request.maxRetries < 0) {
    throw new ModbusConfigError(`Invalid retries: ${request.maxRetries}. Must be a non-negative integer.`);
  }
}

/**
 * Runs read transactions over one transport: one request in, one Outcome out.
 *
 * With MBAP framing, requests to different units are outstanding at the same
 * time: writes are serialised and responses are matched by transaction id.
 * RTU lines are half-duplex, so there the wire lock gives each attempt
 * exclusive use of the transport (flush, write, read until a matching frame
 * or the timeout). The unit lock keeps the whole transaction for a unit,
 * retries included, from overlapping another transaction to the same unit.
 */
export class TransactionRunner {
  private readonly wireMutex: Mutex = new Mutex();
  private readonly router: ResponseRouter | null;
  private readonly unitMutexes: Map<number, Mutex> = new Map();
  private readonly gatewayExceptionCodes: ReadonlySet<number>;
  private readonly retryDelay: number;

  constructor(
    private readonly transport: Transport,
    private readonly framer: ModbusFramer,
    options: TransactionRunnerOptions = {}
  ) {
    this.gatewayExceptionCodes = new Set(options.gatewayExceptionCodes ?? DEFAULT_GATEWAY_EXCEPTION_CODES);
    this.retryDelay = options.retryDelay ?? 0;
    this.router = framer.variant === 'tcp' ? new ResponseRouter(transport, framer) : null;
    if (!Number.isFinite(this.retryDelay) || this.retryDelay < 0) {
      throw new ModbusConfigError(`Invalid retry delay: ${this.retryDelay}`);
    }
  }

  /**
   * Performs the request with its timeout and retry budget.
   *
   * Rejects with ModbusTransportError when the transport fails and with
   * ModbusAbortedError when `signal` fires; every other result is an Outcome.
   */
  async execute(request: ReadRequest, options: ExecuteOptions = {}): Promise<Outcome> {
    validateReadRequest(request);
    throwIfAborted(options.signal);
    return this._unitMutex(request.unitId).runExclusive(() => this._execute(request, options));
  }

  private _unitMutex(unitId: number): Mutex {
    let mutex = this.unitMutexes.get(unitId);
    if (!mutex) {
      mutex = new Mutex();
      this.unitMutexes.set(unitId, mutex);
    }
    return mutex;
  }

  private async _execute(request: ReadRequest, { signal, onLog }: ExecuteOptions): Promise<Outcome> {
    const { unitId } = request;
    const maxAttempts = 1 + request.maxRetries;
    const started = Date.now();
    const emit = (line: string): void => {
      logger.debug(line, { unitId });
      onLog?.(line);
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfAborted(signal);

      const result = await this._attempt(request, attempt, signal);
      if (result.kind === 'answered') {
        return this._classify(result.frame, attempt, result.responseTime, emit);
      }

      emit(`Unit ${unitId}: Attempt ${attempt}/${maxAttempts} timed out (${formatSeconds(result.waited)})`);
      if (attempt < maxAttempts && this.retryDelay > 0) {
        await sleep(this.retryDelay, signal);
      }
    }

    const elapsed = Date.now() - started;
    emit(`Unit ${unitId}: Error - Timeout (${formatSeconds(elapsed)})`);
    logger.info('No response', { unitId, attempt: maxAttempts, responseTime: elapsed });
    return { kind: 'no-response', attempts: maxAttempts, elapsed };
  }

  private _classify(
    frame: AnsweredFrame,
    attempts: number,
    responseTime: number,
    emit: (line: string) => void
  ): Outcome {
    const { unitId } = frame;

    if (frame.kind === 'response') {
      emit(`Unit ${unitId}: Response (${formatSeconds(responseTime)})`);
      logger.info('Response received', { unitId, funcCode: frame.functionCode, responseTime, attempt: attempts });
      return {
        kind: 'success',
        rawBytes: frame.data.slice(),
        registers: bytesToRegisters(frame.data),
        attempts,
        responseTime,
      };
    }

    const message = exceptionMessage(frame.exceptionCode);
    const context = { unitId, funcCode: frame.functionCode, exceptionCode: frame.exceptionCode, responseTime };

    if (this.gatewayExceptionCodes.has(frame.exceptionCode)) {
      emit(`Unit ${unitId}: Gateway error - ${message} (${formatSeconds(responseTime)})`);
      logger.warn('Gateway error', context);
      return { kind: 'gateway-error', code: frame.exceptionCode, message, attempts, responseTime };
    }

    emit(`Unit ${unitId}: Error - ${message} (${formatSeconds(responseTime)})`);
    logger.warn('Device exception', context);
    return { kind: 'device-error', exceptionCode: frame.exceptionCode, message, attempts, responseTime };
  }

  /**
   * One physical request. The timeout runs from the end of the write, so
   * time spent waiting to write does not count.
   */
  private async _attempt(request: ReadRequest, attempt: number, signal?: AbortSignal): Promise<AttemptResult> {
    const { frame, expectation } = this.framer.encodeRequest(request);
    const onSent = (): void => {
      logger.trace('Request sent', {
        unitId: request.unitId,
        funcCode: expectation.functionCode,
        address: request.address,
        quantity: request.count,
        attempt,
        transactionId: expectation.transactionId,
      });
    };

    const router = this.router;
    if (router) {
      const { answer, sentAt } = await this._transportCall(() =>
        router.exchange(frame, expectation, request.timeout, signal, onSent)
      );
      return this._attemptResult(answer, sentAt);
    }

    return this.wireMutex.runExclusive(async (): Promise<AttemptResult> => {
      throwIfAborted(signal);

      await this._transportCall(() => this.transport.flush());
      await this._transportCall(() => this.transport.write(frame));

      const sentAt = Date.now();
      onSent();

      const answer = await this._readMatching(expectation, sentAt + request.timeout, signal);
      return this._attemptResult(answer, sentAt);
    });
  }

  private _attemptResult(answer: AnsweredFrame | null, sentAt: number): AttemptResult {
    const now = Date.now();
    return answer
      ? { kind: 'answered', frame: answer, responseTime: now - sentAt }
      : { kind: 'timeout', waited: now - sentAt };
  }

  /**
   * Reads frames until one answers `expectation` or `deadline` passes
   * (resolves null). Frames that do not answer it are dropped.
   */
  private async _readMatching(
    expectation: ResponseExpectation,
    deadline: number,
    signal?: AbortSignal
  ): Promise<AnsweredFrame | null> {
    let buffer: Uint8Array = new Uint8Array(0);

    for (;;) {
      const needed = this.framer.frameLength(buffer) - buffer.length;

      if (needed > 0) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) return null;

        let chunk: Uint8Array;
        try {
          chunk = await this.transport.read(needed, remaining, signal);
        } catch (err: unknown) {
          if (err instanceof ModbusTimeoutError) return null;
          throw this._transportFailure(err);
        }
        buffer = concatUint8Arrays([buffer, chunk]);
        continue;
      }

      const parsed = this.framer.decodeResponse(buffer, expectation);
      buffer = new Uint8Array(0);

      if (parsed.kind === 'invalid') {
        logger.debug(`Discarding frame: ${parsed.reason.message}`, {
          unitId: expectation.unitId,
          transactionId: expectation.transactionId,
        });
        continue;
      }
      return parsed;
    }
  }

  private async _transportCall<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw this._transportFailure(err);
    }
  }

  private _transportFailure(err: unknown): Error {
    if (err instanceof ModbusAbortedError || err instanceof ModbusTransportError) return err;
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Transport failure: ${message}`);
    return new ModbusTransportError(`Transport failure: ${message}`, { cause: err });
  }
}
