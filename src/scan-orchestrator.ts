// src/scan-orchestrator.ts

import { UNIT_ID_MAX, UNIT_ID_MIN } from './constants/constants.js';
import { ModbusAbortedError, ModbusConfigError, ModbusInvalidAddressError } from './errors.js';
import { buildReadRegistersRequest, functionCodeFor } from './function-codes/read-registers.js';
import { engineLogger } from './logger.js';
import { TransactionRunner, validateReadRequest } from './transaction-runner.js';
import {
  LogLineHandler,
  Outcome,
  OutcomeHandler,
  ProbeTemplate,
  ScanResult,
} from './types/modbus-types.js';

const logger = engineLogger.createLogger('ScanOrchestrator');

export interface ScanOptions {
  signal?: AbortSignal;
  /** Called once per unit, as soon as its outcome is known */
  onOutcome?: OutcomeHandler;
  onLog?: LogLineHandler;
}

/**
 * Anything that answered, even with an exception, is a device.
 */
export function isDeviceFound(outcome: Outcome): boolean {
  return outcome.kind !== 'no-response';
}

export function foundUnitIds(result: ScanResult): number[] {
  const ids: number[] = [];
  for (const [unitId, outcome] of result.outcomes) {
    if (isDeviceFound(outcome)) ids.push(unitId);
  }
  return ids;
}

function validateUnitId(unitId: number): void {
  if (!Number.isInteger(unitId) || unitId < UNIT_ID_MIN || unitId > UNIT_ID_MAX) {
    throw new ModbusInvalidAddressError(unitId, UNIT_ID_MIN, UNIT_ID_MAX);
  }
}

/**
 * Probes a range of unit ids with a bounded number of concurrent workers.
 */
export class ScanOrchestrator {
  constructor(private readonly runner: TransactionRunner) {}

  async scan(
    startUnitId: number,
    endUnitId: number,
    template: ProbeTemplate,
    concurrencyLimit: number,
    { signal, onOutcome, onLog }: ScanOptions = {}
  ): Promise<ScanResult> {
    validateUnitId(startUnitId);
    validateUnitId(endUnitId);
    if (startUnitId > endUnitId) {
      throw new ModbusConfigError(`Invalid unit id range: ${startUnitId} > ${endUnitId}`);
    }
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new ModbusConfigError(`Invalid concurrency: ${concurrencyLimit}. Must be an integer >= 1.`);
    }
    validateReadRequest({ ...template, unitId: startUnitId });
    buildReadRegistersRequest(functionCodeFor(template.registerType), template.address, template.count);

    const rangeSize = endUnitId - startUnitId + 1;
    const workerCount = Math.min(concurrencyLimit, rangeSize);
    const started = Date.now();

    // Fires on caller cancellation and on a fatal error, stopping every worker
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    else signal?.addEventListener('abort', onAbort, { once: true });

    const completed = new Map<number, Outcome>();
    let nextUnitId = startUnitId;
    let fatal: unknown = null;

    logger.info(
      `Scanning units ${startUnitId}-${endUnitId} with ${workerCount} worker(s), timeout ${template.timeout}ms, retries ${template.maxRetries}`
    );

    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted && nextUnitId <= endUnitId) {
        const unitId = nextUnitId++;
        try {
          const outcome = await this.runner.execute(
            { ...template, unitId },
            { signal: controller.signal, onLog }
          );
          completed.set(unitId, outcome);
          onOutcome?.(unitId, outcome);
        } catch (err: unknown) {
          if (err instanceof ModbusAbortedError && controller.signal.aborted) return;
          if (fatal === null) fatal = err;
          controller.abort();
          return;
        }
      }
    };

    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (fatal !== null) {
      logger.error(`Scan aborted: ${fatal instanceof Error ? fatal.message : String(fatal)}`);
      throw fatal;
    }

    const outcomes = new Map<number, Outcome>();
    for (let unitId = startUnitId; unitId <= endUnitId; unitId++) {
      const outcome = completed.get(unitId);
      if (outcome) outcomes.set(unitId, outcome);
    }

    const result: ScanResult = {
      startUnitId,
      endUnitId,
      outcomes,
      complete: outcomes.size === rangeSize,
      duration: Date.now() - started,
    };

    logger.info(
      `Scan finished: ${foundUnitIds(result).length} device(s) found, ${outcomes.size}/${rangeSize} unit(s) classified${result.complete ? '' : ' (cancelled)'}`
    );
    return result;
  }
}
