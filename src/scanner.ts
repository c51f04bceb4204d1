// src/scanner.ts

import { DEFAULTS, ResolvedScannerOptions, resolveScannerOptions, ScannerOptions, ConnectionConfig } from './config.js';
import { ModbusConfigError } from './errors.js';
import { ModbusFramer } from './framers/modbus-framer.js';
import { engineLogger } from './logger.js';
import { ScanOrchestrator } from './scan-orchestrator.js';
import { TransactionRunner } from './transaction-runner.js';
import { createConnection } from './transport/factory.js';
import {
  LogLevel,
  LogLineHandler,
  Outcome,
  OutcomeHandler,
  RegisterType,
  ScanResult,
  Transport,
  UnitStats,
} from './types/modbus-types.js';
import Diagnostics, { DiagnosticsSummary } from './utils/diagnostics.js';
import { DecodedEntry, decodeValues, isValueFormat, ValueFormat } from './value-decoder.js';

const logger = engineLogger.createLogger('ModbusScanner');

export interface ScanDevicesParams {
  startUnitId: number;
  endUnitId: number;
  timeout?: number;
  retries?: number;
  concurrency?: number;
  /** Register probed on every unit */
  address?: number;
  count?: number;
  registerType?: RegisterType;
  signal?: AbortSignal;
  onOutcome?: OutcomeHandler;
  onLog?: LogLineHandler;
}

export interface ReadRegisterParams {
  unitId: number;
  registerType: RegisterType;
  address: number;
  count: number;
  formats: readonly ValueFormat[];
  timeout?: number;
  retries?: number;
  signal?: AbortSignal;
  onLog?: LogLineHandler;
}

export interface ReadRegisterResult {
  outcome: Outcome;
  /** Present only for a successful read */
  values?: DecodedEntry[];
}

/**
 * Discovers Modbus units on a bus and reads registers from them.
 *
 * The transport is opened and closed by the caller; the scanner only does
 * transactions over it.
 */
class ModbusScanner {
  private readonly options: ResolvedScannerOptions;
  private readonly runner: TransactionRunner;
  private readonly orchestrator: ScanOrchestrator;
  private readonly diagnostics: Diagnostics = new Diagnostics();

  constructor(
    public readonly transport: Transport,
    public readonly framer: ModbusFramer,
    options: ScannerOptions = {}
  ) {
    this.options = resolveScannerOptions(options);
    this.runner = new TransactionRunner(transport, framer, {
      gatewayExceptionCodes: this.options.gatewayExceptionCodes,
      retryDelay: this.options.retryDelay,
    });
    this.orchestrator = new ScanOrchestrator(this.runner);
  }

  /**
   * Builds the transport and framer for `config`; the transport is not opened.
   */
  static async fromConfig(config: ConnectionConfig, options: ScannerOptions = {}): Promise<ModbusScanner> {
    const { transport, framer } = await createConnection(config);
    return new ModbusScanner(transport, framer, options);
  }

  /**
   * Enables the engine logger at the given level.
   */
  enableLogger(level: LogLevel = 'info'): void {
    engineLogger.setLevel(level);
  }

  /**
   * Disables the engine logger (sets the highest level - error)
   */
  disableLogger(): void {
    engineLogger.setLevel('error');
  }

  /**
   * Probes every unit id in `[startUnitId, endUnitId]` and classifies it.
   */
  async scanDevices(params: ScanDevicesParams): Promise<ScanResult> {
    const { onOutcome } = params;
    const template = {
      registerType: params.registerType ?? DEFAULTS.registerType,
      address: params.address ?? DEFAULTS.address,
      count: params.count ?? DEFAULTS.count,
      timeout: params.timeout ?? this.options.timeout,
      maxRetries: params.retries ?? this.options.retries,
    };

    logger.info(`Scan requested for units ${params.startUnitId}-${params.endUnitId}`);

    return this.orchestrator.scan(
      params.startUnitId,
      params.endUnitId,
      template,
      params.concurrency ?? this.options.concurrency,
      {
        signal: params.signal,
        onLog: params.onLog,
        onOutcome: (unitId, outcome) => {
          this.diagnostics.recordOutcome(unitId, outcome);
          onOutcome?.(unitId, outcome);
        },
      }
    );
  }

  /**
   * Reads `count` registers from one unit and decodes them in every format
   * asked for.
   */
  async readRegister(params: ReadRegisterParams): Promise<ReadRegisterResult> {
    for (const format of params.formats) {
      if (!isValueFormat(format)) {
        throw new ModbusConfigError(`Unknown value format: ${String(format)}`);
      }
    }

    const outcome = await this.runner.execute(
      {
        unitId: params.unitId,
        registerType: params.registerType,
        address: params.address,
        count: params.count,
        timeout: params.timeout ?? this.options.timeout,
        maxRetries: params.retries ?? this.options.retries,
      },
      { signal: params.signal, onLog: params.onLog }
    );
    this.diagnostics.recordOutcome(params.unitId, outcome);

    if (outcome.kind !== 'success') return { outcome };
    return { outcome, values: decodeValues(outcome.rawBytes, params.formats) };
  }

  /**
   * Success / failure counters for one unit, over every scan and read so far.
   */
  getStats(unitId: number): UnitStats {
    return this.diagnostics.getUnitStats(unitId);
  }

  getDiagnostics(): DiagnosticsSummary {
    return this.diagnostics.getSummary();
  }

  resetStats(): void {
    this.diagnostics.reset();
  }
}

export default ModbusScanner;
