// src/config.ts

import { DEFAULT_GATEWAY_EXCEPTION_CODES } from './constants/constants.js';
import { ModbusConfigError } from './errors.js';
import { SerialParity } from './types/modbus-types.js';

export const DEFAULTS = {
  timeout: 3000,
  retries: 1,
  concurrency: 1,
  retryDelay: 0,
  address: 0,
  count: 1,
  registerType: 'holding',
  tcpPort: 502,
  connectTimeout: 5000,
  baudRate: 9600,
  dataBits: 8,
  parity: 'none',
  stopBits: 1,
} as const;

export interface ScannerOptions {
  /** Per-attempt response timeout (ms) */
  timeout?: number;
  retries?: number;
  /** Maximum number of units probed at the same time during a scan */
  concurrency?: number;
  retryDelay?: number;
  /** Exception codes treated as gateway errors (default 0x0A, 0x0B) */
  gatewayExceptionCodes?: readonly number[];
}

export type ResolvedScannerOptions = Required<ScannerOptions>;

export interface TcpConnectionConfig {
  type: 'tcp';
  host: string;
  port?: number;
  /** RTU frames (with CRC) over the TCP socket, as serial gateways speak */
  rtuOverTcp?: boolean;
  connectTimeout?: number;
}

export interface SerialConnectionConfig {
  type: 'serial';
  path: string;
  baudRate?: number;
  parity?: SerialParity;
  stopBits?: 1 | 2;
  dataBits?: 5 | 6 | 7 | 8;
}

export type ConnectionConfig = TcpConnectionConfig | SerialConnectionConfig;

export function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ModbusConfigError(`Invalid ${name}: ${value}. Must be a positive number.`);
  }
}

export function assertInteger(name: string, value: number, min: number, max: number = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ModbusConfigError(`Invalid ${name}: ${value}. Must be an integer between ${min}-${max}.`);
  }
}

export function resolveScannerOptions(options: ScannerOptions = {}): ResolvedScannerOptions {
  const resolved: ResolvedScannerOptions = {
    timeout: options.timeout ?? DEFAULTS.timeout,
    retries: options.retries ?? DEFAULTS.retries,
    concurrency: options.concurrency ?? DEFAULTS.concurrency,
    retryDelay: options.retryDelay ?? DEFAULTS.retryDelay,
    gatewayExceptionCodes: options.gatewayExceptionCodes ?? DEFAULT_GATEWAY_EXCEPTION_CODES,
  };

  assertPositive('timeout', resolved.timeout);
  assertInteger('retries', resolved.retries, 0);
  assertInteger('concurrency', resolved.concurrency, 1);
  if (!Number.isFinite(resolved.retryDelay) || resolved.retryDelay < 0) {
    throw new ModbusConfigError(`Invalid retryDelay: ${resolved.retryDelay}. Must be >= 0.`);
  }
  for (const code of resolved.gatewayExceptionCodes) {
    assertInteger('gateway exception code', code, 1, 0xff);
  }
  return resolved;
}

export function resolveTcpConfig(config: TcpConnectionConfig): Required<TcpConnectionConfig> {
  if (!config.host) throw new ModbusConfigError('Missing "host" for tcp connection');
  const resolved = {
    type: config.type,
    host: config.host,
    port: config.port ?? DEFAULTS.tcpPort,
    rtuOverTcp: config.rtuOverTcp ?? false,
    connectTimeout: config.connectTimeout ?? DEFAULTS.connectTimeout,
  };
  assertInteger('port', resolved.port, 1, 65535);
  assertPositive('connectTimeout', resolved.connectTimeout);
  return resolved;
}

export function resolveSerialConfig(config: SerialConnectionConfig): Required<SerialConnectionConfig> {
  if (!config.path) throw new ModbusConfigError('Missing "path" for serial connection');
  const resolved = {
    type: config.type,
    path: config.path,
    baudRate: config.baudRate ?? DEFAULTS.baudRate,
    parity: config.parity ?? DEFAULTS.parity,
    stopBits: config.stopBits ?? DEFAULTS.stopBits,
    dataBits: config.dataBits ?? DEFAULTS.dataBits,
  };
  assertInteger('baudRate', resolved.baudRate, 300, 115200);
  if (!['none', 'even', 'odd'].includes(resolved.parity)) {
    throw new ModbusConfigError(`Invalid parity: ${resolved.parity}`);
  }
  return resolved;
}
