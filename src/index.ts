// src/index.ts

export { default as ModbusScanner } from './scanner.js';
export type { ScanDevicesParams, ReadRegisterParams, ReadRegisterResult } from './scanner.js';

export { TransactionRunner, validateReadRequest } from './transaction-runner.js';
export type { TransactionRunnerOptions, ExecuteOptions } from './transaction-runner.js';
export { ScanOrchestrator, isDeviceFound, foundUnitIds } from './scan-orchestrator.js';
export type { ScanOptions } from './scan-orchestrator.js';

export { decodeValue, decodeValues, isValueFormat, VALUE_FORMATS } from './value-decoder.js';
export type { ValueFormat, DecodedEntry } from './value-decoder.js';
export { bytesToRegisters, registersToBytes } from './function-codes/read-registers.js';

export { TcpFramer, SequentialTransactionIds } from './framers/tcp-framer.js';
export type { TransactionIdSource } from './framers/tcp-framer.js';
export { RtuFramer } from './framers/rtu-framer.js';
export type {
  ModbusFramer,
  EncodedRequest,
  ParsedFrame,
  AnsweredFrame,
  DecodedRequest,
  ResponseExpectation,
} from './framers/modbus-framer.js';
export { crc16Modbus, crc16ModbusValue } from './utils/crc.js';

export { ResponseRouter } from './transport/response-router.js';
export type { Exchange } from './transport/response-router.js';
export { createConnection } from './transport/factory.js';
export type { Connection, CreateConnectionOptions } from './transport/factory.js';
export { default as NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { default as NodeSerialTransport } from './transport/node-transports/node-serialport.js';

export { default as SlaveEmulator } from './slave-emulator/slave-emulator.js';
export type { DeviceBehaviour, SlaveEmulatorOptions } from './slave-emulator/slave-emulator.js';
export { EmulatedBusTransport } from './slave-emulator/emulated-bus-transport.js';

export { DEFAULTS, resolveScannerOptions } from './config.js';
export type {
  ScannerOptions,
  ConnectionConfig,
  TcpConnectionConfig,
  SerialConnectionConfig,
} from './config.js';

export { default as Logger, engineLogger } from './logger.js';
export { default as Diagnostics } from './utils/diagnostics.js';
export type { DiagnosticsSummary } from './utils/diagnostics.js';

export * from './errors.js';
export {
  ModbusFunctionCode,
  ModbusExceptionCode,
  DEFAULT_GATEWAY_EXCEPTION_CODES,
  exceptionMessage,
} from './constants/constants.js';
export type * from './types/modbus-types.js';
