// src/types/modbus-types.ts

// !=============================================================================
// ! Requests
// !=============================================================================

export type RegisterType = 'holding' | 'input';

/** A single read of `count` registers from one unit. */
export interface ReadRequest {
  readonly unitId: number;
  readonly registerType: RegisterType;
  readonly address: number;
  readonly count: number;
  /** Per-attempt response timeout (ms) */
  readonly timeout: number;
  readonly maxRetries: number;
}

/** A probe request with the unit id left open, substituted per scanned unit. */
export type ProbeTemplate = Omit<ReadRequest, 'unitId'>;

// !=============================================================================
// ! Outcomes
// !=============================================================================

export interface SuccessOutcome {
  kind: 'success';
  /** Register payload exactly as received, without byte count */
  rawBytes: Uint8Array;
  registers: number[];
  attempts: number;
  responseTime: number;
}

/** The device is present and rejected the request. */
export interface DeviceErrorOutcome {
  kind: 'device-error';
  exceptionCode: number;
  message: string;
  attempts: number;
  responseTime: number;
}

/** An intermediary reported a failure on behalf of the device. */
export interface GatewayErrorOutcome {
  kind: 'gateway-error';
  code: number;
  message: string;
  attempts: number;
  responseTime: number;
}

/** Every attempt timed out. */
export interface NoResponseOutcome {
  kind: 'no-response';
  attempts: number;
  elapsed: number;
}

export type Outcome = SuccessOutcome | DeviceErrorOutcome | GatewayErrorOutcome | NoResponseOutcome;

export type OutcomeKind = Outcome['kind'];

export interface ScanResult {
  startUnitId: number;
  endUnitId: number;
  /** Keyed by unit id, inserted in ascending order */
  outcomes: Map<number, Outcome>;
  /** False when the scan was cancelled before every unit was classified */
  complete: boolean;
  duration: number;
}

export type OutcomeHandler = (unitId: number, outcome: Outcome) => void;

export type LogLineHandler = (message: string) => void;

// !=============================================================================
// ! Transport
// !=============================================================================

/**
 * Byte channel to the bus. Connection lifecycle is owned by the caller.
 */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /**
   * Resolves with exactly `length` bytes. Rejects with ModbusTimeoutError when
   * `timeout` elapses first and with ModbusAbortedError when `signal` aborts.
   */
  read(length: number, timeout: number, signal?: AbortSignal): Promise<Uint8Array>;
  /** Discards buffered input */
  flush(): Promise<void>;
}

export type SerialParity = 'none' | 'even' | 'odd';

export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: SerialParity;
  readTimeout?: number;
  writeTimeout?: number;
  maxBufferSize?: number;
}

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  readTimeout?: number;
  maxBufferSize?: number;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  unitId?: number;
  funcCode?: number;
  exceptionCode?: number;
  address?: number;
  quantity?: number;
  responseTime?: number;
  attempt?: number;
  transactionId?: number;
  transport?: string;
  [key: string]: unknown;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'unitId' | 'funcCode' | 'exceptionCode' | 'address' | 'quantity' | 'responseTime' | 'attempt';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface UnitStats {
  success: number;
  fail: number;
}
