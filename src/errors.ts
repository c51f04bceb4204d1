// src/errors.ts

import { exceptionMessage } from './constants/constants.js';

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModbusError';
  }
}

/**
 * Error class for Modbus timeout
 */
export class ModbusTimeoutError extends ModbusError {
  constructor(message: string = 'Modbus request timed out') {
    super(message);
    this.name = 'ModbusTimeoutError';
  }
}

/**
 * Error class for an operation abandoned through an abort signal
 */
export class ModbusAbortedError extends ModbusError {
  constructor(message: string = 'Modbus operation aborted') {
    super(message);
    this.name = 'ModbusAbortedError';
  }
}

/**
 * Error class for Modbus CRC check failure
 */
export class ModbusCRCError extends ModbusError {
  constructor(message: string = 'Modbus CRC check failed') {
    super(message);
    this.name = 'ModbusCRCError';
  }
}

/**
 * Error class for Modbus response errors
 */
export class ModbusResponseError extends ModbusError {
  constructor(message: string = 'Invalid Modbus response') {
    super(message);
    this.name = 'ModbusResponseError';
  }
}

/**
 * Error class for Modbus exception
 */
export class ModbusExceptionError extends ModbusError {
  functionCode: number;
  exceptionCode: number;

  constructor(functionCode: number, exceptionCode: number) {
    super(
      `Modbus exception: function 0x${functionCode.toString(16)}, code 0x${exceptionCode.toString(16)} (${exceptionMessage(exceptionCode)})`
    );
    this.name = 'ModbusExceptionError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
  }
}

// --- Errors for Data Validation ---

/**
 * Error class for invalid Modbus unit address
 */
export class ModbusInvalidAddressError extends ModbusError {
  constructor(address: number, min: number = 1, max: number = 247) {
    super(`Invalid Modbus address: ${address}. Address must be between ${min}-${max}.`);
    this.name = 'ModbusInvalidAddressError';
  }
}

/**
 * Error class for invalid register address
 */
export class ModbusInvalidStartingAddressError extends ModbusError {
  constructor(address: number) {
    super(`Invalid starting address: ${address}. Must be between 0-65535.`);
    this.name = 'ModbusInvalidStartingAddressError';
  }
}

/**
 * Error class for invalid quantity (register count)
 */
export class ModbusInvalidQuantityError extends ModbusError {
  constructor(quantity: number, min: number, max: number) {
    super(`Invalid quantity: ${quantity}. Must be between ${min}-${max}.`);
    this.name = 'ModbusInvalidQuantityError';
  }
}

/**
 * Error class for Modbus configuration error
 */
export class ModbusConfigError extends ModbusError {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusConfigError';
  }
}

// --- Errors for Message Format ---

/**
 * Error class for invalid frame length
 */
export class ModbusInvalidFrameLengthError extends ModbusResponseError {
  constructor(received: number, expected: number) {
    super(`Invalid frame length: received ${received}, expected ${expected}`);
    this.name = 'ModbusInvalidFrameLengthError';
  }
}

/**
 * Error class for invalid Modbus transaction ID
 */
export class ModbusInvalidTransactionIdError extends ModbusResponseError {
  constructor(received: number, expected: number) {
    super(`Invalid transaction ID: received ${received}, expected ${expected}`);
    this.name = 'ModbusInvalidTransactionIdError';
  }
}

/**
 * Error class for unexpected function code in response
 */
export class ModbusUnexpectedFunctionCodeError extends ModbusResponseError {
  constructor(sent: number, received: number) {
    super(
      `Unexpected function code: sent 0x${sent.toString(16)}, received 0x${received.toString(16)}`
    );
    this.name = 'ModbusUnexpectedFunctionCodeError';
  }
}

/**
 * Error class for a response from a unit other than the addressed one
 */
export class ModbusUnitIdMismatchError extends ModbusResponseError {
  constructor(expected: number, received: number) {
    super(`Unit ID mismatch: expected ${expected}, got ${received}`);
    this.name = 'ModbusUnitIdMismatchError';
  }
}

/**
 * Error class for insufficient data
 */
export class ModbusInsufficientDataError extends ModbusResponseError {
  constructor(received: number, required: number) {
    super(`Insufficient data: received ${received} bytes, required ${required} bytes`);
    this.name = 'ModbusInsufficientDataError';
  }
}

// --- Transport errors ---

/**
 * Base class for all Transport errors. A transport error means the connection,
 * not the device, is broken.
 */
export class ModbusTransportError extends ModbusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModbusTransportError';
  }
}

/**
 * Error class for not connected
 */
export class ModbusNotConnectedError extends ModbusTransportError {
  constructor(message: string = 'Not connected to Modbus device') {
    super(message);
    this.name = 'ModbusNotConnectedError';
  }
}

/**
 * Error class for connection refused
 */
export class ModbusConnectionRefusedError extends ModbusTransportError {
  constructor(host: string, port: number) {
    super(`Connection refused to ${host}:${port}`);
    this.name = 'ModbusConnectionRefusedError';
  }
}

/**
 * Error class for connection timeout
 */
export class ModbusConnectionTimeoutError extends ModbusTransportError {
  constructor(host: string, port: number, timeout: number) {
    super(`Connection timeout to ${host}:${port} after ${timeout}ms`);
    this.name = 'ModbusConnectionTimeoutError';
  }
}

/**
 * Error class for Node Serial transport errors
 */
export class NodeSerialTransportError extends ModbusTransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NodeSerialTransportError';
  }
}

/**
 * Error class for Node Serial connection errors
 */
export class NodeSerialConnectionError extends NodeSerialTransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NodeSerialConnectionError';
  }
}

/**
 * Error class for Node Serial write errors
 */
export class NodeSerialWriteError extends NodeSerialTransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NodeSerialWriteError';
  }
}
