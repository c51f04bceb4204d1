// src/constants/constants.ts

/**
 * Modbus function codes used by the scanner
 */
export enum ModbusFunctionCode {
  READ_HOLDING_REGISTERS = 0x03,
  READ_INPUT_REGISTERS = 0x04,
}

/**
 * Modbus exception codes
 */
export enum ModbusExceptionCode {
  ILLEGAL_FUNCTION = 0x01,
  ILLEGAL_DATA_ADDRESS = 0x02,
  ILLEGAL_DATA_VALUE = 0x03,
  SLAVE_DEVICE_FAILURE = 0x04,
  ACKNOWLEDGE = 0x05,
  SLAVE_DEVICE_BUSY = 0x06,
  MEMORY_PARITY_ERROR = 0x08,
  GATEWAY_PATH_UNAVAILABLE = 0x0a,
  GATEWAY_TARGET_DEVICE_FAILED = 0x0b,
}

export const MODBUS_EXCEPTION_MESSAGES: ReadonlyMap<number, string> = new Map([
  [ModbusExceptionCode.ILLEGAL_FUNCTION, 'Illegal Function'],
  [ModbusExceptionCode.ILLEGAL_DATA_ADDRESS, 'Illegal Data Address'],
  [ModbusExceptionCode.ILLEGAL_DATA_VALUE, 'Illegal Data Value'],
  [ModbusExceptionCode.SLAVE_DEVICE_FAILURE, 'Slave Device Failure'],
  [ModbusExceptionCode.ACKNOWLEDGE, 'Acknowledge'],
  [ModbusExceptionCode.SLAVE_DEVICE_BUSY, 'Slave Device Busy'],
  [ModbusExceptionCode.MEMORY_PARITY_ERROR, 'Memory Parity Error'],
  [ModbusExceptionCode.GATEWAY_PATH_UNAVAILABLE, 'Gateway Path Unavailable'],
  [ModbusExceptionCode.GATEWAY_TARGET_DEVICE_FAILED, 'Gateway Target Device Failed to Respond'],
]);

/**
 * Exception codes reported by an intermediary rather than the addressed device.
 */
export const DEFAULT_GATEWAY_EXCEPTION_CODES: readonly number[] = [
  ModbusExceptionCode.GATEWAY_PATH_UNAVAILABLE,
  ModbusExceptionCode.GATEWAY_TARGET_DEVICE_FAILED,
];

export const FUNCTION_CODE_NAMES: ReadonlyMap<number, string> = new Map([
  [ModbusFunctionCode.READ_HOLDING_REGISTERS, 'READ_HOLDING_REGISTERS'],
  [ModbusFunctionCode.READ_INPUT_REGISTERS, 'READ_INPUT_REGISTERS'],
]);

export const EXCEPTION_FLAG = 0x80;

export const UNIT_ID_MIN = 1;
export const UNIT_ID_MAX = 247;
export const ADDRESS_MAX = 0xffff;
export const REGISTER_COUNT_MAX = 125;

export const MBAP_HEADER_SIZE = 7;
export const TCP_MAX_ADU_SIZE = 260;
export const RTU_MAX_ADU_SIZE = 256;

/**
 * Returns the human-readable name of an exception code, if it is a known one.
 */
export function exceptionMessage(code: number): string {
  return MODBUS_EXCEPTION_MESSAGES.get(code) ?? `Unknown exception code: ${code}`;
}
