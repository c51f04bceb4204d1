// src/function-codes/read-registers.ts

import {
  ADDRESS_MAX,
  ModbusFunctionCode,
  REGISTER_COUNT_MAX,
} from '../constants/constants.js';
import {
  ModbusInvalidFrameLengthError,
  ModbusInvalidQuantityError,
  ModbusInvalidStartingAddressError,
  ModbusResponseError,
  ModbusUnexpectedFunctionCodeError,
} from '../errors.js';
import { RegisterType } from '../types/modbus-types.js';
import { bytesToUint16BE, sliceUint8Array } from '../utils/utils.js';

const MIN_QUANTITY = 1;
const REQUEST_SIZE = 5; // 1 (FC) + 2 (Addr) + 2 (Qty)
const RESPONSE_HEADER_SIZE = 2; // FC (1) + ByteCount (1)
const UINT16_SIZE = 2;

export interface ReadRegistersRequestFields {
  functionCode: number;
  address: number;
  quantity: number;
}

/**
 * Function code that reads the given register class.
 */
export function functionCodeFor(registerType: RegisterType): ModbusFunctionCode {
  return registerType === 'input'
    ? ModbusFunctionCode.READ_INPUT_REGISTERS
    : ModbusFunctionCode.READ_HOLDING_REGISTERS;
}

/**
 * Builds a read-registers request PDU (FC 0x03 / 0x04)
 * @param functionCode - 0x03 or 0x04
 * @param startAddress - first register (0x0000–0xFFFF)
 * @param quantity - register count (1–125)
 */
export function buildReadRegistersRequest(
  functionCode: number,
  startAddress: number,
  quantity: number
): Uint8Array {
  if (!Number.isInteger(startAddress) || startAddress < 0 || startAddress > ADDRESS_MAX) {
    throw new ModbusInvalidStartingAddressError(startAddress);
  }
  if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > REGISTER_COUNT_MAX) {
    throw new ModbusInvalidQuantityError(quantity, MIN_QUANTITY, REGISTER_COUNT_MAX);
  }

  const buffer = new Uint8Array(REQUEST_SIZE);
  buffer[0] = functionCode;
  buffer[1] = startAddress >>> 8;
  buffer[2] = startAddress & 0xff;
  buffer[3] = quantity >>> 8;
  buffer[4] = quantity & 0xff;

  return buffer;
}

/**
 * Reads the fields back out of a read-registers request PDU.
 */
export function parseReadRegistersRequest(pdu: Uint8Array): ReadRegistersRequestFields {
  if (pdu.length !== REQUEST_SIZE) {
    throw new ModbusInvalidFrameLengthError(pdu.length, REQUEST_SIZE);
  }
  return {
    functionCode: pdu[0]!,
    address: bytesToUint16BE(pdu, 1),
    quantity: bytesToUint16BE(pdu, 3),
  };
}

/**
 * Extracts the register bytes from a read-registers response PDU.
 * @param pdu - response PDU (FC, byte count, data)
 * @param functionCode - function code of the request
 * @returns register data, two bytes per register, as received
 */
export function parseReadRegistersResponse(pdu: Uint8Array, functionCode: number): Uint8Array {
  if (pdu.length < RESPONSE_HEADER_SIZE) {
    throw new ModbusResponseError('PDU too short');
  }
  if (pdu[0] !== functionCode) {
    throw new ModbusUnexpectedFunctionCodeError(functionCode, pdu[0]!);
  }

  const byteCount = pdu[1]!;
  if (byteCount % UINT16_SIZE !== 0) {
    throw new ModbusResponseError(`Invalid byte count: must be multiple of ${UINT16_SIZE}`);
  }

  const expectedLength = RESPONSE_HEADER_SIZE + byteCount;
  if (pdu.length !== expectedLength) {
    throw new ModbusInvalidFrameLengthError(pdu.length, expectedLength);
  }

  return sliceUint8Array(pdu, RESPONSE_HEADER_SIZE);
}

/**
 * Splits register bytes into big-endian 16-bit words. A trailing odd byte is ignored.
 */
export function bytesToRegisters(data: Uint8Array): number[] {
  const registers: number[] = [];
  for (let i = 0; i + 1 < data.length; i += UINT16_SIZE) {
    registers.push(bytesToUint16BE(data, i));
  }
  return registers;
}

/**
 * Serialises register values to big-endian bytes.
 */
export function registersToBytes(registers: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(registers.length * UINT16_SIZE);
  registers.forEach((reg, i) => {
    bytes[i * 2] = (reg >> 8) & 0xff;
    bytes[i * 2 + 1] = reg & 0xff;
  });
  return bytes;
}
