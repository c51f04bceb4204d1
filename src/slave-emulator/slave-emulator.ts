// src/slave-emulator/slave-emulator.ts

import { engineLogger } from '../logger.js';
import {
  ADDRESS_MAX,
  EXCEPTION_FLAG,
  ModbusExceptionCode,
  ModbusFunctionCode,
  REGISTER_COUNT_MAX,
} from '../constants/constants.js';
import {
  ModbusConfigError,
  ModbusExceptionError,
  ModbusInvalidAddressError,
  ModbusInvalidStartingAddressError,
} from '../errors.js';
import { DecodedRequest } from '../framers/modbus-framer.js';
import { registersToBytes } from '../function-codes/read-registers.js';
import { concatUint8Arrays } from '../utils/utils.js';

/**
 * How an emulated device answers requests.
 *
 * - `healthy`: answers from its register map
 * - `exception`: answers every read with the given exception code
 * - `silent`: never answers
 * - `slow`: answers after `delay` ms
 * - `flaky`: odd-numbered requests (1st, 3rd, ...) are answered only after
 *   `delay` ms, even-numbered ones at once
 * - `corrupt`: answers, but the frame is damaged in transit
 */
export type DeviceBehaviour =
  | { kind: 'healthy' }
  | { kind: 'exception'; exceptionCode: number }
  | { kind: 'silent' }
  | { kind: 'slow'; delay: number }
  | { kind: 'flaky'; delay: number }
  | { kind: 'corrupt' };

export interface SlaveEmulatorOptions {
  behaviour?: DeviceBehaviour;
  holdingRegisters?: Record<number, number>;
  inputRegisters?: Record<number, number>;
}

export interface EmulatedReply {
  pdu: Uint8Array;
  delay: number;
  corrupt: boolean;
}

const logger = engineLogger.createLogger('SlaveEmulator');

class SlaveEmulator {
  public readonly unitId: number;
  private behaviour: DeviceBehaviour;
  private readonly holdingRegisters: Map<number, number> = new Map();
  private readonly inputRegisters: Map<number, number> = new Map();
  private readonly exceptions: Map<string, number> = new Map();
  private _requestCount: number = 0;

  constructor(unitId: number, options: SlaveEmulatorOptions = {}) {
    if (!Number.isInteger(unitId) || unitId < 1 || unitId > 247) {
      throw new ModbusInvalidAddressError(unitId);
    }
    this.unitId = unitId;
    this.behaviour = options.behaviour ?? { kind: 'healthy' };

    for (const [address, value] of Object.entries(options.holdingRegisters ?? {})) {
      this.setHoldingRegister(Number(address), value);
    }
    for (const [address, value] of Object.entries(options.inputRegisters ?? {})) {
      this.setInputRegister(Number(address), value);
    }
  }

  get requestCount(): number {
    return this._requestCount;
  }

  setBehaviour(behaviour: DeviceBehaviour): void {
    this.behaviour = behaviour;
  }

  private _validateAddress(address: number): void {
    if (!Number.isInteger(address) || address < 0 || address > ADDRESS_MAX) {
      throw new ModbusInvalidStartingAddressError(address);
    }
  }

  private _validateValue(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new ModbusConfigError(`Register value out of range: ${value}. Must be between 0-65535.`);
    }
  }

  setHoldingRegister(address: number, value: number): void {
    this._validateAddress(address);
    this._validateValue(value);
    this.holdingRegisters.set(address, value);
  }

  setInputRegister(address: number, value: number): void {
    this._validateAddress(address);
    this._validateValue(value);
    this.inputRegisters.set(address, value);
  }

  /**
   * Makes reads of `address` with `functionCode` fail with `exceptionCode`.
   */
  setException(functionCode: number, address: number, exceptionCode: number): void {
    this._validateAddress(address);
    this.exceptions.set(`${functionCode}_${address}`, exceptionCode);
  }

  clearExceptions(): void {
    this.exceptions.clear();
  }

  private _checkException(functionCode: number, address: number): void {
    const exceptionCode = this.exceptions.get(`${functionCode}_${address}`);
    if (exceptionCode !== undefined) {
      throw new ModbusExceptionError(functionCode, exceptionCode);
    }
  }

  private _readRegisters(
    registers: Map<number, number>,
    functionCode: number,
    startAddress: number,
    quantity: number
  ): number[] {
    if (quantity < 1 || quantity > REGISTER_COUNT_MAX) {
      throw new ModbusExceptionError(functionCode, ModbusExceptionCode.ILLEGAL_DATA_VALUE);
    }
    if (startAddress + quantity > ADDRESS_MAX + 1) {
      throw new ModbusExceptionError(functionCode, ModbusExceptionCode.ILLEGAL_DATA_ADDRESS);
    }

    const result: number[] = [];
    for (let addr = startAddress; addr < startAddress + quantity; addr++) {
      this._checkException(functionCode, addr);
      result.push(registers.get(addr) ?? 0);
    }
    return result;
  }

  readHoldingRegisters(startAddress: number, quantity: number): number[] {
    return this._readRegisters(
      this.holdingRegisters,
      ModbusFunctionCode.READ_HOLDING_REGISTERS,
      startAddress,
      quantity
    );
  }

  readInputRegisters(startAddress: number, quantity: number): number[] {
    return this._readRegisters(
      this.inputRegisters,
      ModbusFunctionCode.READ_INPUT_REGISTERS,
      startAddress,
      quantity
    );
  }

  /**
   * Builds the response PDU for a request, exception responses included.
   */
  processRequest(functionCode: number, address: number, quantity: number): Uint8Array {
    try {
      let registers: number[];
      switch (functionCode) {
        case ModbusFunctionCode.READ_HOLDING_REGISTERS:
          registers = this.readHoldingRegisters(address, quantity);
          break;
        case ModbusFunctionCode.READ_INPUT_REGISTERS:
          registers = this.readInputRegisters(address, quantity);
          break;
        default:
          throw new ModbusExceptionError(functionCode, ModbusExceptionCode.ILLEGAL_FUNCTION);
      }
      const data = registersToBytes(registers);
      return concatUint8Arrays([new Uint8Array([functionCode, data.length]), data]);
    } catch (err: unknown) {
      if (err instanceof ModbusExceptionError) {
        logger.debug(err.message, {
          unitId: this.unitId,
          funcCode: functionCode,
          exceptionCode: err.exceptionCode,
        });
        return this._createExceptionPdu(functionCode, err.exceptionCode);
      }
      throw err;
    }
  }

  private _createExceptionPdu(functionCode: number, exceptionCode: number): Uint8Array {
    return new Uint8Array([functionCode | EXCEPTION_FLAG, exceptionCode]);
  }

  /**
   * Counts the request and decides whether, when and what the device answers.
   * Returns null when the device stays silent.
   */
  respond(request: DecodedRequest): EmulatedReply | null {
    this._requestCount += 1;
    const requestNumber = this._requestCount;

    logger.debug(`Request #${requestNumber} (${this.behaviour.kind})`, {
      unitId: this.unitId,
      funcCode: request.functionCode,
      address: request.address,
      quantity: request.count,
    });

    switch (this.behaviour.kind) {
      case 'silent':
        return null;
      case 'exception':
        return {
          pdu: this._createExceptionPdu(request.functionCode, this.behaviour.exceptionCode),
          delay: 0,
          corrupt: false,
        };
      case 'slow':
        return {
          pdu: this.processRequest(request.functionCode, request.address, request.count),
          delay: this.behaviour.delay,
          corrupt: false,
        };
      case 'flaky':
        return {
          pdu: this.processRequest(request.functionCode, request.address, request.count),
          delay: requestNumber % 2 === 1 ? this.behaviour.delay : 0,
          corrupt: false,
        };
      case 'corrupt':
        return {
          pdu: this.processRequest(request.functionCode, request.address, request.count),
          delay: 0,
          corrupt: true,
        };
      case 'healthy':
        return {
          pdu: this.processRequest(request.functionCode, request.address, request.count),
          delay: 0,
          corrupt: false,
        };
    }
  }
}

export default SlaveEmulator;
