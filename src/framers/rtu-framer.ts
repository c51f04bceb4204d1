// src/framers/rtu-framer.ts

import { EXCEPTION_FLAG, ModbusFunctionCode, RTU_MAX_ADU_SIZE } from '../constants/constants.js';
import { ModbusCRCError, ModbusError, ModbusResponseError, ModbusUnitIdMismatchError } from '../errors.js';
import { parseReadRegistersRequest } from '../function-codes/read-registers.js';
import { crc16Modbus } from '../utils/crc.js';
import { concatUint8Arrays, sliceUint8Array, toHex } from '../utils/utils.js';
import {
  buildRequestPdu,
  DecodedRequest,
  EncodedRequest,
  interpretResponsePdu,
  ModbusFramer,
  ParsedFrame,
  RequestFields,
  ResponseExpectation,
} from './modbus-framer.js';

const CRC_SIZE = 2;
const MIN_ADU_SIZE = 4; // unit + FC + CRC
const EXCEPTION_ADU_SIZE = 5; // unit + FC|0x80 + code + CRC
const READ_HEADER_SIZE = 3; // unit + FC + byte count

export class RtuFramer implements ModbusFramer {
  public readonly variant = 'rtu';

  constructor(private readonly crcFn: (data: Uint8Array) => Uint8Array = crc16Modbus) {}

  public buildAdu(unitId: number, pdu: Uint8Array): Uint8Array {
    const aduWithoutCrc = concatUint8Arrays([new Uint8Array([unitId]), pdu]);
    return concatUint8Arrays([aduWithoutCrc, this.crcFn(aduWithoutCrc)]);
  }

  public parseAdu(packet: Uint8Array) {
    if (packet.length < MIN_ADU_SIZE) {
      throw new ModbusResponseError('Invalid RTU packet: too short');
    }

    const receivedCrc = sliceUint8Array(packet, -CRC_SIZE);
    const calculatedCrc = this.crcFn(sliceUint8Array(packet, 0, -CRC_SIZE));

    if (receivedCrc[0] !== calculatedCrc[0] || receivedCrc[1] !== calculatedCrc[1]) {
      throw new ModbusCRCError(
        `CRC mismatch: received ${toHex(receivedCrc)}, calculated ${toHex(calculatedCrc)}`
      );
    }

    return {
      unitId: packet[0]!,
      pdu: sliceUint8Array(packet, 1, -CRC_SIZE),
    };
  }

  public encodeRequest(request: RequestFields): EncodedRequest {
    const pdu = buildRequestPdu(request);
    return {
      frame: this.buildAdu(request.unitId, pdu),
      expectation: { unitId: request.unitId, functionCode: pdu[0]!, quantity: request.count },
    };
  }

  public decodeResponse(frame: Uint8Array, expectation: ResponseExpectation): ParsedFrame {
    let adu: { unitId: number; pdu: Uint8Array };
    try {
      adu = this.parseAdu(frame);
    } catch (err: unknown) {
      if (err instanceof ModbusError) return { kind: 'invalid', reason: err };
      throw err;
    }

    if (adu.unitId !== expectation.unitId) {
      return { kind: 'invalid', reason: new ModbusUnitIdMismatchError(expectation.unitId, adu.unitId) };
    }
    return interpretResponsePdu(adu.unitId, adu.pdu, expectation);
  }

  public decodeRequest(frame: Uint8Array): DecodedRequest {
    const { unitId, pdu } = this.parseAdu(frame);
    const { functionCode, address, quantity } = parseReadRegistersRequest(pdu);
    return { unitId, functionCode, address, count: quantity };
  }

  /**
   * RTU has no length field: the size follows from the function code and,
   * for register reads, the byte count.
   */
  public frameLength(buffer: Uint8Array): number {
    if (buffer.length < READ_HEADER_SIZE) return READ_HEADER_SIZE;

    const functionCode = buffer[1]!;
    if (functionCode & EXCEPTION_FLAG) return EXCEPTION_ADU_SIZE;

    if (
      functionCode === ModbusFunctionCode.READ_HOLDING_REGISTERS ||
      functionCode === ModbusFunctionCode.READ_INPUT_REGISTERS
    ) {
      const total = READ_HEADER_SIZE + buffer[2]! + CRC_SIZE;
      return total > RTU_MAX_ADU_SIZE ? EXCEPTION_ADU_SIZE : total;
    }

    // Unknown function code: consume a minimal frame so it fails the CRC and is dropped
    return EXCEPTION_ADU_SIZE;
  }
}
