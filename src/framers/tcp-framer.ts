// src/framers/tcp-framer.ts

import { MBAP_HEADER_SIZE, TCP_MAX_ADU_SIZE } from '../constants/constants.js';
import {
  ModbusError,
  ModbusInvalidFrameLengthError,
  ModbusInvalidTransactionIdError,
  ModbusResponseError,
  ModbusUnitIdMismatchError,
} from '../errors.js';
import { parseReadRegistersRequest } from '../function-codes/read-registers.js';
import { bytesToUint16BE, concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';
import {
  buildRequestPdu,
  DecodedRequest,
  EncodedRequest,
  FramerContext,
  interpretResponsePdu,
  ModbusFramer,
  ParsedFrame,
  RequestFields,
  ResponseExpectation,
} from './modbus-framer.js';

/**
 * Supplies MBAP transaction ids. Injectable so tests get a known sequence.
 */
export interface TransactionIdSource {
  next(): number;
}

/**
 * Monotonic 16-bit counter: 1, 2, ... 65535, 0, 1, ...
 */
export class SequentialTransactionIds implements TransactionIdSource {
  private _transactionId: number;

  constructor(start: number = 0) {
    this._transactionId = start & 0xffff;
  }

  public next(): number {
    this._transactionId = (this._transactionId + 1) % 65536;
    return this._transactionId;
  }

  public get current(): number {
    return this._transactionId;
  }
}

export class TcpFramer implements ModbusFramer {
  public readonly variant = 'tcp';

  constructor(private readonly ids: TransactionIdSource = new SequentialTransactionIds()) {}

  public buildAdu(unitId: number, pdu: Uint8Array, context?: FramerContext): Uint8Array {
    const tid = context?.transactionId ?? this.ids.next();
    const mbap = new Uint8Array(MBAP_HEADER_SIZE);
    const view = new DataView(mbap.buffer);

    // MBAP Header:
    view.setUint16(0, tid, false); // Transaction ID
    view.setUint16(2, 0, false); // Protocol ID (always 0 for Modbus)
    view.setUint16(4, pdu.length + 1, false); // Length (PDU + 1 byte UnitID)
    view.setUint8(6, unitId);

    return concatUint8Arrays([mbap, pdu]);
  }

  public parseAdu(packet: Uint8Array, context?: FramerContext) {
    if (packet.length < MBAP_HEADER_SIZE) {
      throw new ModbusResponseError('Invalid TCP packet: too short for MBAP');
    }

    const view = new DataView(packet.buffer, packet.byteOffset, MBAP_HEADER_SIZE);
    const receivedTid = view.getUint16(0, false);
    const protocolId = view.getUint16(2, false);
    const length = view.getUint16(4, false);
    const unitId = view.getUint8(6);

    if (protocolId !== 0) {
      throw new ModbusResponseError(`Invalid Protocol ID: ${protocolId}`);
    }
    if (packet.length !== 6 + length) {
      throw new ModbusInvalidFrameLengthError(packet.length, 6 + length);
    }
    if (context?.transactionId !== undefined && receivedTid !== context.transactionId) {
      throw new ModbusInvalidTransactionIdError(receivedTid, context.transactionId);
    }

    return {
      unitId,
      pdu: sliceUint8Array(packet, MBAP_HEADER_SIZE),
      transactionId: receivedTid,
    };
  }

  public encodeRequest(request: RequestFields): EncodedRequest {
    const pdu = buildRequestPdu(request);
    const transactionId = this.ids.next();
    return {
      frame: this.buildAdu(request.unitId, pdu, { transactionId }),
      expectation: {
        unitId: request.unitId,
        functionCode: pdu[0]!,
        quantity: request.count,
        transactionId,
      },
    };
  }

  public decodeResponse(frame: Uint8Array, expectation: ResponseExpectation): ParsedFrame {
    let adu: { unitId: number; pdu: Uint8Array };
    try {
      adu = this.parseAdu(frame, { transactionId: expectation.transactionId });
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
    const { unitId, pdu, transactionId } = this.parseAdu(frame);
    const { functionCode, address, quantity } = parseReadRegistersRequest(pdu);
    return { unitId, functionCode, address, count: quantity, transactionId };
  }

  public frameLength(buffer: Uint8Array): number {
    if (buffer.length < 6) return MBAP_HEADER_SIZE;
    const total = 6 + bytesToUint16BE(buffer, 4);
    // A length field that cannot be a real ADU: take the header alone so it is discarded
    if (total < MBAP_HEADER_SIZE + 1 || total > TCP_MAX_ADU_SIZE) return MBAP_HEADER_SIZE;
    return total;
  }
}
