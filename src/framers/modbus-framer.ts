// src/framers/modbus-framer.ts

import { EXCEPTION_FLAG } from '../constants/constants.js';
import {
  ModbusError,
  ModbusInvalidFrameLengthError,
  ModbusResponseError,
  ModbusUnexpectedFunctionCodeError,
} from '../errors.js';
import {
  buildReadRegistersRequest,
  functionCodeFor,
  parseReadRegistersResponse,
} from '../function-codes/read-registers.js';
import { ReadRequest } from '../types/modbus-types.js';

/**
 * Context for building or parsing an ADU (e.g. the Transaction ID for TCP)
 */
export interface FramerContext {
  transactionId?: number;
}

/**
 * What a response has to look like to answer an outstanding request.
 */
export interface ResponseExpectation {
  unitId: number;
  functionCode: number;
  quantity: number;
  transactionId?: number;
}

export interface EncodedRequest {
  frame: Uint8Array;
  expectation: ResponseExpectation;
}

export type RequestFields = Pick<ReadRequest, 'unitId' | 'registerType' | 'address' | 'count'>;

export interface DecodedRequest {
  unitId: number;
  functionCode: number;
  address: number;
  count: number;
  transactionId?: number;
}

export type ParsedFrame =
  | { kind: 'response'; unitId: number; functionCode: number; data: Uint8Array }
  | { kind: 'exception'; unitId: number; functionCode: number; exceptionCode: number }
  | { kind: 'invalid'; reason: ModbusError };

/** A frame that answers its request, with data or with an exception */
export type AnsweredFrame = Extract<ParsedFrame, { kind: 'response' | 'exception' }>;

/**
 * Builds and parses ADUs for one protocol variant
 */
export interface ModbusFramer {
  readonly variant: 'tcp' | 'rtu';

  /**
   * Wraps a PDU in the variant's header / checksum
   */
  buildAdu(unitId: number, pdu: Uint8Array, context?: FramerContext): Uint8Array;

  /**
   * Extracts the PDU from a raw ADU, verifying CRC or MBAP. Throws on malformed input.
   */
  parseAdu(data: Uint8Array, context?: FramerContext): { unitId: number; pdu: Uint8Array; transactionId?: number };

  /**
   * Encodes a read request, allocating a transaction id where the variant has one
   */
  encodeRequest(request: RequestFields): EncodedRequest;

  /**
   * Classifies a complete response frame against the outstanding request
   */
  decodeResponse(frame: Uint8Array, expectation: ResponseExpectation): ParsedFrame;

  /**
   * Reads the fields of a request frame (the responder's view)
   */
  decodeRequest(frame: Uint8Array): DecodedRequest;

  /**
   * Total length of the frame starting at `buffer[0]`, or the number of bytes
   * still needed to tell
   */
  frameLength(buffer: Uint8Array): number;
}

export function buildRequestPdu(request: RequestFields): Uint8Array {
  return buildReadRegistersRequest(
    functionCodeFor(request.registerType),
    request.address,
    request.count
  );
}

/**
 * Classifies a response PDU that already passed the variant's integrity checks.
 */
export function interpretResponsePdu(
  unitId: number,
  pdu: Uint8Array,
  expectation: ResponseExpectation
): ParsedFrame {
  if (pdu.length === 0) {
    return { kind: 'invalid', reason: new ModbusResponseError('Empty PDU') };
  }

  const functionCode = pdu[0]!;
  if (functionCode === (expectation.functionCode | EXCEPTION_FLAG)) {
    if (pdu.length !== 2) {
      return { kind: 'invalid', reason: new ModbusInvalidFrameLengthError(pdu.length, 2) };
    }
    return {
      kind: 'exception',
      unitId,
      functionCode: expectation.functionCode,
      exceptionCode: pdu[1]!,
    };
  }

  if (functionCode !== expectation.functionCode) {
    return {
      kind: 'invalid',
      reason: new ModbusUnexpectedFunctionCodeError(expectation.functionCode, functionCode),
    };
  }

  try {
    const data = parseReadRegistersResponse(pdu, expectation.functionCode);
    if (data.length !== expectation.quantity * 2) {
      return {
        kind: 'invalid',
        reason: new ModbusInvalidFrameLengthError(data.length, expectation.quantity * 2),
      };
    }
    return { kind: 'response', unitId, functionCode, data };
  } catch (err: unknown) {
    if (err instanceof ModbusError) {
      return { kind: 'invalid', reason: err };
    }
    throw err;
  }
}
