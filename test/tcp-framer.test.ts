import { describe, expect, it } from 'vitest';
import { SequentialTransactionIds, TcpFramer } from '../src/framers/tcp-framer.js';
import { ModbusInvalidTransactionIdError, ModbusResponseError, ModbusUnitIdMismatchError } from '../src/errors.js';

describe('SequentialTransactionIds', () => {
  it('starts at 1 and increments', () => {
    const ids = new SequentialTransactionIds();
    expect([ids.next(), ids.next(), ids.next()]).toEqual([1, 2, 3]);
    expect(ids.current).toBe(3);
  });

  it('wraps to 0 after 65535', () => {
    const ids = new SequentialTransactionIds(65534);
    expect([ids.next(), ids.next(), ids.next()]).toEqual([65535, 0, 1]);
  });
});

describe('TcpFramer', () => {
  it('encodes a request with an MBAP header', () => {
    const framer = new TcpFramer();
    const { frame, expectation } = framer.encodeRequest({
      unitId: 1,
      registerType: 'holding',
      address: 0,
      count: 10,
    });
    expect(Array.from(frame)).toEqual([0x00, 0x01, 0x00, 0x00, 0x00, 0x06, 0x01, 0x03, 0x00, 0x00, 0x00, 0x0a]);
    expect(expectation).toEqual({ unitId: 1, functionCode: 0x03, quantity: 10, transactionId: 1 });
  });

  it('takes a fresh transaction id from the injected source for every request', () => {
    let next = 0x1233;
    const framer = new TcpFramer({ next: () => ++next });
    const request = { unitId: 9, registerType: 'input' as const, address: 4, count: 1 };
    const first = framer.encodeRequest(request);
    const second = framer.encodeRequest(request);
    expect(Array.from(first.frame.slice(0, 2))).toEqual([0x12, 0x34]);
    expect(Array.from(second.frame.slice(0, 2))).toEqual([0x12, 0x35]);
    expect(second.expectation.transactionId).toBe(0x1235);
  });

  it('decodes its own request frames', () => {
    const framer = new TcpFramer(new SequentialTransactionIds(41));
    const { frame } = framer.encodeRequest({ unitId: 3, registerType: 'input', address: 300, count: 2 });
    expect(framer.decodeRequest(frame)).toEqual({
      unitId: 3,
      functionCode: 0x04,
      address: 300,
      count: 2,
      transactionId: 42,
    });
  });

  describe('decodeResponse', () => {
    const framer = new TcpFramer();
    const pdu = new Uint8Array([0x03, 0x02, 0x12, 0x34]);

    it('accepts a response echoing the transaction id', () => {
      const frame = framer.buildAdu(1, pdu, { transactionId: 7 });
      const parsed = framer.decodeResponse(frame, { unitId: 1, functionCode: 0x03, quantity: 1, transactionId: 7 });
      expect(parsed.kind).toBe('response');
      if (parsed.kind === 'response') expect(Array.from(parsed.data)).toEqual([0x12, 0x34]);
    });

    it('marks a response with another transaction id invalid', () => {
      const frame = framer.buildAdu(1, pdu, { transactionId: 6 });
      const parsed = framer.decodeResponse(frame, { unitId: 1, functionCode: 0x03, quantity: 1, transactionId: 7 });
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') expect(parsed.reason).toBeInstanceOf(ModbusInvalidTransactionIdError);
    });

    it('marks a response from another unit invalid', () => {
      const frame = framer.buildAdu(2, pdu, { transactionId: 7 });
      const parsed = framer.decodeResponse(frame, { unitId: 1, functionCode: 0x03, quantity: 1, transactionId: 7 });
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') expect(parsed.reason).toBeInstanceOf(ModbusUnitIdMismatchError);
    });

    it('marks a frame with a non-zero protocol id invalid', () => {
      const frame = framer.buildAdu(1, pdu, { transactionId: 7 });
      frame[3] = 0x01;
      const parsed = framer.decodeResponse(frame, { unitId: 1, functionCode: 0x03, quantity: 1, transactionId: 7 });
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') expect(parsed.reason).toBeInstanceOf(ModbusResponseError);
    });

    it('decodes a gateway exception', () => {
      const frame = framer.buildAdu(4, new Uint8Array([0x84, 0x0b]), { transactionId: 9 });
      expect(Array.from(frame)).toEqual([0x00, 0x09, 0x00, 0x00, 0x00, 0x03, 0x04, 0x84, 0x0b]);
      expect(
        framer.decodeResponse(frame, { unitId: 4, functionCode: 0x04, quantity: 1, transactionId: 9 })
      ).toEqual({ kind: 'exception', unitId: 4, functionCode: 0x04, exceptionCode: 0x0b });
    });
  });

  describe('frameLength', () => {
    const framer = new TcpFramer();

    it('asks for the MBAP header first', () => {
      expect(framer.frameLength(new Uint8Array(0))).toBe(7);
      expect(framer.frameLength(new Uint8Array([0, 1, 0, 0, 0]))).toBe(7);
    });

    it('derives the total length from the length field', () => {
      expect(framer.frameLength(new Uint8Array([0, 1, 0, 0, 0, 5, 1]))).toBe(11);
    });

    it('falls back to the header length for impossible length fields', () => {
      expect(framer.frameLength(new Uint8Array([0, 1, 0, 0, 0, 0, 1]))).toBe(7);
      expect(framer.frameLength(new Uint8Array([0, 1, 0, 0, 0x01, 0x2c, 1]))).toBe(7);
    });
  });
});
