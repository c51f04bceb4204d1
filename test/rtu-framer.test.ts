import { describe, expect, it } from 'vitest';
import { RtuFramer } from '../src/framers/rtu-framer.js';
import {
  ModbusCRCError,
  ModbusInvalidFrameLengthError,
  ModbusUnexpectedFunctionCodeError,
  ModbusUnitIdMismatchError,
} from '../src/errors.js';

const framer = new RtuFramer();

describe('RtuFramer', () => {
  describe('encodeRequest', () => {
    it('serialises a holding register read with its CRC', () => {
      const { frame, expectation } = framer.encodeRequest({
        unitId: 1,
        registerType: 'holding',
        address: 0,
        count: 10,
      });
      expect(Array.from(frame)).toEqual([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a, 0xc5, 0xcd]);
      expect(expectation).toEqual({ unitId: 1, functionCode: 0x03, quantity: 10 });
    });

    it('uses function code 0x04 for input registers', () => {
      const { frame } = framer.encodeRequest({ unitId: 5, registerType: 'input', address: 0, count: 2 });
      expect(Array.from(frame)).toEqual([0x05, 0x04, 0x00, 0x00, 0x00, 0x02, 0x70, 0x4f]);
    });
  });

  describe('decodeRequest', () => {
    it('recovers the fields of an encoded request', () => {
      const { frame } = framer.encodeRequest({ unitId: 17, registerType: 'holding', address: 107, count: 3 });
      expect(framer.decodeRequest(frame)).toEqual({ unitId: 17, functionCode: 0x03, address: 107, count: 3 });
    });

    it('rejects a request with any single corrupted byte', () => {
      const { frame } = framer.encodeRequest({ unitId: 17, registerType: 'input', address: 0x1234, count: 8 });
      for (let i = 0; i < frame.length; i++) {
        const corrupted = frame.slice();
        corrupted[i] = corrupted[i]! ^ 0xff;
        expect(() => framer.decodeRequest(corrupted)).toThrow(ModbusCRCError);
      }
    });
  });

  describe('decodeResponse', () => {
    const expectation = { unitId: 1, functionCode: 0x03, quantity: 1 };

    it('returns the register data of a valid response', () => {
      const parsed = framer.decodeResponse(
        new Uint8Array([0x01, 0x03, 0x02, 0x12, 0x34, 0xb5, 0x33]),
        expectation
      );
      expect(parsed.kind).toBe('response');
      if (parsed.kind === 'response') {
        expect(Array.from(parsed.data)).toEqual([0x12, 0x34]);
      }
    });

    it('decodes an exception response', () => {
      const parsed = framer.decodeResponse(new Uint8Array([0x02, 0x83, 0x02, 0x30, 0xf1]), {
        unitId: 2,
        functionCode: 0x03,
        quantity: 1,
      });
      expect(parsed).toEqual({ kind: 'exception', unitId: 2, functionCode: 0x03, exceptionCode: 0x02 });
    });

    it('marks a frame with a bad CRC invalid', () => {
      const parsed = framer.decodeResponse(
        new Uint8Array([0x01, 0x03, 0x02, 0x12, 0x34, 0xb5, 0x34]),
        expectation
      );
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') expect(parsed.reason).toBeInstanceOf(ModbusCRCError);
    });

    it('marks a response from another unit invalid', () => {
      const parsed = framer.decodeResponse(new Uint8Array([0x01, 0x03, 0x02, 0x12, 0x34, 0xb5, 0x33]), {
        unitId: 2,
        functionCode: 0x03,
        quantity: 1,
      });
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') expect(parsed.reason).toBeInstanceOf(ModbusUnitIdMismatchError);
    });

    it('marks a response to another function invalid', () => {
      const parsed = framer.decodeResponse(new Uint8Array([0x01, 0x03, 0x02, 0x12, 0x34, 0xb5, 0x33]), {
        unitId: 1,
        functionCode: 0x04,
        quantity: 1,
      });
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') expect(parsed.reason).toBeInstanceOf(ModbusUnexpectedFunctionCodeError);
    });

    it('marks a response with the wrong register count invalid', () => {
      const frame = framer.buildAdu(1, new Uint8Array([0x03, 0x04, 0x00, 0x01, 0x00, 0x02]));
      const parsed = framer.decodeResponse(frame, expectation);
      expect(parsed.kind).toBe('invalid');
      if (parsed.kind === 'invalid') expect(parsed.reason).toBeInstanceOf(ModbusInvalidFrameLengthError);
    });
  });

  describe('frameLength', () => {
    it('asks for the three header bytes first', () => {
      expect(framer.frameLength(new Uint8Array(0))).toBe(3);
      expect(framer.frameLength(new Uint8Array([0x01, 0x03]))).toBe(3);
    });

    it('derives the length of a register response from its byte count', () => {
      expect(framer.frameLength(new Uint8Array([0x01, 0x03, 0x02]))).toBe(7);
      expect(framer.frameLength(new Uint8Array([0x01, 0x04, 0xfa]))).toBe(255);
    });

    it('uses five bytes for exception responses and impossible lengths', () => {
      expect(framer.frameLength(new Uint8Array([0x02, 0x83, 0x02]))).toBe(5);
      expect(framer.frameLength(new Uint8Array([0x01, 0x03, 0xfc]))).toBe(5);
      expect(framer.frameLength(new Uint8Array([0x01, 0x10, 0x00]))).toBe(5);
    });
  });
});
