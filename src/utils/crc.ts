// src/utils/crc.ts

const CRC16_TABLE: Uint16Array = new Uint16Array(256);
(function initCrc16Table(): void {
  for (let i: number = 0; i < 256; i++) {
    let crc: number = i;
    for (let j: number = 0; j < 8; j++) {
      crc = crc & 0x0001 ? (crc >> 1) ^ 0xa001 : crc >> 1;
    }
    CRC16_TABLE[i] = crc;
  }
})();

/**
 * Calculates CRC16-MODBUS (polynomial 0xA001, init 0xFFFF) as a number.
 * @param buffer - input data
 */
function crc16ModbusValue(buffer: Uint8Array): number {
  let crc: number = 0xffff;
  for (let i: number = 0; i < buffer.length; i++) {
    const index: number = (crc ^ buffer[i]!) & 0xff;
    crc = (crc >> 8) ^ CRC16_TABLE[index]!;
  }
  return crc;
}

/**
 * Calculates CRC16-MODBUS for the given Uint8Array.
 * @param buffer - input data to calculate CRC16-MODBUS
 * @returns 2-byte array in wire order (low byte first)
 */
function crc16Modbus(buffer: Uint8Array): Uint8Array {
  const crc = crc16ModbusValue(buffer);
  return new Uint8Array([crc & 0xff, (crc >> 8) & 0xff]);
}

export { crc16Modbus, crc16ModbusValue };
