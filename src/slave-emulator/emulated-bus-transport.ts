// src/slave-emulator/emulated-bus-transport.ts

import { engineLogger } from '../logger.js';
import { ModbusError, ModbusNotConnectedError, ModbusTransportError } from '../errors.js';
import { DecodedRequest, ModbusFramer } from '../framers/modbus-framer.js';
import { Transport } from '../types/modbus-types.js';
import { toHex } from '../utils/utils.js';
import { ReadBuffer } from '../transport/read-buffer.js';
import SlaveEmulator from './slave-emulator.js';

const logger = engineLogger.createLogger('EmulatedBus');

/**
 * In-process bus: frames written to it are decoded, dispatched to the
 * emulated device with the addressed unit id and answered with the
 * framer's encoding. Units without a device stay silent.
 */
export class EmulatedBusTransport implements Transport {
  public isOpen: boolean = false;
  private readonly devices: Map<number, SlaveEmulator> = new Map();
  private readonly readBuffer: ReadBuffer = new ReadBuffer(8192);
  private readonly timers: Set<NodeJS.Timeout> = new Set();
  private readonly writes: Uint8Array[] = [];
  private broken: Error | null = null;

  constructor(private readonly framer: ModbusFramer) {}

  addDevice(device: SlaveEmulator): this {
    this.devices.set(device.unitId, device);
    return this;
  }

  getDevice(unitId: number): SlaveEmulator | undefined {
    return this.devices.get(unitId);
  }

  /** Every frame written so far, in order */
  get writtenFrames(): readonly Uint8Array[] {
    return this.writes;
  }

  /** Number of requests that reached the device with this unit id */
  requestCount(unitId: number): number {
    return this.devices.get(unitId)?.requestCount ?? 0;
  }

  /**
   * Makes every following write fail, as a dropped connection would.
   */
  breakConnection(reason: string = 'Connection lost'): void {
    this.broken = new ModbusTransportError(reason);
    this.readBuffer.fail(this.broken);
  }

  /**
   * Injects raw bytes on the wire, as line noise or a stray frame would.
   */
  inject(bytes: Uint8Array, delay: number = 0): void {
    this._schedule(() => this.readBuffer.push(bytes), delay);
  }

  async connect(): Promise<void> {
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.isOpen = false;
    this.close();
    this.readBuffer.fail(new ModbusNotConnectedError('Transport disconnected'));
  }

  /**
   * Drops replies that are still scheduled.
   */
  close(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
  }

  async write(frame: Uint8Array): Promise<void> {
    if (this.broken) throw this.broken;
    if (!this.isOpen) throw new ModbusNotConnectedError();

    this.writes.push(frame.slice());
    logger.trace(`TX ${toHex(frame, ' ')}`);

    let request: DecodedRequest;
    try {
      request = this.framer.decodeRequest(frame);
    } catch (err: unknown) {
      if (err instanceof ModbusError) {
        logger.warn(`Ignoring undecodable request: ${err.message}`);
        return;
      }
      throw err;
    }

    const device = this.devices.get(request.unitId);
    const reply = device?.respond(request);
    if (!reply) return;

    const response = this.framer.buildAdu(request.unitId, reply.pdu, {
      transactionId: request.transactionId,
    });
    if (reply.corrupt) {
      // RTU: break the CRC. TCP: break the transaction id.
      const index = this.framer.variant === 'rtu' ? response.length - 1 : 0;
      response[index] = response[index]! ^ 0xff;
    }

    this._schedule(() => {
      logger.trace(`RX ${toHex(response, ' ')}`);
      this.readBuffer.push(response);
    }, reply.delay);
  }

  async read(length: number, timeout: number, signal?: AbortSignal): Promise<Uint8Array> {
    if (this.broken) throw this.broken;
    if (!this.isOpen) throw new ModbusNotConnectedError();
    return this.readBuffer.read(length, timeout, signal);
  }

  async flush(): Promise<void> {
    this.readBuffer.clear();
  }

  private _schedule(fn: () => void, delay: number): void {
    if (delay <= 0) {
      fn();
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, delay);
    this.timers.add(timer);
  }
}
